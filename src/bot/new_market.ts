import type { Market, NotifiedSet } from './types.js';

export type NewMarketWindow = {
  minMs: number;
  maxMs: number;
};

export const DEFAULT_WINDOW: NewMarketWindow = { minMs: 0, maxMs: 3 * 60_000 };

export type Classification = {
  isNew: boolean;
  elapsedMs: number;
  reason: 'new' | 'notified' | 'closed' | 'not-started' | 'too-old';
};

export function windowFromMinutes(minMinutes: number, maxMinutes: number): NewMarketWindow {
  return { minMs: minMinutes * 60_000, maxMs: maxMinutes * 60_000 };
}

/**
 * A market is new when `minMs <= now - start <= maxMs` (both ends inclusive)
 * and it has not been alerted yet. Negative elapsed time (not open yet, or
 * clock skew) is simply not new.
 */
export function classifyMarket(
  market: Market,
  nowMs: number,
  notified: ReadonlySet<string>,
  window: NewMarketWindow = DEFAULT_WINDOW
): Classification {
  const elapsedMs = nowMs - market.startMs;

  if (notified.has(market.id)) return { isNew: false, elapsedMs, reason: 'notified' };
  if (market.status === 'closed') return { isNew: false, elapsedMs, reason: 'closed' };
  if (elapsedMs < 0 || elapsedMs < window.minMs) return { isNew: false, elapsedMs, reason: 'not-started' };
  if (elapsedMs > window.maxMs) return { isNew: false, elapsedMs, reason: 'too-old' };
  return { isNew: true, elapsedMs, reason: 'new' };
}

export function isNewMarket(
  market: Market,
  nowMs: number,
  notified: ReadonlySet<string>,
  window?: NewMarketWindow
): boolean {
  return classifyMarket(market, nowMs, notified, window).isNew;
}

export function findNewMarkets(
  markets: readonly Market[],
  nowMs: number,
  notified: NotifiedSet,
  window?: NewMarketWindow
): Array<{ market: Market; elapsedMs: number }> {
  const out: Array<{ market: Market; elapsedMs: number }> = [];
  for (const market of markets) {
    const c = classifyMarket(market, nowMs, notified, window);
    if (c.isNew) out.push({ market, elapsedMs: c.elapsedMs });
  }
  return out;
}
