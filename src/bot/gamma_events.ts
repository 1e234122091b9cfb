import { z } from 'zod';
import type { HttpClient } from './http.js';
import { FetchFailure, describeError } from './errors.js';
import type { Market, MarketDataSource } from './types.js';

export const MARKET_DURATION_MS = 15 * 60_000;

const numeric = z.union([z.number(), z.string()]);

// A field of an unexpected type reads as absent instead of failing the event.
const lenient = <T extends z.ZodTypeAny>(t: T) => t.nullish().catch(undefined);

const GammaMarketSchema = z.object({
  id: lenient(z.union([z.string(), z.number()])),
  slug: lenient(z.string()),
  question: lenient(z.string()),
  outcomes: lenient(z.union([z.string(), z.array(z.string())])),
  outcomePrices: lenient(z.union([z.string(), z.array(numeric)])),
  endDate: lenient(z.string()),
  endDateIso: lenient(z.string()),
  end_date_iso: lenient(z.string()),
  eventStartTime: lenient(z.string()),
  volume: lenient(numeric),
  volumeNum: lenient(numeric),
  closed: lenient(z.boolean())
});

const GammaEventSchema = z.object({
  id: lenient(z.union([z.string(), z.number()])),
  slug: lenient(z.string()),
  title: lenient(z.string()),
  startTime: lenient(z.string()),
  endDate: lenient(z.string()),
  volume: lenient(numeric),
  closed: lenient(z.boolean()),
  markets: lenient(z.array(GammaMarketSchema))
});

type GammaEvent = z.infer<typeof GammaEventSchema>;
type GammaMarket = z.infer<typeof GammaMarketSchema>;

function parseStringArray(value?: string | string[] | null): string[] {
  if (!value) return [];
  if (Array.isArray(value)) return value.map(String).filter(Boolean);
  const trimmed = value.trim();
  if (!trimmed) return [];
  try {
    const parsed: unknown = JSON.parse(trimmed);
    if (Array.isArray(parsed)) return parsed.map(String).filter(Boolean);
  } catch {
    // not JSON, fall through to comma-separated
  }
  return trimmed.split(',').map(s => s.trim()).filter(Boolean);
}

function toNum(v: string | number | null | undefined): number | undefined {
  if (v == null || v === '') return undefined;
  const n = typeof v === 'number' ? v : Number(String(v).trim());
  return Number.isFinite(n) ? n : undefined;
}

function parseIso(value: string | null | undefined): number | undefined {
  if (!value) return undefined;
  const ms = new Date(value).getTime();
  return Number.isFinite(ms) ? ms : undefined;
}

function clamp01(n: number) {
  return Math.max(0, Math.min(1, n));
}

function pickOdds(m: GammaMarket): { yes: number; no: number } {
  const outcomes = parseStringArray(m.outcomes).map(o => o.toLowerCase());
  const raw = m.outcomePrices;
  const prices = (Array.isArray(raw) ? raw.map(String) : parseStringArray(raw)).map(p => toNum(p));

  const upIdx = outcomes.findIndex(o => o.includes('up') || o === 'yes');
  const downIdx = outcomes.findIndex(o => o.includes('down') || o === 'no');
  const yes = prices[upIdx >= 0 ? upIdx : 0];
  const no = prices[downIdx >= 0 ? downIdx : 1];

  if (yes === undefined && no === undefined) return { yes: 0.5, no: 0.5 };
  if (yes === undefined) return { yes: clamp01(1 - (no ?? 0.5)), no: clamp01(no ?? 0.5) };
  if (no === undefined) return { yes: clamp01(yes), no: clamp01(1 - yes) };
  return { yes: clamp01(yes), no: clamp01(no) };
}

/**
 * Normalise one Gamma event into a Market. Returns null when the event
 * has no slug or no usable close time.
 *
 * Start time comes from `eventStartTime` / `startTime`; when neither is
 * present it is derived as close minus 15 minutes. Gamma's `startDate` is
 * the listing time, not the trading window, so it is ignored.
 */
export function normalizeEvent(ev: GammaEvent): Market | null {
  const m: GammaMarket = ev.markets?.[0] ?? {};
  const id = ev.slug ?? m.slug ?? (ev.id != null ? String(ev.id) : undefined);
  if (!id) return null;

  const closeMs = parseIso(m.endDate ?? m.endDateIso ?? m.end_date_iso ?? ev.endDate);
  if (closeMs === undefined) return null;

  let startMs = parseIso(m.eventStartTime ?? ev.startTime);
  if (startMs === undefined || startMs > closeMs) startMs = closeMs - MARKET_DURATION_MS;

  const odds = pickOdds(m);
  const volume = toNum(m.volumeNum) ?? toNum(m.volume) ?? toNum(ev.volume) ?? 0;

  return {
    id,
    title: ev.title ?? m.question ?? id,
    startMs,
    closeMs,
    yesOdds: odds.yes,
    noOdds: odds.no,
    volume: Number.isFinite(volume) ? volume : 0,
    status: ev.closed || m.closed ? 'closed' : 'active'
  };
}

/**
 * Events that are not objects, or have no slug or close time, are dropped;
 * `log` gets one line per call that dropped any.
 */
export function parseGammaEvents(raw: unknown, log?: (line: string) => void): Market[] {
  if (!Array.isArray(raw)) throw new FetchFailure('Gamma events returned non-array');

  const out: Market[] = [];
  const seen = new Set<string>();
  let dropped = 0;
  for (const item of raw) {
    const parsed = GammaEventSchema.safeParse(item);
    const market = parsed.success ? normalizeEvent(parsed.data) : null;
    if (!market) {
      dropped++;
      continue;
    }
    if (seen.has(market.id)) continue;
    seen.add(market.id);
    out.push(market);
  }
  if (dropped > 0) log?.(`[gamma] dropped ${dropped} of ${raw.length} events (malformed or missing slug/close time)`);
  return out;
}

// Read-only: BTC 15m events from Gamma, filtered by tag.
export class GammaMarketSource implements MarketDataSource {
  constructor(
    private opts: {
      http: HttpClient;
      gammaBaseUrl: string;
      eventTag: string;
      limit?: number;
      log?: (line: string) => void;
    }
  ) {}

  async fetchActiveMarkets(): Promise<Market[]> {
    const url = new URL(this.opts.gammaBaseUrl.replace(/\/+$/, '') + '/events');
    url.searchParams.set('tag', this.opts.eventTag);
    url.searchParams.set('closed', 'false');
    url.searchParams.set('active', 'true');
    url.searchParams.set('archived', 'false');
    url.searchParams.set('limit', String(this.opts.limit ?? 50));

    let raw: unknown;
    try {
      raw = await this.opts.http.getJson(url.toString());
    } catch (e) {
      throw new FetchFailure(`Gamma events failed: ${describeError(e)}`, { cause: e });
    }
    // eslint-disable-next-line no-console
    return parseGammaEvents(raw, this.opts.log ?? ((line) => console.log(line)));
  }
}
