import { z } from 'zod';
import type { HttpClient } from './http.js';
import { DataUnavailable, FetchFailure, describeError } from './errors.js';
import type { PriceDataSource, PricePoint, PriceSourceKind } from './types.js';

const maybeNum = z.union([z.number(), z.string()]).nullish();

const CoinGeckoSimplePriceSchema = z.object({
  bitcoin: z.object({ usd: maybeNum, usd_24h_change: maybeNum }).nullish()
});

const CoinbaseStatsSchema = z.object({ open: maybeNum, last: maybeNum });

function toNum(v: string | number | null | undefined): number | undefined {
  if (v == null || v === '') return undefined;
  const n = typeof v === 'number' ? v : Number(v);
  return Number.isFinite(n) ? n : undefined;
}

async function getOrFail(http: HttpClient, url: string, label: string): Promise<unknown> {
  try {
    return await http.getJson(url);
  } catch (e) {
    throw new FetchFailure(`${label} request failed: ${describeError(e)}`, { cause: e });
  }
}

function point(price: number | undefined, change: number | undefined, source: PriceSourceKind, now: number): PricePoint {
  if (price === undefined || price <= 0 || change === undefined) {
    throw new DataUnavailable(`${source} returned no usable BTC price/24h change`);
  }
  return { price, change24hPct: change, fetchedAtMs: now, source };
}

export function parseCoinGecko(raw: unknown, now: number): PricePoint {
  const parsed = CoinGeckoSimplePriceSchema.safeParse(raw);
  if (!parsed.success) throw new FetchFailure('coingecko returned an unexpected payload');
  const btc = parsed.data.bitcoin;
  return point(toNum(btc?.usd), toNum(btc?.usd_24h_change), 'coingecko', now);
}

export function parseCoinbaseStats(raw: unknown, now: number): PricePoint {
  const parsed = CoinbaseStatsSchema.safeParse(raw);
  if (!parsed.success) throw new FetchFailure('coinbase returned an unexpected payload');
  const open = toNum(parsed.data.open);
  const last = toNum(parsed.data.last);
  const change = open !== undefined && last !== undefined && open > 0 ? ((last - open) / open) * 100 : undefined;
  return point(last, change, 'coinbase', now);
}

export class CoinGeckoPriceSource implements PriceDataSource {
  constructor(
    private opts: { http: HttpClient; baseUrl?: string; now?: () => number }
  ) {}

  async fetchPrice(): Promise<PricePoint> {
    const url = new URL((this.opts.baseUrl ?? 'https://api.coingecko.com/api/v3').replace(/\/+$/, '') + '/simple/price');
    url.searchParams.set('ids', 'bitcoin');
    url.searchParams.set('vs_currencies', 'usd');
    url.searchParams.set('include_24hr_change', 'true');

    const raw = await getOrFail(this.opts.http, url.toString(), 'coingecko');
    return parseCoinGecko(raw, (this.opts.now ?? Date.now)());
  }
}

// 24h change derived from the rolling 24h open in /stats.
export class CoinbasePriceSource implements PriceDataSource {
  constructor(
    private opts: { http: HttpClient; baseUrl?: string; now?: () => number }
  ) {}

  async fetchPrice(): Promise<PricePoint> {
    const base = (this.opts.baseUrl ?? 'https://api.exchange.coinbase.com').replace(/\/+$/, '');
    const raw = await getOrFail(this.opts.http, `${base}/products/BTC-USD/stats`, 'coinbase');
    return parseCoinbaseStats(raw, (this.opts.now ?? Date.now)());
  }
}

export function makePriceSource(kind: PriceSourceKind, opts: { http: HttpClient; baseUrl?: string }): PriceDataSource {
  return kind === 'coinbase' ? new CoinbasePriceSource(opts) : new CoinGeckoPriceSource(opts);
}
