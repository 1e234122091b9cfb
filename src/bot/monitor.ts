import { setTimeout as sleep } from 'node:timers/promises';
import { formatAlert, formatClock, type DisplayOptions } from './alert.js';
import { MonitorError, describeError } from './errors.js';
import { findNewMarkets, type NewMarketWindow } from './new_market.js';
import { predict, type PredictionParams } from './prediction.js';
import type {
  Market,
  MarketDataSource,
  NotificationSink,
  NotifiedSet,
  PriceDataSource
} from './types.js';

export type MonitorState = 'stopped' | 'idle' | 'checking';

export type SkipReason = MonitorError['kind'] | 'error';

export type CycleReport = {
  checkNo: number;
  checkedAtMs: number;
  markets: number;
  fresh: string[];
  sent: string[];
  skipped: Array<{ marketId: string; reason: SkipReason; message: string }>;
  // set when the market list could not be fetched
  aborted?: string;
};

export type MonitorOptions = {
  markets: MarketDataSource;
  prices: PriceDataSource;
  sink: NotificationSink;
  intervalMs: number;
  window: NewMarketWindow;
  prediction: PredictionParams;
  display: DisplayOptions;
  now?: () => number;
  log?: (line: string) => void;
};

// keep pinned start times around a while after close, then forget them
const START_PIN_RETENTION_MS = 60 * 60_000;

/**
 * Poll loop. One cycle at a time: the next cycle is scheduled from the start
 * of the previous one and never overlaps it. `stop()` lets an in-flight cycle
 * finish and cancels the wait before the next one.
 *
 * The notified set lives only in memory; a restart may alert a market again
 * if it is still inside the window.
 */
export class MonitorService {
  private opts: MonitorOptions;
  private now: () => number;
  private log: (line: string) => void;

  private notified: NotifiedSet = new Set();
  private pinnedStarts = new Map<string, { startMs: number; closeMs: number }>();

  private state: MonitorState = 'stopped';
  private running = false;
  private checks = 0;
  private lastCycle: CycleReport | null = null;
  private lastError: string | null = null;
  private nextCheckAtMs: number | null = null;

  private wake: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private inFlight: Promise<CycleReport> | null = null;

  constructor(opts: MonitorOptions) {
    this.opts = opts;
    this.now = opts.now ?? Date.now;
    // eslint-disable-next-line no-console
    this.log = opts.log ?? ((line) => console.log(line));
  }

  getStatus() {
    return {
      state: this.state,
      running: this.running,
      checks: this.checks,
      notified: this.notified.size,
      intervalMs: this.opts.intervalMs,
      nextCheckAtMs: this.nextCheckAtMs,
      lastCycle: this.lastCycle,
      lastError: this.lastError
    };
  }

  getNotified(): string[] {
    return Array.from(this.notified);
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.state = 'idle';
    this.log(`[monitor] started, interval ${Math.round(this.opts.intervalMs / 1000)}s`);
    this.loop = this.runLoop().catch((e) => {
      this.running = false;
      this.state = 'stopped';
      this.lastError = describeError(e);
      this.log(`[monitor] loop exited: ${this.lastError}`);
    });
  }

  async stop(): Promise<void> {
    if (!this.running && !this.loop) return;
    this.running = false;
    this.wake?.abort();
    await this.loop;
    this.loop = null;
    this.nextCheckAtMs = null;
    this.state = 'stopped';
    this.log('[monitor] stopped');
  }

  /** Runs one check. A call made while a check is in flight joins that check. */
  runCycle(): Promise<CycleReport> {
    if (this.inFlight) return this.inFlight;
    this.inFlight = this.check().finally(() => {
      this.inFlight = null;
      this.state = this.running ? 'idle' : 'stopped';
    });
    return this.inFlight;
  }

  private async runLoop(): Promise<void> {
    while (this.running) {
      const startedAt = this.now();
      try {
        await this.runCycle();
      } catch (e) {
        this.lastError = describeError(e);
        this.log(`[monitor] check failed: ${this.lastError}`);
      }
      if (!this.running) break;

      const next = startedAt + this.opts.intervalMs;
      this.nextCheckAtMs = next;
      this.log(`[monitor] next check at ${this.clock(next)}`);

      this.wake = new AbortController();
      try {
        await sleep(Math.max(0, next - this.now()), undefined, { signal: this.wake.signal });
      } catch (e) {
        if (!(e instanceof Error && e.name === 'AbortError')) throw e;
      } finally {
        this.wake = null;
      }
    }
  }

  private async check(): Promise<CycleReport> {
    this.state = 'checking';
    const report: CycleReport = {
      checkNo: ++this.checks,
      checkedAtMs: this.now(),
      markets: 0,
      fresh: [],
      sent: [],
      skipped: []
    };
    this.log(`[monitor] check #${report.checkNo} at ${this.clock(report.checkedAtMs)}`);

    try {
      let markets: Market[];
      try {
        markets = (await this.opts.markets.fetchActiveMarkets()).map((m) => this.pinStart(m));
      } catch (e) {
        report.aborted = describeError(e);
        this.lastError = report.aborted;
        this.log(`[monitor] market fetch failed, skipping cycle: ${report.aborted}`);
        return report;
      }
      report.markets = markets.length;
      this.log(`[gamma] found ${markets.length} active markets`);

      const fresh = findNewMarkets(markets, this.now(), this.notified, this.opts.window);
      report.fresh = fresh.map((f) => f.market.id);
      if (!fresh.length) {
        this.log('[monitor] no new markets in window');
      }

      for (const { market, elapsedMs } of fresh) {
        this.log(`[monitor] new market ${market.id} running ${(elapsedMs / 60_000).toFixed(1)} min`);
        try {
          await this.alertMarket(market);
          report.sent.push(market.id);
        } catch (e) {
          const reason: SkipReason = e instanceof MonitorError ? e.kind : 'error';
          const message = describeError(e);
          report.skipped.push({ marketId: market.id, reason, message });
          this.lastError = message;
          this.log(`[monitor] skipped ${market.id} (${reason}): ${message}`);
        }
      }
      return report;
    } finally {
      this.lastCycle = report;
    }
  }

  private async alertMarket(market: Market): Promise<void> {
    const price = await this.opts.prices.fetchPrice();
    const prediction = predict(market, price, this.opts.prediction);
    const alert = formatAlert({ market, prediction, price, nowMs: this.now(), display: this.opts.display });
    await this.opts.sink.send(alert.text);
    // only after a successful send: a failed market stays eligible while in window
    this.notified.add(market.id);
    this.log(`[notify] sent ${market.id}: ${prediction.direction} ${prediction.confidence}/100`);
  }

  // First observed start time wins for the lifetime of the process.
  private pinStart(m: Market): Market {
    const now = this.now();
    for (const [id, pin] of this.pinnedStarts) {
      if (pin.closeMs + START_PIN_RETENTION_MS < now) this.pinnedStarts.delete(id);
    }
    const pin = this.pinnedStarts.get(m.id);
    if (!pin) {
      this.pinnedStarts.set(m.id, { startMs: m.startMs, closeMs: m.closeMs });
      return m;
    }
    return pin.startMs === m.startMs ? m : { ...m, startMs: pin.startMs };
  }

  private clock(ms: number) {
    return `${formatClock(ms, this.opts.display.timeZone)} ${this.opts.display.label}`;
  }
}
