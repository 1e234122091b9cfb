import type { AppConfig } from '../server/lib/config.js';
import { GammaMarketSource } from './gamma_events.js';
import { makeHttpClient } from './http.js';
import { MonitorService } from './monitor.js';
import { windowFromMinutes } from './new_market.js';
import { ConsoleSink, WebhookSink } from './notifier.js';
import { makePriceSource } from './price_feed.js';
import type { MarketDataSource, NotificationSink, PriceDataSource } from './types.js';

export function createMonitor(
  config: AppConfig,
  overrides: {
    markets?: MarketDataSource;
    prices?: PriceDataSource;
    sink?: NotificationSink;
    now?: () => number;
    log?: (line: string) => void;
  } = {}
): MonitorService {
  const http = makeHttpClient({ timeoutMs: config.http.timeoutMs, maxRetries: config.http.retries });

  const markets =
    overrides.markets ??
    new GammaMarketSource({
      http,
      gammaBaseUrl: config.feeds.gammaBaseUrl,
      eventTag: config.feeds.eventTag,
      limit: config.feeds.eventLimit,
      log: overrides.log
    });

  const prices = overrides.prices ?? makePriceSource(config.feeds.priceSource, { http, baseUrl: config.feeds.priceBaseUrl });

  let sink = overrides.sink;
  if (!sink) {
    const url = config.notify.webhookUrl;
    sink = config.mode === 'live' && url
      ? new WebhookSink({ http, url, timeoutMs: config.notify.timeoutMs })
      : new ConsoleSink();
  }

  return new MonitorService({
    markets,
    prices,
    sink,
    intervalMs: config.pollIntervalSec * 1000,
    window: windowFromMinutes(config.window.minMinutes, config.window.maxMinutes),
    prediction: config.prediction,
    display: {
      timeZone: config.display.timeZone,
      label: config.display.label,
      marketBaseUrl: config.feeds.marketBaseUrl
    },
    now: overrides.now,
    log: overrides.log
  });
}
