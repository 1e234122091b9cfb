import { PLACEHOLDER, fmtMinutes, fmtOdds, fmtSignedPct, fmtUsd, isNum } from './format.js';
import type { Market, Prediction, PricePoint } from './types.js';

export type DisplayOptions = {
  // IANA zone, e.g. Asia/Jakarta
  timeZone: string;
  // suffix printed after clock times, e.g. WIB
  label: string;
  marketBaseUrl: string;
};

export type Alert = {
  marketId: string;
  url: string;
  title: string;
  lines: string[];
  text: string;
};

export function marketUrl(marketBaseUrl: string, marketId: string): string {
  return `${marketBaseUrl.replace(/\/+$/, '')}/${encodeURIComponent(marketId)}`;
}

export function formatClock(ms: number, timeZone: string, withSeconds = true): string {
  if (!isNum(ms)) return PLACEHOLDER;
  const fmt = new Intl.DateTimeFormat('en-GB', {
    timeZone,
    hour: '2-digit',
    minute: '2-digit',
    ...(withSeconds ? { second: '2-digit' as const } : {}),
    hourCycle: 'h23'
  });
  return fmt.format(new Date(ms));
}

function arrow(direction: Prediction['direction']) {
  return direction === 'UP' ? '📈' : '📉';
}

export function formatAlert(input: {
  market: Market;
  prediction: Prediction;
  price: PricePoint;
  nowMs: number;
  display: DisplayOptions;
}): Alert {
  const { market, prediction, price, nowMs, display } = input;
  const tz = display.timeZone;
  const at = (ms: number, withSeconds: boolean) => {
    const clock = formatClock(ms, tz, withSeconds);
    return clock === PLACEHOLDER ? clock : `${clock} ${display.label}`;
  };

  const url = marketUrl(display.marketBaseUrl, market.id);
  const remainingMs = isNum(market.closeMs) ? Math.max(0, market.closeMs - nowMs) : NaN;
  const runningMs = isNum(market.startMs) ? nowMs - market.startMs : NaN;
  const btcArrow = isNum(price.change24hPct) ? ' ' + (price.change24hPct > 0 ? '📈' : '📉') : '';

  const title = '🔔 NEW BTC 15M MARKET STARTED';
  const lines = [
    title,
    `⏰ Started at: ${at(market.startMs, true)}`,
    `🔗 ${url}`,
    '',
    `📊 Prediction: ${prediction.direction} ${arrow(prediction.direction)} (confidence ${prediction.confidence}/100, ${prediction.confidenceLabel})`,
    '',
    '💡 Analysis:',
    ...(prediction.rationale ? prediction.rationale.split('\n') : [PLACEHOLDER]),
    '',
    '💰 Market conditions:',
    `- BTC: ${fmtUsd(price.price)} (${fmtSignedPct(price.change24hPct)} 24h)${btcArrow}`,
    `- Odds: ${fmtOdds(market.yesOdds)} UP / ${fmtOdds(market.noOdds)} DOWN`,
    `- Volume: ${fmtUsd(market.volume)}`,
    '',
    '⏱️ Timing:',
    `- Started: ${at(market.startMs, false)}`,
    `- Closes: ${at(market.closeMs, false)}`,
    `- Time to close: ${fmtMinutes(remainingMs)}`,
    `- Running: ${fmtMinutes(runningMs)}`
  ];
  if (prediction.volumeTier === 'critical') {
    lines.push('', '⚠️ CRITICAL WARNING: Very low volume - extremely high risk!');
  } else if (prediction.risk) {
    lines.push('', '⚠️ WARNING: Low volume - high risk!');
  }

  return { marketId: market.id, url, title, lines, text: lines.join('\n') };
}
