import assert from 'node:assert';
import { test } from 'node:test';
import { classifyMarket, findNewMarkets, isNewMarket, windowFromMinutes } from './new_market.js';
import type { Market } from './types.js';

const NOW = Date.parse('2026-03-01T12:00:00Z');
const MIN = 60_000;

function market(id: string, startedMinutesAgo: number, patch: Partial<Market> = {}): Market {
  const startMs = NOW - startedMinutesAgo * MIN;
  return {
    id,
    title: 'Bitcoin Up or Down',
    startMs,
    closeMs: startMs + 15 * MIN,
    yesOdds: 0.5,
    noOdds: 0.5,
    volume: 2000,
    status: 'active',
    ...patch
  };
}

test('markets 0 to 3 minutes old are new, bounds included', () => {
  for (const minutes of [0, 0.5, 1, 2, 2.99, 3]) {
    assert.equal(isNewMarket(market('m', minutes), NOW, new Set()), true, `${minutes} min`);
  }
});

test('markets outside the window are not new', () => {
  assert.equal(classifyMarket(market('m', 3 + 1 / 60_000), NOW, new Set()).reason, 'too-old');
  assert.equal(classifyMarket(market('m', 5), NOW, new Set()).reason, 'too-old');
  assert.equal(classifyMarket(market('m', -1), NOW, new Set()).reason, 'not-started');
});

test('already notified markets are excluded whatever their age', () => {
  const notified = new Set(['m']);
  const c = classifyMarket(market('m', 1), NOW, notified);
  assert.deepEqual(c, { isNew: false, elapsedMs: MIN, reason: 'notified' });
});

test('closed markets are excluded', () => {
  assert.equal(classifyMarket(market('m', 1, { status: 'closed' }), NOW, new Set()).reason, 'closed');
});

test('findNewMarkets keeps order and reports elapsed time', () => {
  const markets = [market('a', 1), market('b', 5), market('c', 2), market('d', 0)];
  const out = findNewMarkets(markets, NOW, new Set(['d']));
  assert.deepEqual(
    out.map((f) => [f.market.id, f.elapsedMs]),
    [
      ['a', MIN],
      ['c', 2 * MIN]
    ]
  );
});

test('custom window', () => {
  const w = windowFromMinutes(1, 5);
  assert.equal(isNewMarket(market('m', 0.5), NOW, new Set(), w), false);
  assert.equal(isNewMarket(market('m', 4), NOW, new Set(), w), true);
});
