import assert from 'node:assert';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { test } from 'node:test';
import { ConfigurationError } from '../../bot/errors.js';
import { applyEnv, loadConfig, parseConfig } from './config.js';

const HOOK = 'https://hooks.example.test/test-webhook';

function tmpDir(configJson?: string) {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'btc15m-config-'));
  if (configJson !== undefined) fs.writeFileSync(path.join(dir, 'config.json'), configJson);
  return dir;
}

function configError(fn: () => unknown): ConfigurationError {
  try {
    fn();
  } catch (e) {
    if (e instanceof ConfigurationError) return e;
    throw e;
  }
  assert.fail('expected a ConfigurationError');
}

test('defaults without config.json', () => {
  const c = loadConfig(tmpDir(), { NOTIFY_WEBHOOK_URL: HOOK });
  assert.equal(c.mode, 'live');
  assert.equal(c.pollIntervalSec, 120);
  assert.deepEqual(c.window, { minMinutes: 0, maxMinutes: 3 });
  assert.equal(c.prediction.minVolume, 1000);
  assert.equal(c.prediction.strongMomentumPct, 2);
  assert.equal(c.prediction.tieBreak, 'UP');
  assert.deepEqual(c.display, { timeZone: 'Asia/Jakarta', label: 'WIB' });
  assert.equal(c.notify.webhookUrl, HOOK);
  assert.equal(c.feeds.eventTag, 'btc-15m');
  assert.equal(c.feeds.priceSource, 'coingecko');
  assert.deepEqual(c.http, { timeoutMs: 10_000, retries: 1 });
});

test('live mode needs a webhook', () => {
  const e = configError(() => loadConfig(tmpDir(), {}));
  assert.deepEqual(e.issues, ['notify.webhookUrl: required in live mode (set NOTIFY_WEBHOOK_URL)']);
  assert.equal(e.kind, 'configuration');
});

test('dry-run runs without a webhook', () => {
  const c = loadConfig(tmpDir(), { MODE: 'dry-run' });
  assert.equal(c.mode, 'dry-run');
  assert.equal(c.notify.webhookUrl, undefined);
});

test('env overrides config.json', () => {
  const dir = tmpDir(JSON.stringify({ pollIntervalSec: 60, prediction: { minVolume: 500, weakMomentumPct: 0.25 } }));
  const c = loadConfig(dir, {
    NOTIFY_WEBHOOK_URL: HOOK,
    MIN_VOLUME: '250',
    MOMENTUM_THRESHOLD: '1.5',
    DISPLAY_TIMEZONE: 'UTC',
    DISPLAY_TZ_LABEL: 'UTC',
    PRICE_SOURCE: 'coinbase'
  });
  assert.equal(c.pollIntervalSec, 60);
  assert.equal(c.prediction.minVolume, 250);
  assert.equal(c.prediction.weakMomentumPct, 0.25);
  assert.equal(c.prediction.strongMomentumPct, 1.5);
  assert.deepEqual(c.display, { timeZone: 'UTC', label: 'UTC' });
  assert.equal(c.feeds.priceSource, 'coinbase');
});

test('invalid values fail fast', () => {
  const badInterval = configError(() => loadConfig(tmpDir(), { NOTIFY_WEBHOOK_URL: HOOK, POLL_INTERVAL_SEC: 'soon' }));
  assert.equal(badInterval.issues.length, 1);
  assert.ok(badInterval.issues[0]?.startsWith('pollIntervalSec:'));

  const badZone = configError(() => loadConfig(tmpDir(), { NOTIFY_WEBHOOK_URL: HOOK, DISPLAY_TIMEZONE: 'Mars/Olympus' }));
  assert.deepEqual(badZone.issues, ['display.timeZone: unknown time zone']);

  const badWindow = configError(() =>
    parseConfig(applyEnv({ window: { minMinutes: 5, maxMinutes: 3 } }, { NOTIFY_WEBHOOK_URL: HOOK }))
  );
  assert.deepEqual(badWindow.issues, ['window: window.minMinutes must be <= window.maxMinutes']);

  const noCap = configError(() =>
    parseConfig(applyEnv({ prediction: { lowVolumeConfidenceCap: 100 } }, { NOTIFY_WEBHOOK_URL: HOOK }))
  );
  assert.equal(noCap.issues.length, 1);
  assert.ok(noCap.issues[0]?.startsWith('prediction.lowVolumeConfidenceCap:'));

  const badHook = configError(() => loadConfig(tmpDir(), { NOTIFY_WEBHOOK_URL: 'not a url' }));
  assert.ok(badHook.issues[0]?.startsWith('notify.webhookUrl:'));
});

test('broken config.json is a configuration error', () => {
  const e = configError(() => loadConfig(tmpDir('{ nope'), { NOTIFY_WEBHOOK_URL: HOOK }));
  assert.match(e.message, /^config.json is not valid JSON/);

  const arr = configError(() => loadConfig(tmpDir('[]'), { NOTIFY_WEBHOOK_URL: HOOK }));
  assert.equal(arr.message, 'config.json must contain an object');
});
