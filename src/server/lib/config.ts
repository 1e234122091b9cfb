import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '../../bot/errors.js';

function isTimeZone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

const ConfigSchema = z
  .object({
    mode: z.enum(['dry-run', 'live']).default('live'),
    pollIntervalSec: z.number().int().positive().default(120),
    window: z
      .object({
        minMinutes: z.number().min(0).default(0),
        maxMinutes: z.number().positive().max(15).default(3)
      })
      .default({})
      .refine((w) => w.minMinutes <= w.maxMinutes, { message: 'window.minMinutes must be <= window.maxMinutes' }),
    prediction: z
      .object({
        minVolume: z.number().nonnegative().default(1000),
        criticalVolume: z.number().nonnegative().default(100),
        strongMomentumPct: z.number().positive().default(2),
        weakMomentumPct: z.number().positive().default(0.5),
        strongMomentumWeight: z.number().nonnegative().default(2),
        weakMomentumWeight: z.number().nonnegative().default(1),
        sentimentWeight: z.number().nonnegative().default(1),
        sentimentSaturation: z.number().positive().max(1).default(0.1),
        // below 100 so a low-volume prediction never reads as full confidence
        lowVolumeConfidenceCap: z.number().min(0).max(99).default(40),
        agreementBonus: z.number().min(0).max(100).default(10),
        disagreementPenalty: z.number().min(0).max(100).default(15),
        tieBreak: z.enum(['UP', 'DOWN']).default('UP')
      })
      .default({})
      .refine((p) => p.weakMomentumPct <= p.strongMomentumPct, {
        message: 'prediction.weakMomentumPct must be <= prediction.strongMomentumPct'
      }),
    display: z
      .object({
        timeZone: z.string().default('Asia/Jakarta').refine(isTimeZone, { message: 'unknown time zone' }),
        label: z.string().min(1).default('WIB')
      })
      .default({}),
    notify: z
      .object({
        webhookUrl: z.string().url().optional(),
        timeoutMs: z.number().int().positive().default(10_000)
      })
      .default({}),
    feeds: z
      .object({
        gammaBaseUrl: z.string().url().default('https://gamma-api.polymarket.com'),
        eventTag: z.string().min(1).default('btc-15m'),
        eventLimit: z.number().int().positive().max(500).default(50),
        marketBaseUrl: z.string().url().default('https://polymarket.com/event'),
        priceSource: z.enum(['coingecko', 'coinbase']).default('coingecko'),
        priceBaseUrl: z.string().url().optional()
      })
      .default({}),
    http: z
      .object({
        timeoutMs: z.number().int().positive().default(10_000),
        retries: z.number().int().min(0).max(3).default(1)
      })
      .default({}),
    ui: z
      .object({
        enabled: z.boolean().default(true),
        port: z.number().int().nonnegative().default(3190),
        bind: z.string().default('127.0.0.1')
      })
      .default({})
  })
  .superRefine((c, ctx) => {
    if (c.mode === 'live' && !c.notify.webhookUrl) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['notify', 'webhookUrl'],
        message: 'required in live mode (set NOTIFY_WEBHOOK_URL)'
      });
    }
  });

export type AppConfig = z.infer<typeof ConfigSchema>;

type Env = Record<string, string | undefined>;

function envNumber(v: string | undefined): number | string | undefined {
  if (v === undefined || v.trim() === '') return undefined;
  const n = Number(v);
  // leave garbage as a string so the schema reports it
  return Number.isFinite(n) ? n : v;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function section(base: Record<string, unknown>, key: string): Record<string, unknown> {
  const v = base[key];
  return isRecord(v) ? { ...v } : {};
}

function setIfDefined(target: Record<string, unknown>, key: string, value: unknown) {
  if (value !== undefined && value !== '') target[key] = value;
}

/** Env wins over config.json. Only the documented keys are read. */
export function applyEnv(file: Record<string, unknown>, env: Env): Record<string, unknown> {
  const out: Record<string, unknown> = { ...file };
  const window = section(out, 'window');
  const prediction = section(out, 'prediction');
  const display = section(out, 'display');
  const notify = section(out, 'notify');
  const feeds = section(out, 'feeds');
  const ui = section(out, 'ui');

  setIfDefined(out, 'mode', env.MODE);
  setIfDefined(out, 'pollIntervalSec', envNumber(env.POLL_INTERVAL_SEC));
  setIfDefined(window, 'minMinutes', envNumber(env.WINDOW_MIN_MINUTES));
  setIfDefined(window, 'maxMinutes', envNumber(env.WINDOW_MAX_MINUTES));
  setIfDefined(prediction, 'minVolume', envNumber(env.MIN_VOLUME));
  setIfDefined(prediction, 'strongMomentumPct', envNumber(env.MOMENTUM_THRESHOLD));
  setIfDefined(display, 'timeZone', env.DISPLAY_TIMEZONE);
  setIfDefined(display, 'label', env.DISPLAY_TZ_LABEL);
  setIfDefined(notify, 'webhookUrl', env.NOTIFY_WEBHOOK_URL);
  setIfDefined(feeds, 'priceSource', env.PRICE_SOURCE);
  setIfDefined(ui, 'port', envNumber(env.PORT));

  return { ...out, window, prediction, display, notify, feeds, ui };
}

export function parseConfig(raw: unknown): AppConfig {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigurationError(`invalid configuration: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

export function loadConfig(cwd: string, env: Env = process.env): AppConfig {
  const configPath = path.join(cwd, 'config.json');
  let file: Record<string, unknown> = {};
  if (fs.existsSync(configPath)) {
    let json: unknown;
    try {
      json = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    } catch (e) {
      throw new ConfigurationError(`config.json is not valid JSON: ${String(e)}`);
    }
    if (!isRecord(json)) throw new ConfigurationError('config.json must contain an object');
    file = json;
  }
  return parseConfig(applyEnv(file, env));
}
