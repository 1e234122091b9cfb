import 'dotenv/config';
import type { Server } from 'node:http';
import { createMonitor } from '../bot/create_monitor.js';
import { ConfigurationError } from '../bot/errors.js';
import { createApp } from './app.js';
import { loadConfig, type AppConfig } from './lib/config.js';

let config: AppConfig;
try {
  config = loadConfig(process.cwd());
} catch (e) {
  if (e instanceof ConfigurationError) {
    console.error(`[config] ${e.message}`);
    process.exit(1);
  }
  throw e;
}

const BUILD = {
  version: process.env.npm_package_version ?? '0.1.0',
  startedAtIso: new Date().toISOString()
};

const monitor = createMonitor(config);

console.log('BTC 15M NEW-MARKET MONITOR');
console.log(`  mode: ${config.mode}`);
console.log(`  check interval: ${config.pollIntervalSec}s`);
console.log(`  window: ${config.window.minMinutes}-${config.window.maxMinutes} min`);
console.log(`  webhook configured: ${config.notify.webhookUrl ? 'yes' : 'no'}`);

let server: Server | null = null;
if (config.ui.enabled) {
  const app = createApp(monitor, BUILD);
  server = app.listen(config.ui.port, config.ui.bind, () => {
    console.log(`Status API: http://${config.ui.bind}:${config.ui.port}/api/status`);
  });
}

monitor.start();

let stopping = false;
async function shutdown(signal: string) {
  if (stopping) return;
  stopping = true;
  console.log(`[monitor] ${signal} received, stopping after the current check`);
  await monitor.stop();
  if (server) await new Promise<void>((resolve) => server?.close(() => resolve()));
  process.exit(0);
}

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));
