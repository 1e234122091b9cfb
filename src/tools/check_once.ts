import 'dotenv/config';
import { createMonitor } from '../bot/create_monitor.js';
import { ConsoleSink } from '../bot/notifier.js';
import { loadConfig } from '../server/lib/config.js';

// One check against the live feeds; alerts are printed, never posted.
async function main() {
  const config = loadConfig(process.cwd(), { ...process.env, MODE: 'dry-run' });
  const monitor = createMonitor(config, { sink: new ConsoleSink() });
  const report = await monitor.runCycle();
  console.log(JSON.stringify(report, null, 2));
  process.exitCode = report.aborted ? 1 : 0;
}

main().catch((e) => {
  console.error(e);
  process.exitCode = 1;
});
