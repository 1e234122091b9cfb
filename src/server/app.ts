import express from 'express';
import type { MonitorService } from '../bot/monitor.js';

export function createApp(monitor: MonitorService, build: { version: string; startedAtIso: string }) {
  const app = express();
  app.use(express.json());

  app.get('/api/build', (_req, res) => {
    res.json(build);
  });

  app.get('/api/status', (_req, res) => {
    res.json(monitor.getStatus());
  });

  app.get('/api/notified', (_req, res) => {
    res.json({ items: monitor.getNotified() });
  });

  app.post('/api/monitor/start', (_req, res) => {
    monitor.start();
    res.json({ ok: true });
  });

  app.post('/api/monitor/stop', async (_req, res) => {
    await monitor.stop();
    res.json({ ok: true });
  });

  return app;
}
