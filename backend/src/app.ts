import express from 'express';
import cors from 'cors';
import type { Monitor } from './monitor.js';
import type { RequestBudget } from './twelvedata.js';

export function createApp(deps: { monitor: Monitor; budget?: RequestBudget }) {
  const app = express();
  app.use(cors());

  app.get('/api/health', (_req, res) => res.json({ ok: true }));

  app.get('/api/status', (_req, res) => {
    res.json({
      ...deps.monitor.status(),
      requests: deps.budget ? deps.budget.usage() : null,
      at: Date.now(),
    });
  });

  return app;
}
