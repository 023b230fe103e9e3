import express from 'express';
import type { Server } from 'node:http';
import { asyncHandler } from '../middleware/async-handler.js';
import { errorHandler } from '../middleware/error.js';
import { registry } from '../metrics/metrics.js';
import { readinessSvc, type Probes } from '../services/health.service.js';
import { logger } from '../logger.js';

export function buildOpsApp(probes: Probes) {
  const app = express();
  app.disable('x-powered-by');

  app.get('/ops/health/liveness', (_req, res) => res.json({ ok: true }));
  app.get('/ops/health/readiness', asyncHandler(async (_req, res) => {
    const result = await readinessSvc(probes);
    res.status(result.status === 'ready' ? 200 : 503).json(result);
  }));
  app.get('/ops/metrics', asyncHandler(async (_req, res) => {
    res.setHeader('Content-Type', registry.contentType);
    res.end(await registry.metrics());
  }));

  app.use((_req, res) => res.status(404).json({ error: { code: 'NOT_FOUND', message: 'unknown path' } }));
  app.use(errorHandler);
  return app;
}

export function startOpsServer(port: number, probes: Probes): Server {
  return buildOpsApp(probes).listen(port, () => {
    logger.info({ port }, 'ops server listening');
  });
}
