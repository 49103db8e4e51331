/**
 * Metrics Routes
 *
 * Prometheus scrape endpoint: process metrics plus the reconcile counters.
 */

import { Router, Request, Response } from 'express';
import { collectDefaultMetrics, register } from 'prom-client';
import '../services/reconcile-metrics';

collectDefaultMetrics({ prefix: 'gc_policy_service_' });

const router = Router();

router.get('/metrics', async (req: Request, res: Response) => {
  res.set('Content-Type', register.contentType);
  res.end(await register.metrics());
});

export { router as metricsRoutes };
