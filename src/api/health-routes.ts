/**
 * Health Check Routes
 *
 *   /health        liveness, checks the policy database
 *   /health/ready  readiness, checks the Bigtable admin client can resolve
 *                  its credentials and project
 */

import { Router, Request, Response } from 'express';
import { db } from '../database/client';
import { config } from '../config';

export type StoreReadinessCheck = () => Promise<unknown>;

export function createHealthRoutes(checkStore: StoreReadinessCheck): Router {
  const router = Router();

  router.get('/health', async (req: Request, res: Response) => {
    try {
      await db.none('SELECT 1');

      res.json({
        status: 'healthy',
        service: config.service.name,
        timestamp: new Date().toISOString(),
        checks: {
          database: 'ok',
        },
      });
    } catch (error: unknown) {
      res.status(503).json({
        status: 'unhealthy',
        service: config.service.name,
        timestamp: new Date().toISOString(),
        error: error instanceof Error ? error.message : String(error),
        checks: {
          database: 'failed',
        },
      });
    }
  });

  router.get('/health/ready', async (req: Request, res: Response) => {
    try {
      await checkStore();
      res.json({
        ready: true,
        timestamp: new Date().toISOString(),
        checks: { bigtable: 'ok' },
      });
    } catch (error: unknown) {
      res.status(503).json({
        ready: false,
        timestamp: new Date().toISOString(),
        error: error instanceof Error ? error.message : String(error),
        checks: { bigtable: 'failed' },
      });
    }
  });

  return router;
}
