/**
 * GC Policy Service
 *
 * Main entry point for the column family GC policy service.
 *
 * Responsibilities:
 *   - Expose health, metrics and GC policy endpoints
 *   - Reconcile managed column families on startup (cron job mode)
 *   - Graceful shutdown
 */

import express from 'express';
import { v2 } from '@google-cloud/bigtable';
import { config } from './config';
import { logger } from './config/logger';
import { db } from './database/client';
import { createHealthRoutes } from './api/health-routes';
import { metricsRoutes } from './api/metrics-routes';
import { createGcPolicyRoutes } from './api/gc-policy-routes';
import { GcPolicyManager } from './services/gc-policy-manager';
import { GcPolicyReconciler } from './services/gc-policy-reconciler';
import { ColumnFamilyPolicyRepository } from './repositories/column-family-policy.repository';
import { ReconcileHistoryRepository } from './repositories/reconcile-history.repository';
import { BigtableAdminStore } from './stores/bigtable-admin.store';

const app = express();

// Required behind a proxy / load balancer
app.set('trust proxy', true);

// Middleware
app.use(express.json());

// Store and manager
const adminClient = new v2.BigtableTableAdminClient({
  projectId: config.bigtable.projectId,
  keyFilename: config.bigtable.keyFilename,
  ...(config.bigtable.apiEndpoint ? { apiEndpoint: config.bigtable.apiEndpoint } : {}),
});
const store = new BigtableAdminStore(adminClient, config.store.timeoutMs);
const manager = new GcPolicyManager(store);

// Repositories
const policyRepo = new ColumnFamilyPolicyRepository(db);
const historyRepo = new ReconcileHistoryRepository(db);
const reconciler = new GcPolicyReconciler(policyRepo, historyRepo, db, manager, {
  timeoutMs: config.store.timeoutMs,
});

// Routes
app.use(createHealthRoutes(() => adminClient.getProjectId()));
app.use(metricsRoutes);
app.use(createGcPolicyRoutes(manager, policyRepo, config.store.timeoutMs));

// Main execution function
async function executeReconcile() {
  const dryRun = process.env.DRY_RUN === 'true';

  logger.info('GC Policy Service: Starting reconciliation', {
    dryRun,
    nodeEnv: config.nodeEnv,
  });

  try {
    const summary = await reconciler.reconcileAll(dryRun);
    logger.info('GC Policy Service: Reconciliation complete', { ...summary });
  } catch (error: unknown) {
    logger.error('GC Policy Service: Reconciliation failed', {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exit(1);
  }
}

// Start server
const server = app.listen(config.port, async () => {
  logger.info(`GC Policy Service: Server started on port ${config.port}`);

  // Reconcile on startup (cron job mode)
  if (process.env.RUN_ON_STARTUP !== 'false') {
    await executeReconcile();

    // Exit after completion if not in continuous mode
    if (process.env.CONTINUOUS_MODE !== 'true') {
      logger.info('GC Policy Service: Exiting after reconciliation (cron job mode)');
      process.exit(0);
    }
  }
});

// Graceful shutdown
process.on('SIGTERM', () => {
  logger.info('GC Policy Service: SIGTERM received, shutting down gracefully');
  server.close(() => {
    Promise.all([db.close(), adminClient.close()])
      .then(() => {
        logger.info('GC Policy Service: Server closed');
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error('GC Policy Service: Shutdown failed', {
          error: error instanceof Error ? error.message : String(error),
        });
        process.exit(1);
      });
  });
});

export { app };
