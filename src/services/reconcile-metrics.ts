/**
 * Prometheus metrics for GC policy reconciliation.
 * Registered on the default prom-client registry served at /metrics.
 */

import { Counter } from 'prom-client';

export const reconcileCounter = new Counter({
  name: 'gc_policy_reconcile_total',
  help: 'Column family GC policy reconciliations by action and status',
  labelNames: ['action', 'status'] as const,
});
