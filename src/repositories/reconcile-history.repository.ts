/**
 * ReconcileHistoryRepository
 *
 * Repository pattern for gc_policy.reconcile_history table.
 * Provides audit trail for every apply/release decision.
 */

import type { Queryable } from '../database/client';

export type ReconcileAction = 'apply' | 'noop' | 'drift' | 'release' | 'abandon';

export interface ReconcileHistoryCreate {
  policy_id: string;
  table_ref: string;
  column_family_id: string;
  started_at: Date;
  status: 'running' | 'success' | 'failed';
  dry_run: boolean;
}

export interface ReconcileHistoryComplete {
  action: ReconcileAction | null;
  driftDetected: boolean;
  status: 'success' | 'failed';
  completed_at: Date;
  error_message?: string;
}

interface ReconcileHistoryRow {
  id: string;
}

export class ReconcileHistoryRepository {
  constructor(private db: Queryable) {}

  async create(data: ReconcileHistoryCreate): Promise<string> {
    const query = `
      INSERT INTO gc_policy.reconcile_history
        (policy_id, table_ref, column_family_id, started_at, status, dry_run)
      VALUES ($1, $2, $3, $4, $5, $6)
      RETURNING id
    `;
    const result = await this.db.one<ReconcileHistoryRow>(query, [
      data.policy_id,
      data.table_ref,
      data.column_family_id,
      data.started_at,
      data.status,
      data.dry_run,
    ]);
    return result.id;
  }

  async complete(historyId: string, data: ReconcileHistoryComplete, q: Queryable = this.db): Promise<void> {
    const query = `
      UPDATE gc_policy.reconcile_history
      SET
        action = $2,
        drift_detected = $3,
        status = $4,
        completed_at = $5,
        error_message = $6
      WHERE id = $1
    `;
    await q.none(query, [
      historyId,
      data.action,
      data.driftDetected,
      data.status,
      data.completed_at,
      data.error_message || null,
    ]);
  }
}
