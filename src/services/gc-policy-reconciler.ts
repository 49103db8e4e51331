/**
 * GcPolicyReconciler
 *
 * Reconciles every managed column family against the live store.
 *
 * Responsibilities:
 *   - Load managed column family records
 *   - present: detect drift, apply the configured rules when drifted
 *   - absent: release the policy (or abandon it) and mark the record released
 *   - Record reconcile history (audit trail)
 *   - Create outbox events for downstream consumers
 *   - Keep going when one column family fails
 *
 * History completion, record update and outbox event share one transaction
 * (transactional outbox pattern).
 */

import { v4 as uuidv4 } from 'uuid';
import { logger } from '../config/logger';
import type { Database } from '../database/client';
import type {
  ColumnFamilyPolicyRecord,
  ColumnFamilyPolicyRepository,
} from '../repositories/column-family-policy.repository';
import type { ReconcileAction, ReconcileHistoryRepository } from '../repositories/reconcile-history.repository';
import { decompilePolicy } from '../rules/gc-policy.decompiler';
import type { ColumnFamilyRef, JsonObject } from '../rules/gc-rule.types';
import type { StoreCallOptions } from '../stores/gc-policy-store.interface';
import type { GcPolicyManager } from './gc-policy-manager';
import { reconcileCounter } from './reconcile-metrics';

export interface ReconcileOutcome {
  action: ReconcileAction;
  driftDetected: boolean;
  /** Canonical rules now expected on the family, undefined for no policy */
  gcRules?: JsonObject;
}

export interface ReconcileSummary {
  processed: number;
  failed: number;
}

export class GcPolicyReconciler {
  constructor(
    private policyRepo: ColumnFamilyPolicyRepository,
    private historyRepo: ReconcileHistoryRepository,
    private db: Database,
    private manager: GcPolicyManager,
    private storeOptions: StoreCallOptions = {}
  ) {}

  async reconcileAll(dryRun: boolean): Promise<ReconcileSummary> {
    const records = await this.policyRepo.findManaged();

    logger.info('GcPolicyReconciler: Starting reconciliation', {
      recordsCount: records.length,
      dryRun,
    });

    let failed = 0;
    for (const record of records) {
      const succeeded = await this.reconcileRecord(record, dryRun);
      if (!succeeded) {
        failed++;
      }
    }

    logger.info('GcPolicyReconciler: Reconciliation complete', {
      recordsProcessed: records.length,
      recordsFailed: failed,
    });

    return { processed: records.length, failed };
  }

  private async reconcileRecord(record: ColumnFamilyPolicyRecord, dryRun: boolean): Promise<boolean> {
    const target: ColumnFamilyRef = {
      tableRef: record.table_ref,
      columnFamilyId: record.column_family_id,
    };

    let historyId: string | undefined;

    try {
      historyId = await this.historyRepo.create({
        policy_id: record.id,
        table_ref: record.table_ref,
        column_family_id: record.column_family_id,
        started_at: new Date(),
        status: 'running',
        dry_run: dryRun,
      });
      const startedHistoryId = historyId;

      const outcome =
        record.desired_state === 'absent'
          ? await this.release(record, target, dryRun)
          : await this.converge(record, target, dryRun);

      logger.info('GcPolicyReconciler: Column family reconciled', {
        policy_id: record.id,
        table: record.table_ref,
        column_family: record.column_family_id,
        action: outcome.action,
        driftDetected: outcome.driftDetected,
        dryRun,
      });

      await this.db.tx(async (t) => {
        const completedAt = new Date();

        await this.historyRepo.complete(
          startedHistoryId,
          {
            action: outcome.action,
            driftDetected: outcome.driftDetected,
            status: 'success',
            completed_at: completedAt,
          },
          t
        );

        if (dryRun || outcome.action === 'noop') {
          return;
        }

        if (outcome.action === 'apply') {
          await this.policyRepo.updateLastApplied(record.id, completedAt, t);
        } else {
          await this.policyRepo.markReleased(record.id, completedAt, t);
        }

        // Transactional outbox
        await t.none(
          `
          INSERT INTO gc_policy.outbox
            (aggregate_id, aggregate_type, event_type, payload, correlation_id)
          VALUES ($1, $2, $3, $4, $5)
        `,
          [
            record.id,
            'ColumnFamilyGcPolicy',
            outcome.action === 'apply' ? 'gc_policy.applied' : 'gc_policy.released',
            JSON.stringify({
              policy_id: record.id,
              table_ref: record.table_ref,
              column_family_id: record.column_family_id,
              action: outcome.action,
              deletion_mode: record.deletion_mode,
              gc_rules: outcome.gcRules ?? null,
              completed_at: completedAt.toISOString(),
            }),
            uuidv4(),
          ]
        );
      });

      reconcileCounter.inc({ action: outcome.action, status: 'success' });
      return true;
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);

      logger.error('GcPolicyReconciler: Column family failed', {
        policy_id: record.id,
        table: record.table_ref,
        column_family: record.column_family_id,
        error: message,
        stack: error instanceof Error ? error.stack : undefined,
      });

      if (historyId !== undefined) {
        await this.failHistory(record, historyId, message);
      }

      reconcileCounter.inc({ action: record.desired_state === 'absent' ? 'release' : 'apply', status: 'failed' });
      return false;
    }
  }

  private async failHistory(record: ColumnFamilyPolicyRecord, historyId: string, message: string): Promise<void> {
    try {
      await this.historyRepo.complete(historyId, {
        action: null,
        driftDetected: false,
        status: 'failed',
        completed_at: new Date(),
        error_message: message,
      });
    } catch (error: unknown) {
      logger.error('GcPolicyReconciler: Failed to record failure in history', {
        policy_id: record.id,
        history_id: historyId,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async converge(
    record: ColumnFamilyPolicyRecord,
    target: ColumnFamilyRef,
    dryRun: boolean
  ): Promise<ReconcileOutcome> {
    const rawRule = record.gc_rules ?? undefined;
    const drift = await this.manager.detectDrift(target, rawRule, this.storeOptions);
    const gcRules = decompilePolicy(drift.desired);

    if (!drift.drifted) {
      return { action: 'noop', driftDetected: false, gcRules };
    }
    if (dryRun) {
      return { action: 'drift', driftDetected: true, gcRules };
    }

    const applied = await this.manager.apply(target, rawRule, record.deletion_mode, this.storeOptions);
    return { action: 'apply', driftDetected: true, gcRules: decompilePolicy(applied) };
  }

  private async release(
    record: ColumnFamilyPolicyRecord,
    target: ColumnFamilyRef,
    dryRun: boolean
  ): Promise<ReconcileOutcome> {
    if (dryRun) {
      // Pending release, nothing touched
      return { action: 'drift', driftDetected: true };
    }

    const action: ReconcileAction = record.deletion_mode === 'abandon' ? 'abandon' : 'release';
    await this.manager.release(target, record.deletion_mode, this.storeOptions);
    return { action, driftDetected: false };
  }
}
