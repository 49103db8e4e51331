/**
 * ColumnFamilyPolicyRepository
 *
 * Repository pattern for gc_policy.column_family_policies table.
 * One row per managed column family: the desired GC rules (as authored JSON)
 * and how the policy is released.
 */

import type { Queryable } from '../database/client';
import type { DeletionMode, JsonValue } from '../rules/gc-rule.types';

export type DesiredState = 'present' | 'absent';

export interface ColumnFamilyPolicyRecord {
  id: string;
  table_ref: string;
  column_family_id: string;
  gc_rules: JsonValue | null;
  deletion_mode: DeletionMode;
  desired_state: DesiredState;
  enabled: boolean;
  last_applied_at: Date | null;
  released_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

export interface AppliedColumnFamilyPolicy {
  table_ref: string;
  column_family_id: string;
  gc_rules: JsonValue | null;
  deletion_mode: DeletionMode;
}

export class ColumnFamilyPolicyRepository {
  constructor(private db: Queryable) {}

  /**
   * Enabled records that have not been released yet
   */
  async findManaged(): Promise<ColumnFamilyPolicyRecord[]> {
    const query = `
      SELECT *
      FROM gc_policy.column_family_policies
      WHERE enabled = true AND released_at IS NULL
      ORDER BY table_ref, column_family_id
    `;
    return await this.db.any<ColumnFamilyPolicyRecord>(query);
  }

  async findByFamily(tableRef: string, columnFamilyId: string): Promise<ColumnFamilyPolicyRecord | null> {
    const query = `
      SELECT *
      FROM gc_policy.column_family_policies
      WHERE table_ref = $1 AND column_family_id = $2
    `;
    return await this.db.oneOrNone<ColumnFamilyPolicyRecord>(query, [tableRef, columnFamilyId]);
  }

  /**
   * Records a policy applied outside the reconciler (HTTP PUT), so the
   * reconciler manages it and a later release honors its deletion mode
   */
  async upsertApplied(data: AppliedColumnFamilyPolicy, timestamp: Date): Promise<ColumnFamilyPolicyRecord> {
    const query = `
      INSERT INTO gc_policy.column_family_policies
        (table_ref, column_family_id, gc_rules, deletion_mode, desired_state, last_applied_at)
      VALUES ($1, $2, $3, $4, 'present', $5)
      ON CONFLICT (table_ref, column_family_id) DO UPDATE
      SET
        gc_rules = EXCLUDED.gc_rules,
        deletion_mode = EXCLUDED.deletion_mode,
        desired_state = 'present',
        last_applied_at = EXCLUDED.last_applied_at,
        released_at = NULL,
        updated_at = NOW()
      RETURNING *
    `;
    return await this.db.one<ColumnFamilyPolicyRecord>(query, [
      data.table_ref,
      data.column_family_id,
      data.gc_rules === null ? null : JSON.stringify(data.gc_rules),
      data.deletion_mode,
      timestamp,
    ]);
  }

  async updateLastApplied(policyId: string, timestamp: Date, q: Queryable = this.db): Promise<void> {
    const query = `
      UPDATE gc_policy.column_family_policies
      SET last_applied_at = $2, updated_at = NOW()
      WHERE id = $1
    `;
    await q.none(query, [policyId, timestamp]);
  }

  async markReleased(policyId: string, timestamp: Date, q: Queryable = this.db): Promise<void> {
    const query = `
      UPDATE gc_policy.column_family_policies
      SET released_at = $2, updated_at = NOW()
      WHERE id = $1
    `;
    await q.none(query, [policyId, timestamp]);
  }
}
