/**
 * GcPolicyManager
 *
 * Service layer for a single column family's GC policy.
 *
 * Responsibilities:
 *   - apply: validate -> compile -> store.setGcPolicy
 *   - read: store.getGcPolicy -> decompile to canonical rule JSON
 *   - release: reset the policy to no_gc, or leave it untouched (abandon)
 *   - list and drift detection for the reconciler and the HTTP API
 *
 * Validation always finishes before the first store call, so an invalid rule
 * never leaves a partially applied policy behind.
 */

import { logger } from '../config/logger';
import { canonicalizePolicy, decompilePolicy } from '../rules/gc-policy.decompiler';
import { compilePolicy, NO_GC_POLICY, policiesEqual } from '../rules/gc-policy.compiler';
import { parseRule } from '../rules/gc-rule.parser';
import type {
  ColumnFamilyGcConfig,
  ColumnFamilyRef,
  DeletionMode,
  JsonObject,
  JsonValue,
  Policy,
} from '../rules/gc-rule.types';
import type { GcPolicyStore, StoreCallOptions } from '../stores/gc-policy-store.interface';
import { isStoreError } from '../stores/gc-policy-store.interface';

export interface ColumnFamilyGcRules {
  columnFamilyId: string;
  gcRules: JsonObject;
}

export interface DriftReport {
  drifted: boolean;
  desired: Policy;
  live: Policy;
}

export class GcPolicyManager {
  constructor(private store: GcPolicyStore) {}

  /**
   * Validates and compiles `rawRule`, then writes it to the store.
   * An absent rule applies no_gc.
   */
  async apply(
    target: ColumnFamilyRef,
    rawRule: JsonValue | undefined,
    deletionMode: DeletionMode,
    options?: StoreCallOptions
  ): Promise<Policy> {
    const config: ColumnFamilyGcConfig = {
      ...target,
      policy: toPolicy(rawRule),
      deletionMode,
    };

    logger.info('GcPolicyManager: Applying GC policy', {
      table: config.tableRef,
      column_family: config.columnFamilyId,
      policy_type: config.policy.type,
      deletion_mode: config.deletionMode,
    });

    return this.store.setGcPolicy(target, config.policy, options);
  }

  /**
   * Canonical rule JSON of the live policy, undefined when the family has none.
   */
  async read(target: ColumnFamilyRef, options?: StoreCallOptions): Promise<JsonObject | undefined> {
    const policy = await this.readPolicy(target, options);
    return decompilePolicy(policy);
  }

  async release(target: ColumnFamilyRef, deletionMode: DeletionMode, options?: StoreCallOptions): Promise<void> {
    if (deletionMode === 'abandon') {
      logger.warn('GcPolicyManager: Abandoning GC policy, live policy left unchanged', {
        table: target.tableRef,
        column_family: target.columnFamilyId,
      });
      return;
    }

    logger.info('GcPolicyManager: Releasing GC policy', {
      table: target.tableRef,
      column_family: target.columnFamilyId,
    });

    await this.store.setGcPolicy(target, NO_GC_POLICY, options);
  }

  async list(tableRef: string, options?: StoreCallOptions): Promise<ColumnFamilyGcRules[]> {
    const policies = await this.store.listGcPolicies(tableRef, options);
    const result: ColumnFamilyGcRules[] = [];

    for (const { columnFamilyId, policy } of policies) {
      const gcRules = decompilePolicy(policy);
      if (gcRules) {
        result.push({ columnFamilyId, gcRules });
      }
    }

    return result;
  }

  /**
   * Compares the configured rule with the live policy after canonicalization,
   * so key order, "60m" vs "1h" and single-rule wrappers are not drift.
   */
  async detectDrift(
    target: ColumnFamilyRef,
    rawRule: JsonValue | undefined,
    options?: StoreCallOptions
  ): Promise<DriftReport> {
    const desired = toPolicy(rawRule);
    const live = await this.readPolicy(target, options);

    return {
      drifted: !policiesEqual(canonicalizePolicy(desired), canonicalizePolicy(live)),
      desired,
      live,
    };
  }

  private async readPolicy(target: ColumnFamilyRef, options?: StoreCallOptions): Promise<Policy> {
    try {
      return (await this.store.getGcPolicy(target, options)) ?? NO_GC_POLICY;
    } catch (error: unknown) {
      if (isStoreError(error, 'NOT_FOUND')) {
        logger.debug('GcPolicyManager: No GC policy found', {
          table: target.tableRef,
          column_family: target.columnFamilyId,
          reason: error.message,
        });
        return NO_GC_POLICY;
      }
      throw error;
    }
  }
}

function toPolicy(rawRule: JsonValue | undefined): Policy {
  return compilePolicy(rawRule === undefined || rawRule === null ? undefined : parseRule(rawRule));
}
