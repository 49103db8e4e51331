/**
 * GC Policy Store Interface
 *
 * Contract for the column-family store that holds the live GC policies.
 * Implementations must not retry: retry and backoff belong to the caller.
 */

import type { ColumnFamilyRef, Policy } from '../rules/gc-rule.types';

export interface StoreCallOptions {
  /** Aborting rejects the pending call with a CANCELLED StoreError */
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface ColumnFamilyPolicy {
  columnFamilyId: string;
  policy: Policy;
}

export interface GcPolicyStore {
  /** Replaces the family's policy and returns the policy the store now holds */
  setGcPolicy(target: ColumnFamilyRef, policy: Policy, options?: StoreCallOptions): Promise<Policy>;

  /** null when the family has no GC policy */
  getGcPolicy(target: ColumnFamilyRef, options?: StoreCallOptions): Promise<Policy | null>;

  /** Families of the table that have a GC policy */
  listGcPolicies(tableRef: string, options?: StoreCallOptions): Promise<ColumnFamilyPolicy[]>;
}

export type StoreErrorCode =
  | 'INVALID_ARGUMENT'
  | 'NOT_FOUND'
  | 'PERMISSION_DENIED'
  | 'FAILED_PRECONDITION'
  | 'UNAVAILABLE'
  | 'DEADLINE_EXCEEDED'
  | 'CANCELLED'
  | 'UNKNOWN';

export class StoreError extends Error {
  constructor(
    readonly code: StoreErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'StoreError';
  }
}

export function isStoreError(error: unknown, code?: StoreErrorCode): error is StoreError {
  return error instanceof StoreError && (code === undefined || error.code === code);
}
