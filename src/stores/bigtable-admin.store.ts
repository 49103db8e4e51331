/**
 * BigtableAdminStore
 *
 * GcPolicyStore backed by the Bigtable table admin API
 * (`v2.BigtableTableAdminClient` from @google-cloud/bigtable).
 *
 * Read: GetTable (SCHEMA_VIEW) -> column family -> gcRule
 * Write: ModifyColumnFamilies with an `update` modification carrying the gcRule
 *
 * GcRule mapping:
 *   max_age       <-> { maxAge: { seconds, nanos } }
 *   max_versions  <-> { maxNumVersions }
 *   union         <-> { union: { rules } }
 *   intersection  <-> { intersection: { rules } }
 *   no_gc         <-> {}
 *
 * Calls go out with `retry: null` so the client library does not retry.
 */

import { logger } from '../config/logger';
import type { ColumnFamilyRef, Policy } from '../rules/gc-rule.types';
import { NO_GC_POLICY } from '../rules/gc-policy.compiler';
import type {
  ColumnFamilyPolicy,
  GcPolicyStore,
  StoreCallOptions,
  StoreErrorCode,
} from './gc-policy-store.interface';
import { StoreError } from './gc-policy-store.interface';
import { assertColumnFamilyId, parseTableRef } from './table-ref';

/** GcRule message as sent to the admin API */
export interface GcRuleInput {
  maxNumVersions?: number;
  maxAge?: { seconds: number; nanos: number };
  union?: { rules: GcRuleInput[] };
  intersection?: { rules: GcRuleInput[] };
}

/** GcRule message as returned by the admin API; int64 seconds may be a Long or string */
export interface GcRuleMessage {
  maxNumVersions?: number | null;
  maxAge?: { seconds?: number | string | { toString(): string } | null; nanos?: number | null } | null;
  union?: { rules?: GcRuleMessage[] | null } | null;
  intersection?: { rules?: GcRuleMessage[] | null } | null;
}

export interface AdminTable {
  name?: string | null;
  columnFamilies?: { [columnFamilyId: string]: { gcRule?: GcRuleMessage | null } } | null;
}

export interface AdminCallOptions {
  timeout?: number;
  retry?: null;
}

/** gax returns a promise that can cancel the underlying RPC */
export type CancellableCall<T> = Promise<T> & { cancel?(): void };

/** The part of v2.BigtableTableAdminClient this store calls */
export interface TableAdminClient {
  getTable(
    request: { name: string; view: 'SCHEMA_VIEW' },
    options?: AdminCallOptions
  ): CancellableCall<[AdminTable, ...unknown[]]>;
  modifyColumnFamilies(
    request: { name: string; modifications: Array<{ id: string; update: { gcRule: GcRuleInput } }> },
    options?: AdminCallOptions
  ): CancellableCall<[AdminTable, ...unknown[]]>;
}

const NANOS_PER_SECOND = 1_000_000_000;

// google.rpc.Code
const GRPC_STATUS_CODES: Record<number, StoreErrorCode> = {
  1: 'CANCELLED',
  3: 'INVALID_ARGUMENT',
  4: 'DEADLINE_EXCEEDED',
  5: 'NOT_FOUND',
  7: 'PERMISSION_DENIED',
  9: 'FAILED_PRECONDITION',
  14: 'UNAVAILABLE',
};

export class BigtableAdminStore implements GcPolicyStore {
  readonly name = 'BigtableAdminStore';

  constructor(
    private adminClient: TableAdminClient,
    private defaultTimeoutMs?: number
  ) {}

  async setGcPolicy(target: ColumnFamilyRef, policy: Policy, options: StoreCallOptions = {}): Promise<Policy> {
    parseTableRef(target.tableRef);
    assertColumnFamilyId(target.columnFamilyId);

    logger.debug('BigtableAdminStore: Modifying column family GC rule', {
      table: target.tableRef,
      column_family: target.columnFamilyId,
      policy_type: policy.type,
    });

    const [table] = await this.call('modifyColumnFamilies', options, (callOptions) =>
      this.adminClient.modifyColumnFamilies(
        {
          name: target.tableRef,
          modifications: [{ id: target.columnFamilyId, update: { gcRule: toGcRule(policy) } }],
        },
        callOptions
      )
    );

    const gcRule = table.columnFamilies?.[target.columnFamilyId]?.gcRule;
    return gcRule ? fromGcRule(gcRule) : policy;
  }

  async getGcPolicy(target: ColumnFamilyRef, options: StoreCallOptions = {}): Promise<Policy | null> {
    parseTableRef(target.tableRef);
    assertColumnFamilyId(target.columnFamilyId);

    const table = await this.getTable(target.tableRef, options);
    const family = table.columnFamilies?.[target.columnFamilyId];
    if (!family) {
      throw new StoreError('NOT_FOUND', `Column family ${target.columnFamilyId} not found`);
    }

    const policy = family.gcRule ? fromGcRule(family.gcRule) : NO_GC_POLICY;
    return policy.type === 'no_gc' ? null : policy;
  }

  async listGcPolicies(tableRef: string, options: StoreCallOptions = {}): Promise<ColumnFamilyPolicy[]> {
    parseTableRef(tableRef);

    const table = await this.getTable(tableRef, options);
    const policies: ColumnFamilyPolicy[] = [];

    for (const [columnFamilyId, family] of Object.entries(table.columnFamilies ?? {})) {
      const policy = family.gcRule ? fromGcRule(family.gcRule) : NO_GC_POLICY;
      if (policy.type !== 'no_gc') {
        policies.push({ columnFamilyId, policy });
      }
    }

    return policies.sort((a, b) => a.columnFamilyId.localeCompare(b.columnFamilyId));
  }

  private async getTable(tableRef: string, options: StoreCallOptions): Promise<AdminTable> {
    const [table] = await this.call('getTable', options, (callOptions) =>
      this.adminClient.getTable({ name: tableRef, view: 'SCHEMA_VIEW' }, callOptions)
    );
    return table;
  }

  private async call<T>(
    method: string,
    options: StoreCallOptions,
    invoke: (callOptions: AdminCallOptions) => CancellableCall<T>
  ): Promise<T> {
    const { signal } = options;
    if (signal?.aborted) {
      throw new StoreError('CANCELLED', `${method} cancelled before it was sent`, { cause: signal.reason });
    }

    const timeout = options.timeoutMs ?? this.defaultTimeoutMs;
    const pending = invoke({ retry: null, ...(timeout === undefined ? {} : { timeout }) });
    const request = pending.catch(
      (error: unknown) => {
        throw toStoreError(method, error);
      }
    );

    if (!signal) {
      return request;
    }

    return new Promise<T>((resolve, reject) => {
      const onAbort = () => {
        // Cancels the RPC itself, not just the wait
        pending.cancel?.();
        reject(new StoreError('CANCELLED', `${method} cancelled`, { cause: signal.reason }));
      };
      signal.addEventListener('abort', onAbort, { once: true });
      request.then(
        (value) => {
          signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }
}

export function toGcRule(policy: Policy): GcRuleInput {
  switch (policy.type) {
    case 'no_gc':
      return {};
    case 'max_age':
      return { maxAge: { seconds: policy.seconds, nanos: 0 } };
    case 'max_versions':
      return { maxNumVersions: policy.count };
    case 'union':
      return { union: { rules: policy.children.map(toGcRule) } };
    case 'intersection':
      return { intersection: { rules: policy.children.map(toGcRule) } };
  }
}

export function fromGcRule(rule: GcRuleMessage): Policy {
  if (rule.union) {
    return { type: 'union', children: (rule.union.rules ?? []).map(fromGcRule) };
  }
  if (rule.intersection) {
    return { type: 'intersection', children: (rule.intersection.rules ?? []).map(fromGcRule) };
  }
  if (rule.maxAge) {
    return { type: 'max_age', seconds: durationToSeconds(rule.maxAge) };
  }
  if (typeof rule.maxNumVersions === 'number' && rule.maxNumVersions > 0) {
    return { type: 'max_versions', count: rule.maxNumVersions };
  }
  return NO_GC_POLICY;
}

function durationToSeconds(duration: NonNullable<GcRuleMessage['maxAge']>): number {
  const seconds = duration.seconds == null ? 0 : Number(duration.seconds.toString());
  const nanos = duration.nanos ?? 0;
  // Rule grammar only has whole seconds
  return nanos > 0 ? seconds + Math.ceil(nanos / NANOS_PER_SECOND) : seconds;
}

function toStoreError(method: string, error: unknown): StoreError {
  if (error instanceof StoreError) {
    return error;
  }
  const grpcCode = typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined;
  const code = typeof grpcCode === 'number' ? (GRPC_STATUS_CODES[grpcCode] ?? 'UNKNOWN') : 'UNKNOWN';
  const message = error instanceof Error ? error.message : String(error);
  return new StoreError(code, `${method} failed: ${message}`, { cause: error });
}
