/**
 * Table and column family identifiers.
 *
 * Table refs use the admin API resource name:
 *   projects/{project}/instances/{instance}/tables/{table}
 */

import { StoreError } from './gc-policy-store.interface';

export const TABLE_REF_PATTERN =
  /^projects\/([a-z][-a-z0-9]*[a-z0-9])\/instances\/([a-z][-a-z0-9]*[a-z0-9])\/tables\/([_a-zA-Z0-9][-_.a-zA-Z0-9]*)$/;

export const COLUMN_FAMILY_ID_PATTERN = /^[_a-zA-Z0-9][-_.a-zA-Z0-9]{0,63}$/;

export interface TableName {
  project: string;
  instance: string;
  table: string;
}

export function formatTableRef({ project, instance, table }: TableName): string {
  return `projects/${project}/instances/${instance}/tables/${table}`;
}

export function parseTableRef(tableRef: string): TableName {
  const match = TABLE_REF_PATTERN.exec(tableRef);
  if (!match) {
    throw new StoreError(
      'INVALID_ARGUMENT',
      `Invalid argument table (${tableRef}), must match \`${TABLE_REF_PATTERN.source}\``
    );
  }
  const [, project, instance, table] = match;
  return { project, instance, table };
}

export function assertColumnFamilyId(columnFamilyId: string): void {
  if (!COLUMN_FAMILY_ID_PATTERN.test(columnFamilyId)) {
    throw new StoreError(
      'INVALID_ARGUMENT',
      `Invalid argument column_family_id (${columnFamilyId}), must match \`${COLUMN_FAMILY_ID_PATTERN.source}\``
    );
  }
}
