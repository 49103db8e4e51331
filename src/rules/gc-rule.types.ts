/**
 * GC Rule and Policy Types
 *
 * Two trees describe a column family's garbage-collection policy:
 *   - Rule: the validated form of the user-authored JSON (`mode`, `rules`,
 *     `max_age`, `max_version`). A composite without a mode wraps one rule.
 *   - Policy: what the column-family store understands. No 1-ary wrappers,
 *     plus `no_gc` for "nothing is collected".
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export type CompositeMode = 'union' | 'intersection';

export interface MaxAgeRule {
  kind: 'max_age';
  /** Whole seconds, never negative */
  seconds: number;
}

export interface MaxVersionsRule {
  kind: 'max_versions';
  count: number;
}

export type LeafRule = MaxAgeRule | MaxVersionsRule;

export interface CompositeRule {
  kind: 'composite';
  /** null when the node only wraps a single rule */
  mode: CompositeMode | null;
  children: Rule[];
}

export type Rule = LeafRule | CompositeRule;

export interface MaxAgePolicy {
  type: 'max_age';
  seconds: number;
}

export interface MaxVersionsPolicy {
  type: 'max_versions';
  count: number;
}

export interface CombinedPolicy {
  type: CompositeMode;
  children: Policy[];
}

export interface NoGcPolicy {
  type: 'no_gc';
}

export type Policy = MaxAgePolicy | MaxVersionsPolicy | CombinedPolicy | NoGcPolicy;

export type DeletionMode = 'default' | 'abandon';

/**
 * Addresses one column family.
 * tableRef format: projects/{project}/instances/{instance}/tables/{table}
 */
export interface ColumnFamilyRef {
  tableRef: string;
  columnFamilyId: string;
}

export interface ColumnFamilyGcConfig extends ColumnFamilyRef {
  policy: Policy;
  deletionMode: DeletionMode;
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isDeletionMode(value: unknown): value is DeletionMode {
  return value === 'default' || value === 'abandon';
}
