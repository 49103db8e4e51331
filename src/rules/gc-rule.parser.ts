/**
 * GC Rule Parser
 *
 * Decodes the JSON rule tree into a validated Rule.
 *
 * Grammar (applied at every node):
 *   - has `rules`   -> composite: keys {mode, rules}; no mode means exactly
 *                      1 rule, `union`/`intersection` means at least 2
 *   - otherwise     -> leaf: exactly one of {max_age, max_version}
 *
 * Example:
 *   {"mode":"union","rules":[{"max_age":"168h"},{"max_version":10}]}
 */

import { parseDuration } from './duration';
import {
  ConflictingLeafFieldsError,
  InvalidDurationError,
  InvalidModeError,
  InvalidNodeError,
  InvalidRuleCountError,
  InvalidVersionCountError,
  MissingLeafFieldError,
  UnknownKeyError,
} from './gc-rule.errors';
import type { CompositeMode, CompositeRule, JsonObject, JsonValue, LeafRule, Rule } from './gc-rule.types';
import { isJsonObject } from './gc-rule.types';

const COMPOSITE_KEYS: ReadonlySet<string> = new Set(['mode', 'rules']);
const LEAF_KEYS: ReadonlySet<string> = new Set(['max_age', 'max_version']);

const MAX_VERSION_COUNT = 2_147_483_647;

/**
 * Parses and validates a rule tree, throwing the first ValidationError found.
 *
 * @param isTopLevel - false for nested rules; kept for parity with the
 *   schema validators, it does not change what the grammar accepts
 */
export function parseRule(raw: JsonValue, isTopLevel = true): Rule {
  return parseNode(raw, isTopLevel, '');
}

function parseNode(raw: JsonValue, isTopLevel: boolean, path: string): Rule {
  if (!isJsonObject(raw)) {
    throw new InvalidNodeError('object', path);
  }

  if ('rules' in raw) {
    return parseComposite(raw, isTopLevel, path);
  }
  return parseLeaf(raw, path);
}

function parseComposite(node: JsonObject, isTopLevel: boolean, path: string): CompositeRule {
  rejectUnknownKeys(node, COMPOSITE_KEYS, path);

  const rules = node.rules;
  const rulesPath = join(path, 'rules');
  if (!Array.isArray(rules)) {
    throw new InvalidNodeError('array', rulesPath);
  }

  const mode = 'mode' in node ? parseMode(node.mode, join(path, 'mode')) : null;

  if (mode === null && rules.length !== 1) {
    throw new InvalidRuleCountError('exactly 1', rules.length, rulesPath);
  }
  if (mode !== null && rules.length < 2) {
    throw new InvalidRuleCountError('at least 2', rules.length, rulesPath);
  }

  const children = rules.map((child, index) => parseNode(child, false, `${rulesPath}[${index}]`));

  return { kind: 'composite', mode, children };
}

function parseMode(value: JsonValue, path: string): CompositeMode {
  if (typeof value === 'string') {
    const mode = value.toLowerCase();
    if (mode === 'union' || mode === 'intersection') {
      return mode;
    }
  }
  throw new InvalidModeError(value, path);
}

function parseLeaf(node: JsonObject, path: string): LeafRule {
  rejectUnknownKeys(node, LEAF_KEYS, path);

  const hasMaxAge = 'max_age' in node;
  const hasMaxVersion = 'max_version' in node;

  if (hasMaxAge && hasMaxVersion) {
    throw new ConflictingLeafFieldsError(path);
  }
  if (hasMaxAge) {
    return { kind: 'max_age', seconds: parseMaxAge(node.max_age, join(path, 'max_age')) };
  }
  if (hasMaxVersion) {
    return { kind: 'max_versions', count: parseMaxVersion(node.max_version, join(path, 'max_version')) };
  }
  throw new MissingLeafFieldError(path);
}

function parseMaxAge(value: JsonValue, path: string): number {
  const seconds = typeof value === 'string' ? parseDuration(value) : null;
  if (seconds === null) {
    throw new InvalidDurationError(value, path);
  }
  return seconds;
}

function parseMaxVersion(value: JsonValue, path: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1 || value > MAX_VERSION_COUNT) {
    throw new InvalidVersionCountError(value, path);
  }
  return value;
}

function rejectUnknownKeys(node: JsonObject, allowed: ReadonlySet<string>, path: string): void {
  for (const key of Object.keys(node)) {
    if (!allowed.has(key)) {
      throw new UnknownKeyError(key, path);
    }
  }
}

function join(path: string, key: string): string {
  return path ? `${path}.${key}` : key;
}
