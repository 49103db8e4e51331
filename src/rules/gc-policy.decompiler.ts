/**
 * GC Policy Decompiler
 *
 * Maps a Policy (usually one read back from the store) onto the canonical
 * rule JSON, which parseRule() accepts:
 *   - no_gc                     -> undefined (no rule configured)
 *   - max_age / max_versions    -> {"max_age": "168h"} / {"max_version": 10}
 *   - 1-child union/intersection -> {"rules": [child]}
 *   - otherwise                 -> {"mode": ..., "rules": [...]}
 *
 * compilePolicy(parseRule(decompilePolicy(p))) equals p for every p that
 * compilePolicy can produce.
 */

import { formatDuration } from './duration';
import { compilePolicy } from './gc-policy.compiler';
import { UnrepresentablePolicyError } from './gc-rule.errors';
import type { JsonObject, Policy } from './gc-rule.types';
import { parseRule } from './gc-rule.parser';

export function decompilePolicy(policy: Policy): JsonObject | undefined {
  if (policy.type === 'no_gc') {
    return undefined;
  }
  return toRuleJson(policy);
}

function toRuleJson(policy: Policy): JsonObject {
  switch (policy.type) {
    case 'max_age':
      return { max_age: formatDuration(policy.seconds) };
    case 'max_versions':
      return { max_version: policy.count };
    case 'union':
    case 'intersection': {
      if (policy.children.length === 0) {
        throw new UnrepresentablePolicyError(`${policy.type} policy has no child rules`);
      }
      const rules = policy.children.map((child) => toRuleJson(child));
      return rules.length === 1 ? { rules } : { mode: policy.type, rules };
    }
    case 'no_gc':
      throw new UnrepresentablePolicyError('no_gc cannot be nested inside a union or intersection');
  }
}

/**
 * The policy the canonical JSON compiles back to. 1-ary combinators collapse
 * into their child; everything else is unchanged.
 */
export function canonicalizePolicy(policy: Policy): Policy {
  const json = decompilePolicy(policy);
  return compilePolicy(json === undefined ? undefined : parseRule(json));
}
