/**
 * GC Policy Compiler
 *
 * Maps a validated Rule onto the Policy applied to the column family.
 * A composite without a mode compiles to its only child, so the output never
 * contains a 1-ary union or intersection.
 */

import type { Policy, Rule } from './gc-rule.types';

export const NO_GC_POLICY: Policy = Object.freeze({ type: 'no_gc' });

export function compilePolicy(rule: Rule | null | undefined): Policy {
  if (!rule) {
    return NO_GC_POLICY;
  }

  switch (rule.kind) {
    case 'max_age':
      return { type: 'max_age', seconds: rule.seconds };
    case 'max_versions':
      return { type: 'max_versions', count: rule.count };
    case 'composite':
      if (rule.mode === null) {
        return compilePolicy(rule.children[0]);
      }
      return { type: rule.mode, children: rule.children.map((child) => compilePolicy(child)) };
  }
}

/**
 * Structural equality of two policy trees. Child order is significant.
 */
export function policiesEqual(a: Policy, b: Policy): boolean {
  switch (a.type) {
    case 'no_gc':
      return b.type === 'no_gc';
    case 'max_age':
      return b.type === 'max_age' && a.seconds === b.seconds;
    case 'max_versions':
      return b.type === 'max_versions' && a.count === b.count;
    case 'union':
    case 'intersection':
      return (
        (b.type === 'union' || b.type === 'intersection') &&
        b.type === a.type &&
        a.children.length === b.children.length &&
        a.children.every((child, index) => policiesEqual(child, b.children[index]))
      );
  }
}
