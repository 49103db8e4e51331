/**
 * GC Rule Validation Errors
 *
 * Every grammar violation is a ValidationError subclass carrying a stable
 * `code` and the JSON path of the node that failed (e.g. `rules[1].max_age`).
 * Parsing stops at the first error.
 */

import type { JsonValue } from './gc-rule.types';

export type ValidationErrorCode =
  | 'INVALID_NODE'
  | 'UNKNOWN_KEY'
  | 'CONFLICTING_LEAF_FIELDS'
  | 'MISSING_LEAF_FIELD'
  | 'INVALID_RULE_COUNT'
  | 'INVALID_MODE'
  | 'INVALID_DURATION'
  | 'INVALID_VERSION_COUNT';

export abstract class ValidationError extends Error {
  abstract readonly code: ValidationErrorCode;

  constructor(
    message: string,
    readonly path: string
  ) {
    super(path ? `${path}: ${message}` : message);
    this.name = new.target.name;
  }
}

export class InvalidNodeError extends ValidationError {
  readonly code = 'INVALID_NODE';

  constructor(
    readonly expected: 'object' | 'array',
    path: string
  ) {
    super(`expected a JSON ${expected}`, path);
  }
}

export class UnknownKeyError extends ValidationError {
  readonly code = 'UNKNOWN_KEY';

  constructor(
    readonly key: string,
    path: string
  ) {
    super(`unknown key \`${key}\``, path);
  }
}

export class ConflictingLeafFieldsError extends ValidationError {
  readonly code = 'CONFLICTING_LEAF_FIELDS';

  constructor(path: string) {
    super('a rule can only have one of `max_age` or `max_version`', path);
  }
}

export class MissingLeafFieldError extends ValidationError {
  readonly code = 'MISSING_LEAF_FIELD';

  constructor(path: string) {
    super('need `max_age` or `max_version` for the rule', path);
  }
}

export type ExpectedRuleCount = 'exactly 1' | 'at least 2';

export class InvalidRuleCountError extends ValidationError {
  readonly code = 'INVALID_RULE_COUNT';

  constructor(
    readonly expected: ExpectedRuleCount,
    readonly actual: number,
    path: string
  ) {
    super(
      expected === 'exactly 1'
        ? `when \`mode\` is not specified, \`rules\` must have exactly 1 rule (got ${actual})`
        : `\`rules\` need at least 2 rules when \`mode\` is specified (got ${actual})`,
      path
    );
  }
}

export class InvalidModeError extends ValidationError {
  readonly code = 'INVALID_MODE';

  constructor(
    readonly value: JsonValue,
    path: string
  ) {
    super(`\`mode\` must be either \`union\` or \`intersection\` (got ${JSON.stringify(value)})`, path);
  }
}

export class InvalidDurationError extends ValidationError {
  readonly code = 'INVALID_DURATION';

  constructor(
    readonly value: JsonValue,
    path: string
  ) {
    super(`invalid duration ${JSON.stringify(value)}, expected <integer><s|m|h> such as "168h"`, path);
  }
}

export class InvalidVersionCountError extends ValidationError {
  readonly code = 'INVALID_VERSION_COUNT';

  constructor(
    readonly value: JsonValue,
    path: string
  ) {
    super(`\`max_version\` must be an integer of at least 1 (got ${JSON.stringify(value)})`, path);
  }
}

/**
 * Raised when a policy read from the store has no form in the rule grammar
 * (a combinator with no children, or `no_gc` nested inside a combinator).
 */
export class UnrepresentablePolicyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UnrepresentablePolicyError';
  }
}
