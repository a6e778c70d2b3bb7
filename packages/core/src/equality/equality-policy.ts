/**
 * Equality policy used by the "generate a different value" guarantee.
 *
 * Not every class has a meaningful notion of equality, so rules can be
 * registered per runtime type. Comparing instances of two related classes
 * whose rules differ is treated as a configuration error instead of guessing.
 */

import { ErrorCode } from '../errors/codes.js';
import {
  ConfigurationError,
  EqualityConflictError,
} from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import {
  isAssignableFrom,
  runtimeTypeOf,
  typeName,
  type RuntimeType,
} from '../types/type-token.js';
import { describeRule } from '../util/describe.js';

export type EqualityPredicate = (a: unknown, b: unknown) => boolean;

export const ALWAYS_FALSE: EqualityPredicate = function alwaysFalse() {
  return false;
};

interface Equatable {
  equals(other: unknown): unknown;
}

function isEquatable(value: unknown): value is Equatable {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'equals') === 'function'
  );
}

/**
 * Default value equality: `Object.is` for primitives and identical
 * references, timestamps for dates, `equals(other)` for objects that define
 * one; identity otherwise.
 */
export const valueEquals: EqualityPredicate = function valueEquals(a, b) {
  if (Object.is(a, b)) {
    return true;
  }
  if (a instanceof Date && b instanceof Date) {
    return Object.is(a.getTime(), b.getTime());
  }
  if (isEquatable(a)) {
    return a.equals(b) === true;
  }
  return false;
};

export class EqualityPolicy {
  private readonly rules = new Map<RuntimeType, EqualityPredicate>();
  private defaultRule: EqualityPredicate = valueEquals;

  /**
   * Registers the equality rule for a runtime type; a second rule for the same
   * type is rejected.
   */
  addEqualityRule(type: RuntimeType, rule: EqualityPredicate): this {
    const existing = this.rules.get(type);
    if (existing) {
      throw new ConfigurationError({
        message: `There already is an equality rule configured for ${typeName(type)}: ${describeRule(existing)}`,
        errorCode: ErrorCode.DUPLICATE_REGISTRATION,
        context: { type: typeName(type) },
      });
    }
    this.rules.set(type, rule);
    return this;
  }

  setEqualityRule(type: RuntimeType, rule: EqualityPredicate): this {
    this.rules.set(type, rule);
    return this;
  }

  setDefaultEqualityRule(rule: EqualityPredicate): this {
    this.defaultRule = rule;
    return this;
  }

  getDefaultEqualityRule(): EqualityPredicate {
    return this.defaultRule;
  }

  /**
   * Picks the predicate for comparing `a` with `b`.
   */
  resolve(a: unknown, b: unknown): Result<EqualityPredicate, EqualityConflictError> {
    const typeA = runtimeTypeOf(a);
    const typeB = runtimeTypeOf(b);
    // absent values never count as equal, so a value is always produced
    if (!typeA || !typeB) {
      return ok(ALWAYS_FALSE);
    }
    const ruleA = this.rules.get(typeA);
    if (typeA === typeB) {
      return ok(ruleA ?? this.defaultRule);
    }
    const ruleB = this.rules.get(typeB);
    if (ruleA === ruleB) {
      return ok(ruleA ?? this.defaultRule);
    }
    if (isAssignableFrom(typeA, typeB) || isAssignableFrom(typeB, typeA)) {
      return err(
        new EqualityConflictError({
          message:
            `Attempting equality check between instances of ${typeName(typeA)} and ${typeName(typeB)} ` +
            'where one class is a subclass of the other; register the same equality rule instance for both classes',
          context: { left: typeName(typeA), right: typeName(typeB) },
        })
      );
    }
    return ok(ALWAYS_FALSE);
  }
}
