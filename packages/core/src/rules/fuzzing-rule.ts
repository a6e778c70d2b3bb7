/**
 * Fuzzing rules: functions that produce a value for one property and commit
 * it through the setter (by convention at most once).
 */

import type { FuzzContext } from '../fuzzer/context.js';

export type PropertySetter = (value: unknown) => void;

export type FuzzingRule = (context: FuzzContext, setter: PropertySetter) => void;

/** Produces a value without looking at the context */
export type ValueSupplier<T = unknown> = () => T;

/** Produces a value, possibly based on the current one */
export type ValueGenerator<T = unknown> = (context: FuzzContext) => T;

/**
 * Leaves the property untouched.
 */
export const NOP_RULE: FuzzingRule = function nop() {};

function named<F extends FuzzingRule>(rule: F, name: string): F {
  return Object.defineProperty(rule, 'name', { value: name });
}

/**
 * Rule that assigns whatever the supplier returns.
 */
export function fromSupplier<T>(supplier: ValueSupplier<T>): FuzzingRule {
  return named(
    (_context, setter) => setter(supplier()),
    `fromSupplier(${supplier.name || 'anonymous'})`
  );
}

/**
 * Rule that assigns the value a context-aware generator returns.
 */
export function fromGenerator<T>(generator: ValueGenerator<T>): FuzzingRule {
  return named(
    (context, setter) => setter(generator(context)),
    `fromGenerator(${generator.name || 'anonymous'})`
  );
}
