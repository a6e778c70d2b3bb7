import { describe, it, expect, vi } from 'vitest';
import fc from 'fast-check';

import { PassContext } from '../../fuzzer/context.js';
import { Fuzzer } from '../../fuzzer/fuzzer.js';
import { DEFAULT_MAX_ATTEMPTS } from '../../fuzzer/options.js';
import { FieldProperty } from '../../property/property.js';
import {
  ConfigurationError,
  EqualityConflictError,
  RetryExhaustedError,
} from '../../types/errors.js';
import { DifferentValueGenerator } from '../different-value-generator.js';
import { EqualityPolicy, type EqualityPredicate } from '../equality-policy.js';

class Slot {
  value: unknown = 0;
}

class Base {}
class Derived extends Base {}

const valueProperty = new FieldProperty(Slot, 'value', Object);

function contextFor(target: Slot): PassContext {
  const fuzzer = new Fuzzer({ trace: () => {} });
  return new PassContext(fuzzer, target, true).bind(valueProperty);
}

describe('DifferentValueGenerator', () => {
  it('defaults to ten attempts', () => {
    expect(new DifferentValueGenerator().maxAttempts).toBe(DEFAULT_MAX_ATTEMPTS);
    expect(DEFAULT_MAX_ATTEMPTS).toBe(10);
  });

  it('rejects non-positive attempt limits', () => {
    expect(() => new DifferentValueGenerator(0)).toThrow(ConfigurationError);
    expect(() => new DifferentValueGenerator(1.5)).toThrow(
      'maxAttempts must be a positive integer, got 1.5'
    );
  });

  it('returns the first candidate that differs from the current value', () => {
    const target = new Slot();
    target.value = 7;
    const candidates = [7, 7, 8, 9];
    const generator = vi.fn(() => candidates.shift());

    const value = new DifferentValueGenerator().wrap(generator)(contextFor(target));

    expect(value).toBe(8);
    expect(generator).toHaveBeenCalledTimes(3);
  });

  it('gives up after exactly maxAttempts equal candidates', () => {
    const target = new Slot();
    target.value = 5;
    const generator = vi.fn(() => 5);
    const wrapped = new DifferentValueGenerator(3).wrap(generator);

    let thrown: unknown;
    try {
      wrapped(contextFor(target));
    } catch (error) {
      thrown = error;
    }

    expect(generator).toHaveBeenCalledTimes(3);
    expect(thrown).toBeInstanceOf(RetryExhaustedError);
    expect(thrown instanceof RetryExhaustedError ? thrown.attempts : 0).toBe(3);
    expect(thrown instanceof Error ? thrown.message : '').toBe(
      "Bailing out after failing to come up with a value different from 5 for Field 'value' with type Object of Slot in 3 attempts"
    );
  });

  it('accepts the first candidate when the current value is absent', () => {
    const target = new Slot();
    target.value = null;
    const generator = vi.fn(() => 1);

    expect(new DifferentValueGenerator().wrap(generator)(contextFor(target))).toBe(1);
    expect(generator).toHaveBeenCalledTimes(1);
  });

  it('compares with the policy rule for the value type', () => {
    const target = new Slot();
    target.value = 'abc';
    const sameLength: EqualityPredicate = (a, b) =>
      typeof a === 'string' && typeof b === 'string' && a.length === b.length;
    const policy = new EqualityPolicy().addEqualityRule(String, sameLength);
    const candidates = ['xyz', 'abcd'];

    const value = new DifferentValueGenerator(2, policy).wrap(() => candidates.shift())(
      contextFor(target)
    );

    expect(value).toBe('abcd');
  });

  it('propagates equality conflicts', () => {
    const target = new Slot();
    target.value = new Base();
    const policy = new EqualityPolicy().addEqualityRule(Base, () => false);

    const wrapped = new DifferentValueGenerator(DEFAULT_MAX_ATTEMPTS, policy).wrap(
      () => new Derived()
    );

    expect(() => wrapped(contextFor(target))).toThrow(EqualityConflictError);
  });

  it('never repeats the current value over many alternating draws', () => {
    const target = new Slot();
    let draws = 0;
    const coin = (): boolean => draws++ % 3 === 0;
    const rule = new DifferentValueGenerator().rule(coin);
    target.value = false;
    const context = contextFor(target);
    let collisions = 0;

    for (let i = 0; i < 10_000; i++) {
      const before = target.value;
      rule(context, (value) => {
        target.value = value;
      });
      if (target.value === before) {
        collisions++;
      }
    }

    expect(collisions).toBe(0);
  });

  it('returns the first differing candidate for arbitrary sequences', () => {
    fc.assert(
      fc.property(
        fc.integer(),
        fc.array(fc.integer(), { minLength: 1, maxLength: 10 }),
        (current, candidates) => {
          const target = new Slot();
          target.value = current;
          const queue = [...candidates];
          const expected = candidates.find((c) => !Object.is(c, current));
          const wrapped = new DifferentValueGenerator(candidates.length).wrap(() =>
            queue.shift()
          );

          if (expected === undefined) {
            expect(() => wrapped(contextFor(target))).toThrow(RetryExhaustedError);
          } else {
            expect(wrapped(contextFor(target))).toBe(expected);
          }
        }
      )
    );
  });

  it('adapts suppliers through differentValues()', () => {
    const target = new Slot();
    target.value = 1;
    const values = [1, 2];
    const wrap = new DifferentValueGenerator().differentValues();

    expect(wrap(() => values.shift())(contextFor(target))).toBe(2);
  });

  it('names the rules it builds', () => {
    expect(new DifferentValueGenerator().rule(() => 1).name).toBe(
      'fromGenerator(differentValue)'
    );
  });
});
