import { ConfigurationError, RetryExhaustedError } from '../types/errors.js';
import { isErr } from '../types/result.js';
import type { FuzzingRule, ValueGenerator, ValueSupplier } from '../rules/fuzzing-rule.js';
import { fromGenerator } from '../rules/fuzzing-rule.js';
import { describeValue } from '../util/describe.js';
import { DEFAULT_MAX_ATTEMPTS } from '../fuzzer/options.js';
import { EqualityPolicy } from './equality-policy.js';

/**
 * Wraps value generators so they never hand back the property's current
 * value.
 *
 * Generators with a small output space (a two-value enum, a boolean) collide
 * with the current value often, so each wrapped call retries up to
 * `maxAttempts` times and then throws RetryExhaustedError.
 */
export class DifferentValueGenerator {
  constructor(
    readonly maxAttempts: number = DEFAULT_MAX_ATTEMPTS,
    readonly policy: EqualityPolicy = new EqualityPolicy()
  ) {
    if (!Number.isInteger(maxAttempts) || maxAttempts <= 0) {
      throw new ConfigurationError({
        message: `maxAttempts must be a positive integer, got ${maxAttempts}`,
        context: { value: maxAttempts },
      });
    }
  }

  wrap<T>(generator: ValueGenerator<T>): ValueGenerator<T> {
    const { maxAttempts, policy } = this;
    return function differentValue(context) {
      const currentValue = context.currentValue();
      for (let attempt = 0; attempt < maxAttempts; attempt++) {
        const candidate = generator(context);
        const equality = policy.resolve(currentValue, candidate);
        if (isErr(equality)) {
          throw equality.error;
        }
        if (!equality.value(currentValue, candidate)) {
          return candidate;
        }
      }
      throw new RetryExhaustedError({
        message:
          `Bailing out after failing to come up with a value different from ` +
          `${describeValue(currentValue)} for ${context.property.toString()} in ${maxAttempts} attempts`,
        attempts: maxAttempts,
        context: {
          property: context.property.toString(),
          value: currentValue,
        },
      });
    };
  }

  /**
   * Adapter for helpers that register suppliers, e.g.
   * `randomizer.setupDefaultRules(fuzzer, generator.differentValues())`.
   */
  differentValues(): <T>(supplier: ValueSupplier<T>) => ValueGenerator<T> {
    return <T>(supplier: ValueSupplier<T>): ValueGenerator<T> =>
      this.wrap(() => supplier());
  }

  rule<T>(generator: ValueGenerator<T>): FuzzingRule {
    return fromGenerator(this.wrap(generator));
  }
}
