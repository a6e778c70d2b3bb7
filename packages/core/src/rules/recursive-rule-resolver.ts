import { ErrorCode } from '../errors/codes.js';
import type { FuzzContext } from '../fuzzer/context.js';
import type { FuzzError } from '../types/errors.js';
import { isOk, ok, type Result } from '../types/result.js';
import type { FuzzingRule } from './fuzzing-rule.js';
import {
  ConstructorInstanceFactory,
  isInstantiableType,
  type Factory,
  type InstanceFactory,
} from './instance-factory.js';
import type { RuleResolver } from './rule-resolver.js';

/**
 * Decorates another resolver: when it finds no rule for a property whose
 * declared type is an ordinary class, the property gets a fresh instance of
 * that class, itself fuzzed with the same fuzzer.
 *
 * Nested passes reuse the current `includeInherited` setting. There is no
 * cycle detection; self-referential classes need a rule of their own.
 */
export class RecursiveRuleResolver implements RuleResolver {
  constructor(
    private readonly inner: RuleResolver,
    private readonly factory: InstanceFactory = new ConstructorInstanceFactory()
  ) {}

  resolve(context: FuzzContext): Result<FuzzingRule, FuzzError> {
    const result = this.inner.resolve(context);
    if (isOk(result) || result.error.errorCode !== ErrorCode.RULE_NOT_FOUND) {
      return result;
    }
    const { type } = context.property;
    if (!isInstantiableType(type)) {
      return result;
    }
    const create = this.factory.factoryFor(type);
    return create ? ok(instantiateAndFuzz(create)) : result;
  }

  get delegate(): RuleResolver {
    return this.inner;
  }
}

function instantiateAndFuzz(create: Factory): FuzzingRule {
  return function instantiateAndFuzz(context, setter) {
    const instance = create();
    context.fuzzer.fuzz(instance, context.includeInherited);
    setter(instance);
  };
}
