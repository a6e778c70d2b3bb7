import type { FuzzContext } from '../fuzzer/context.js';
import { ResolutionError, type FuzzError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import { typeName } from '../types/type-token.js';
import type { FuzzingRule } from './fuzzing-rule.js';

/**
 * Picks the rule for the property a context is bound to.
 *
 * A miss is reported as `Err(ResolutionError)` (code RULE_NOT_FOUND) so that
 * decorating resolvers can try their own strategy; the fuzzer throws whatever
 * error the outermost resolver returns.
 */
export interface RuleResolver {
  resolve(context: FuzzContext): Result<FuzzingRule, FuzzError>;
}

/**
 * Two-tier lookup: exact (declaring class, name) match first, then the
 * property's declared type.
 */
export class DefaultRuleResolver implements RuleResolver {
  resolve(context: FuzzContext): Result<FuzzingRule, FuzzError> {
    const { fuzzer, property } = context;
    const rule =
      fuzzer.getPropertyRule(property.declaringClass, property.name) ??
      fuzzer.getTypeRule(property.type);
    if (rule) {
      return ok(rule);
    }
    return err(
      new ResolutionError({
        message: `Found no fuzzing rule for ${property.toString()}`,
        context: {
          property: property.toString(),
          type: typeName(property.type),
        },
      })
    );
  }
}

export const DEFAULT_RULE_RESOLVER: RuleResolver = new DefaultRuleResolver();
