/**
 * The Fuzzer assigns new values to the properties of an object according to
 * registered rules.
 *
 * A pass asks the property resolver for the target's properties, asks the
 * rule resolver for a rule per property, and lets each rule commit a value
 * through a setter. Rules are looked up by exact property first and by
 * declared type second.
 *
 * Instances are not thread-safe and passes are not transactional: when a
 * rule fails, properties assigned before it keep their new values.
 */

import { ErrorCode } from '../errors/codes.js';
import { resolveProperty, type PropertyResolver } from '../property/property-resolver.js';
import type { FuzzingRule } from '../rules/fuzzing-rule.js';
import type { RuleResolver } from '../rules/rule-resolver.js';
import { PropertyRuleTable, TypeRuleTable } from '../rules/rule-tables.js';
import { ConfigurationError } from '../types/errors.js';
import { isErr } from '../types/result.js';
import {
  runtimeTypeOf,
  typeName,
  type RuntimeType,
  type TypeToken,
} from '../types/type-token.js';
import { formatTrace, type TraceSink } from '../util/debug.js';
import { describeRule } from '../util/describe.js';
import { PassContext } from './context.js';
import { resolveFuzzerOptions, type FuzzerOptions } from './options.js';

export class Fuzzer {
  private readonly typeRules = new TypeRuleTable();
  private readonly propertyRules = new PropertyRuleTable();

  private propertyResolver: PropertyResolver;
  private ruleResolver: RuleResolver;
  private debug: boolean;
  private readonly trace: TraceSink;
  private readonly includeInheritedByDefault: boolean;

  constructor(options: FuzzerOptions = {}) {
    const resolved = resolveFuzzerOptions(options);
    this.propertyResolver = resolved.propertyResolver;
    this.ruleResolver = resolved.ruleResolver;
    this.debug = resolved.debug;
    this.trace = resolved.trace;
    this.includeInheritedByDefault = resolved.includeInherited;
  }

  /**
   * Assigns new values to every property the property resolver reports for
   * the target's class.
   *
   * @param includeInherited whether superclass properties are assigned too
   *   (defaults to the `includeInherited` option)
   * @returns the same target, for chaining
   */
  fuzz<T extends object>(target: T, includeInherited?: boolean): T {
    requirePresent(target, 'target');
    const type = runtimeTypeOf(target) ?? Object;
    const inherited = includeInherited ?? this.includeInheritedByDefault;
    if (this.debug) {
      this.trace(formatTrace(`Randomizing object ${typeName(type)}`));
    }

    const context = new PassContext(this, target, inherited);
    for (const property of this.propertyResolver.resolve(type, inherited)) {
      if (this.debug) {
        this.trace(formatTrace(`Assigning random value to ${property.toString()}`));
      }
      context.bind(property);
      const resolved = this.ruleResolver.resolve(context);
      if (isErr(resolved)) {
        throw resolved.error;
      }
      const rule = resolved.value;
      if (this.debug) {
        this.trace(formatTrace(`Applying ${describeRule(rule)} to ${property.toString()}`));
      }
      rule(context, (value) => property.setValue(target, value));
    }
    return target;
  }

  /**
   * Registers a rule for one or more declared types. Fails when any of the
   * types already has a rule; use {@link setTypeRule} to replace one.
   */
  addTypeRule(rule: FuzzingRule, ...types: TypeToken[]): this {
    requirePresent(rule, 'rule');
    requireTypes(types);
    for (const type of types) {
      this.typeRules.add(type, rule);
    }
    return this;
  }

  /**
   * Registers a rule for one or more declared types, replacing existing ones.
   */
  setTypeRule(rule: FuzzingRule, ...types: TypeToken[]): this {
    requirePresent(rule, 'rule');
    requireTypes(types);
    for (const type of types) {
      this.typeRules.set(type, rule);
    }
    return this;
  }

  /**
   * Registers a rule for a single property. The property must be declared by
   * `type` itself according to the current property resolver.
   */
  addPropertyRule(type: RuntimeType, name: string, rule: FuzzingRule): this {
    requirePresent(rule, 'rule');
    const declaringClass = this.validatePropertyKey(type, name);
    this.propertyRules.add(declaringClass, name, rule);
    return this;
  }

  setPropertyRule(type: RuntimeType, name: string, rule: FuzzingRule): this {
    requirePresent(rule, 'rule');
    const declaringClass = this.validatePropertyKey(type, name);
    this.propertyRules.set(declaringClass, name, rule);
    return this;
  }

  getTypeRule(type: TypeToken): FuzzingRule | undefined {
    return this.typeRules.get(type);
  }

  getPropertyRule(type: RuntimeType, name: string): FuzzingRule | undefined {
    return this.propertyRules.get(type, name);
  }

  /**
   * Removes property and type rules. Caches held by resolvers are separate
   * and must be cleared on their own.
   */
  clearRules(): this {
    return this.clearPropertyRules().clearTypeRules();
  }

  clearPropertyRules(): this {
    this.propertyRules.clear();
    return this;
  }

  clearTypeRules(): this {
    this.typeRules.clear();
    return this;
  }

  setPropertyResolver(resolver: PropertyResolver): this {
    requirePresent(resolver, 'propertyResolver');
    this.propertyResolver = resolver;
    return this;
  }

  getPropertyResolver(): PropertyResolver {
    return this.propertyResolver;
  }

  setRuleResolver(resolver: RuleResolver): this {
    requirePresent(resolver, 'ruleResolver');
    this.ruleResolver = resolver;
    return this;
  }

  getRuleResolver(): RuleResolver {
    return this.ruleResolver;
  }

  /** Turns trace output on or off; it has no effect on the values assigned. */
  setDebug(debug: boolean): this {
    this.debug = debug;
    return this;
  }

  isDebug(): boolean {
    return this.debug;
  }

  private validatePropertyKey(type: RuntimeType, name: string): RuntimeType {
    requirePresent(type, 'type');
    if (typeof name !== 'string' || name.trim() === '') {
      throw new ConfigurationError({
        message: 'name must not be blank',
        context: { type: typeName(type), value: name },
      });
    }
    const property = resolveProperty(this.propertyResolver, type, name);
    if (isErr(property)) {
      throw property.error;
    }
    return property.value.declaringClass;
  }
}

function requirePresent(value: unknown, name: string): void {
  if (value === null || value === undefined) {
    throw new ConfigurationError({
      message: `${name} must not be null or undefined`,
      errorCode: ErrorCode.INVALID_ARGUMENT,
      context: { setting: name },
    });
  }
}

function requireTypes(types: readonly TypeToken[]): void {
  if (types.length === 0) {
    throw new ConfigurationError({
      message: 'At least one type is required',
      errorCode: ErrorCode.INVALID_ARGUMENT,
    });
  }
  types.forEach((type, index) => requirePresent(type, `types[${index}]`));
}
