import { ErrorCode } from '../errors/codes.js';
import { ConfigurationError } from '../types/errors.js';
import {
  typeName,
  type RuntimeType,
  type TypeToken,
} from '../types/type-token.js';
import { describeRule } from '../util/describe.js';
import type { FuzzingRule } from './fuzzing-rule.js';

/**
 * Declared type -> rule. `add` rejects a second rule for a type, `set`
 * overwrites.
 */
export class TypeRuleTable {
  private readonly rules = new Map<TypeToken, FuzzingRule>();

  add(type: TypeToken, rule: FuzzingRule): void {
    const existing = this.rules.get(type);
    if (existing) {
      throw new ConfigurationError({
        message: `There is already a type rule registered for ${typeName(type)}: ${describeRule(existing)}`,
        errorCode: ErrorCode.DUPLICATE_REGISTRATION,
        context: { type: typeName(type), existing: describeRule(existing) },
      });
    }
    this.rules.set(type, rule);
  }

  set(type: TypeToken, rule: FuzzingRule): void {
    this.rules.set(type, rule);
  }

  get(type: TypeToken): FuzzingRule | undefined {
    return this.rules.get(type);
  }

  clear(): void {
    this.rules.clear();
  }

  get size(): number {
    return this.rules.size;
  }
}

/**
 * (declaring class, property name) -> rule, with the same add/set duality.
 */
export class PropertyRuleTable {
  private readonly rules = new Map<RuntimeType, Map<string, FuzzingRule>>();

  add(type: RuntimeType, name: string, rule: FuzzingRule): void {
    const existing = this.get(type, name);
    if (existing) {
      throw new ConfigurationError({
        message: `There is already a rule registered for property '${name}' of ${typeName(type)}: ${describeRule(existing)}`,
        errorCode: ErrorCode.DUPLICATE_REGISTRATION,
        context: { type: typeName(type), name, existing: describeRule(existing) },
      });
    }
    this.set(type, name, rule);
  }

  set(type: RuntimeType, name: string, rule: FuzzingRule): void {
    let byName = this.rules.get(type);
    if (!byName) {
      byName = new Map();
      this.rules.set(type, byName);
    }
    byName.set(name, rule);
  }

  get(type: RuntimeType, name: string): FuzzingRule | undefined {
    return this.rules.get(type)?.get(name);
  }

  clear(): void {
    this.rules.clear();
  }

  get size(): number {
    let total = 0;
    for (const byName of this.rules.values()) {
      total += byName.size;
    }
    return total;
  }
}
