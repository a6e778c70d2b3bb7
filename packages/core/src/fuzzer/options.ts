/**
 * Configuration options for the Fuzzer
 *
 * All options are optional with conservative defaults.
 */

import { ConfigurationError } from '../types/errors.js';
import { FieldResolver } from '../property/field-resolver.js';
import type { PropertyResolver } from '../property/property-resolver.js';
import {
  DEFAULT_RULE_RESOLVER,
  type RuleResolver,
} from '../rules/rule-resolver.js';
import { createStderrTrace, type TraceSink } from '../util/debug.js';

/** Attempts the non-equality wrapper makes before giving up (default: 10) */
export const DEFAULT_MAX_ATTEMPTS = 10;

export interface FuzzerOptions {
  /** Also assign properties inherited from superclasses (default: true) */
  includeInherited?: boolean;
  /** Emit a trace line per object, property and rule (default: false) */
  debug?: boolean;
  /** Where trace lines go (default: process.stderr) */
  trace?: TraceSink;
  /** Property discovery strategy (default: FieldResolver) */
  propertyResolver?: PropertyResolver;
  /** Rule lookup strategy (default: DEFAULT_RULE_RESOLVER) */
  ruleResolver?: RuleResolver;
}

export type ResolvedFuzzerOptions = Required<FuzzerOptions>;

export const DEFAULT_FUZZER_OPTIONS: Readonly<
  Omit<ResolvedFuzzerOptions, 'trace' | 'propertyResolver'>
> = {
  includeInherited: true,
  debug: false,
  ruleResolver: DEFAULT_RULE_RESOLVER,
};

/**
 * Merges user options over the defaults. Trace sinks and field resolvers are
 * created per call so fuzzers never share them.
 */
export function resolveFuzzerOptions(
  userOptions: FuzzerOptions = {}
): ResolvedFuzzerOptions {
  const resolved: ResolvedFuzzerOptions = {
    ...DEFAULT_FUZZER_OPTIONS,
    trace: createStderrTrace(),
    propertyResolver: new FieldResolver(),
    ...withoutUndefined(userOptions),
  };
  validateOptions(resolved);
  return resolved;
}

function withoutUndefined(options: FuzzerOptions): FuzzerOptions {
  const copy: FuzzerOptions = {};
  if (options.includeInherited !== undefined) copy.includeInherited = options.includeInherited;
  if (options.debug !== undefined) copy.debug = options.debug;
  if (options.trace !== undefined) copy.trace = options.trace;
  if (options.propertyResolver !== undefined) copy.propertyResolver = options.propertyResolver;
  if (options.ruleResolver !== undefined) copy.ruleResolver = options.ruleResolver;
  return copy;
}

function hasResolve(value: unknown): boolean {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'resolve') === 'function'
  );
}

/**
 * Validates option values that plain JavaScript callers can get wrong.
 */
export function validateOptions(options: ResolvedFuzzerOptions): void {
  if (typeof options.includeInherited !== 'boolean') {
    throw new ConfigurationError({
      message: 'includeInherited must be a boolean',
      context: { setting: 'includeInherited', value: options.includeInherited },
    });
  }
  if (typeof options.debug !== 'boolean') {
    throw new ConfigurationError({
      message: 'debug must be a boolean',
      context: { setting: 'debug', value: options.debug },
    });
  }
  if (typeof options.trace !== 'function') {
    throw new ConfigurationError({
      message: 'trace must be a function',
      context: { setting: 'trace' },
    });
  }
  if (!hasResolve(options.propertyResolver)) {
    throw new ConfigurationError({
      message: 'propertyResolver must implement resolve()',
      context: { setting: 'propertyResolver' },
    });
  }
  if (!hasResolve(options.ruleResolver)) {
    throw new ConfigurationError({
      message: 'ruleResolver must implement resolve()',
      context: { setting: 'ruleResolver' },
    });
  }
}
