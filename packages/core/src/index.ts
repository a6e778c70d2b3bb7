// @objfuzz/core entry point
//
// Public API:
// - Fuzzer: the orchestrator (rule registration and fuzz passes).
// - Property discovery: FieldResolver, AccessorResolver, CachingPropertyResolver
//   over classes described with describeClass().
// - Rule lookup: DefaultRuleResolver, RecursiveRuleResolver (+ instance factories).
// - Rules: fromSupplier/fromGenerator/NOP_RULE and the DifferentValueGenerator
//   wrapper with its EqualityPolicy.
// - Errors (FuzzError + ErrorCode) and the Result type used at resolution boundaries.

export { Fuzzer } from './fuzzer/fuzzer.js';
export type { FuzzContext } from './fuzzer/context.js';
export {
  resolveFuzzerOptions,
  validateOptions,
  DEFAULT_FUZZER_OPTIONS,
  DEFAULT_MAX_ATTEMPTS,
  type FuzzerOptions,
  type ResolvedFuzzerOptions,
} from './fuzzer/options.js';

// Runtime type model
export {
  typeTag,
  enumType,
  runtimeTypeOf,
  superclassOf,
  isAssignableFrom,
  isTypeTag,
  isEnumType,
  isRuntimeType,
  isPrimitiveWrapper,
  typeName,
  TypeTag,
  EnumType,
  ScalarTypes,
  UNKNOWN_TYPE,
  type Constructor,
  type RuntimeType,
  type TypeToken,
  type EnumValue,
} from './types/type-token.js';
export {
  describeClass,
  getClassDescriptor,
  type ClassDescriptor,
  type ClassDescriptorInput,
  type DeclaredField,
  type FieldDeclaration,
  type StaticFieldDeclaration,
} from './metadata/class-descriptor.js';

// Properties
export {
  FieldProperty,
  AccessorProperty,
  type Property,
  type AccessorFunction,
} from './property/property.js';
export {
  resolveProperty,
  type PropertyResolver,
} from './property/property-resolver.js';
export { FieldResolver } from './property/field-resolver.js';
export { AccessorResolver } from './property/accessor-resolver.js';
export { CachingPropertyResolver } from './property/caching-property-resolver.js';

// Rules
export {
  NOP_RULE,
  fromSupplier,
  fromGenerator,
  type FuzzingRule,
  type PropertySetter,
  type ValueGenerator,
  type ValueSupplier,
} from './rules/fuzzing-rule.js';
export {
  DefaultRuleResolver,
  DEFAULT_RULE_RESOLVER,
  type RuleResolver,
} from './rules/rule-resolver.js';
export { RecursiveRuleResolver } from './rules/recursive-rule-resolver.js';
export {
  ConstructorInstanceFactory,
  FactoryRegistry,
  isInstantiableType,
  type Factory,
  type InstanceFactory,
} from './rules/instance-factory.js';

// Equality
export {
  EqualityPolicy,
  ALWAYS_FALSE,
  valueEquals,
  type EqualityPredicate,
} from './equality/equality-policy.js';
export { DifferentValueGenerator } from './equality/different-value-generator.js';

// Errors
export { ErrorCode, getErrorPhase, type ErrorPhase } from './errors/codes.js';
export {
  FuzzError,
  ConfigurationError,
  ResolutionError,
  EqualityConflictError,
  RetryExhaustedError,
  PropertyAccessError,
  isFuzzError,
  type ErrorContext,
  type SerializedError,
} from './types/errors.js';
export { Ok, Err, ok, err, isOk, isErr, type Result } from './types/result.js';

// Tracing
export {
  createStderrTrace,
  formatTrace,
  TRACE_PREFIX,
  type TraceSink,
} from './util/debug.js';
export { describeValue, describeRule } from './util/describe.js';
