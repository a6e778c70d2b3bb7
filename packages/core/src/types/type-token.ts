/**
 * Runtime type model
 *
 * TypeScript erases declared types, so the engine works with explicit tokens:
 * - constructors (classes, plus the primitive wrappers Number/String/...),
 * - TypeTag for types without a runtime constructor (narrow scalars,
 *   interfaces, branded types),
 * - EnumType for TypeScript enums and const objects of literals.
 */

export type Constructor<T = unknown> = new (...args: never[]) => T;

/** Constructor-like runtime types; BigInt and Symbol cannot be used with `new` */
export type RuntimeType = Constructor | BigIntConstructor | SymbolConstructor;

export type TypeToken = RuntimeType | TypeTag | EnumType;

export class TypeTag {
  readonly kind = 'tag' as const;

  constructor(readonly name: string) {}

  toString(): string {
    return this.name;
  }
}

export type EnumValue = string | number;

export class EnumType {
  readonly kind = 'enum' as const;

  constructor(
    readonly name: string,
    readonly values: readonly EnumValue[]
  ) {}

  toString(): string {
    return `enum ${this.name}`;
  }
}

const TAGS = new Map<string, TypeTag>();
const ENUMS = new WeakMap<object, EnumType>();

/**
 * Returns the interned tag for a name, so `typeTag('int') === typeTag('int')`.
 */
export function typeTag(name: string): TypeTag {
  let tag = TAGS.get(name);
  if (!tag) {
    tag = new TypeTag(name);
    TAGS.set(name, tag);
  }
  return tag;
}

const NUMERIC_KEY = /^\d+$/;

/**
 * Returns the interned token for an enum object. Reverse mappings of numeric
 * TypeScript enums are skipped.
 */
export function enumType(
  enumObject: Readonly<Record<string, EnumValue>>,
  name = 'anonymous'
): EnumType {
  const existing = ENUMS.get(enumObject);
  if (existing) {
    return existing;
  }
  const values = Object.entries(enumObject)
    .filter(([key]) => !NUMERIC_KEY.test(key))
    .map(([, value]) => value);
  const created = new EnumType(name, values);
  ENUMS.set(enumObject, created);
  return created;
}

/** Narrow scalar types that share `Number` at run time */
export const ScalarTypes = {
  byte: typeTag('byte'),
  short: typeTag('short'),
  int: typeTag('int'),
  float: typeTag('float'),
} as const;

/** Declared type of accessor properties nobody described */
export const UNKNOWN_TYPE = typeTag('unknown');

export function isTypeTag(token: TypeToken): token is TypeTag {
  return token instanceof TypeTag;
}

export function isEnumType(token: TypeToken): token is EnumType {
  return token instanceof EnumType;
}

export function isRuntimeType(token: TypeToken): token is RuntimeType {
  return typeof token === 'function';
}

export function isConstructor(value: unknown): value is Constructor {
  return typeof value === 'function';
}

const PRIMITIVE_WRAPPERS: ReadonlySet<unknown> = new Set<unknown>([
  Number,
  String,
  Boolean,
  BigInt,
  Symbol,
]);

export function isPrimitiveWrapper(type: TypeToken): boolean {
  return PRIMITIVE_WRAPPERS.has(type);
}

/**
 * Runtime class of a value; primitives map to their wrapper constructor.
 * Absent values (null/undefined) have none.
 */
export function runtimeTypeOf(value: unknown): RuntimeType | undefined {
  switch (typeof value) {
    case 'undefined':
      return undefined;
    case 'number':
      return Number;
    case 'string':
      return String;
    case 'boolean':
      return Boolean;
    case 'bigint':
      return BigInt;
    case 'symbol':
      return Symbol;
    case 'function':
      return Function;
    default:
      break;
  }
  if (value === null) {
    return undefined;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  if (proto === null || typeof proto !== 'object') {
    return Object;
  }
  const ctor: unknown = Reflect.get(proto, 'constructor');
  return isConstructor(ctor) ? ctor : Object;
}

/**
 * Direct superclass of a class, or undefined once the root is reached.
 * Plain `Object` counts as the root and is never returned.
 */
export function superclassOf(type: RuntimeType): RuntimeType | undefined {
  const parent: unknown = Object.getPrototypeOf(type);
  if (parent === Function.prototype || parent === Object || !isConstructor(parent)) {
    return undefined;
  }
  return parent;
}

/**
 * `true` when `candidate` is `type` or one of its subclasses.
 */
export function isAssignableFrom(type: RuntimeType, candidate: RuntimeType): boolean {
  if (type === candidate) {
    return true;
  }
  const proto: unknown = candidate.prototype;
  return proto instanceof type;
}

export function typeName(token: TypeToken): string {
  if (isRuntimeType(token)) {
    return token.name || '<anonymous class>';
  }
  return token.toString();
}
