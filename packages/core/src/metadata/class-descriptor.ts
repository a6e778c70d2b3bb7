/**
 * Class descriptors
 *
 * Declared property types cannot be recovered at run time, so each class
 * registers the types of its own members once, next to its definition:
 *
 *   class Point { x = 0; y = 0; }
 *   describeClass(Point, { fields: { x: Number, y: Number } });
 *
 * Descriptors are per class. Subclasses describe only what they add.
 */

import { ConfigurationError } from '../types/errors.js';
import {
  typeName,
  type RuntimeType,
  type TypeToken,
} from '../types/type-token.js';

export interface StaticFieldDeclaration {
  type: TypeToken;
  static: true;
}

export type FieldDeclaration = TypeToken | StaticFieldDeclaration;

export interface ClassDescriptorInput {
  /** Own data fields, keyed by name */
  fields?: Record<string, FieldDeclaration>;
  /** Declared types of accessor properties (get/set pairs), keyed by property name */
  accessors?: Record<string, TypeToken>;
}

export interface DeclaredField {
  readonly name: string;
  readonly type: TypeToken;
  readonly isStatic: boolean;
}

export interface ClassDescriptor {
  readonly type: RuntimeType;
  readonly fields: readonly DeclaredField[];
  readonly accessors: ReadonlyMap<string, TypeToken>;
}

const DESCRIPTORS = new WeakMap<RuntimeType, ClassDescriptor>();

function isStaticDeclaration(
  declaration: FieldDeclaration
): declaration is StaticFieldDeclaration {
  return (
    typeof declaration === 'object' &&
    'static' in declaration &&
    declaration.static === true
  );
}

/**
 * Registers the declared member types of a class. Describing the same class
 * twice is a configuration error.
 */
export function describeClass<C extends RuntimeType>(
  type: C,
  input: ClassDescriptorInput
): C {
  if (DESCRIPTORS.has(type)) {
    throw new ConfigurationError({
      message: `Class '${typeName(type)}' has already been described`,
      context: { type: typeName(type) },
    });
  }
  const fields: DeclaredField[] = Object.entries(input.fields ?? {}).map(
    ([name, declaration]) =>
      isStaticDeclaration(declaration)
        ? { name, type: declaration.type, isStatic: true }
        : { name, type: declaration, isStatic: false }
  );
  DESCRIPTORS.set(type, {
    type,
    fields,
    accessors: new Map(Object.entries(input.accessors ?? {})),
  });
  return type;
}

export function getClassDescriptor(
  type: RuntimeType
): ClassDescriptor | undefined {
  return DESCRIPTORS.get(type);
}
