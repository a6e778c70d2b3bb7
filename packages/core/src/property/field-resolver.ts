import {
  getClassDescriptor,
  type DeclaredField,
} from '../metadata/class-descriptor.js';
import { superclassOf, type RuntimeType } from '../types/type-token.js';
import { FieldProperty, type Property } from './property.js';
import type { PropertyResolver } from './property-resolver.js';

// compiler-generated reference to an enclosing instance
const SYNTHETIC_FIELD = /^this\$\d+$/;

/**
 * Resolves the described, non-static fields of a class. With
 * `includeInherited` the superclass chain is walked up to the root,
 * subclass fields first.
 */
export class FieldResolver implements PropertyResolver {
  resolve(type: RuntimeType, includeInherited: boolean): Property[] {
    const properties: Property[] = [];
    let current: RuntimeType | undefined = type;
    while (current) {
      for (const field of getClassDescriptor(current)?.fields ?? []) {
        if (this.isSuitableField(field)) {
          properties.push(new FieldProperty(current, field.name, field.type));
        }
      }
      current = includeInherited ? superclassOf(current) : undefined;
    }
    return properties;
  }

  protected isSuitableField(field: DeclaredField): boolean {
    return !field.isStatic && !SYNTHETIC_FIELD.test(field.name);
  }
}
