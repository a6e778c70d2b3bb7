/**
 * Property abstraction: a uniform read/write handle over either a data field
 * or a getter/setter pair. Every property is writable; reading is optional.
 */

import { PropertyAccessError } from '../types/errors.js';
import {
  typeName,
  type RuntimeType,
  type TypeToken,
} from '../types/type-token.js';

export interface Property {
  /** Class whose descriptor or prototype declares this property */
  readonly declaringClass: RuntimeType;
  /** Declared type used for type-rule lookup */
  readonly type: TypeToken;
  readonly name: string;
  /** `false` when the property has no getter */
  readonly readable: boolean;

  getValue(target: object): unknown;
  setValue(target: object, value: unknown): void;
  toString(): string;
}

/**
 * Plain data slot on the instance.
 */
export class FieldProperty implements Property {
  readonly readable = true;

  constructor(
    readonly declaringClass: RuntimeType,
    readonly name: string,
    readonly type: TypeToken
  ) {}

  getValue(target: object): unknown {
    return Reflect.get(target, this.name);
  }

  setValue(target: object, value: unknown): void {
    if (Reflect.set(target, this.name, value)) {
      return;
    }
    // read-only slot: redefine it if the object still allows that
    const descriptor = Object.getOwnPropertyDescriptor(target, this.name);
    if (descriptor?.configurable && 'value' in descriptor) {
      Object.defineProperty(target, this.name, { ...descriptor, value });
      return;
    }
    throw new PropertyAccessError({
      message: `Cannot assign ${this.toString()}: the slot is read-only`,
      context: { property: this.toString(), type: typeName(this.declaringClass) },
    });
  }

  toString(): string {
    return `Field '${this.name}' with type ${typeName(this.type)} of ${typeName(this.declaringClass)}`;
  }
}

export type AccessorFunction = (...args: unknown[]) => unknown;

/**
 * Property backed by accessor functions: either a native `get x()`/`set x()`
 * pair or a `getX()`/`setX(value)` method pair.
 */
export class AccessorProperty implements Property {
  constructor(
    readonly declaringClass: RuntimeType,
    readonly name: string,
    readonly type: TypeToken,
    private readonly setter: AccessorFunction,
    private readonly getter?: AccessorFunction
  ) {}

  get readable(): boolean {
    return this.getter !== undefined;
  }

  getValue(target: object): unknown {
    if (!this.getter) {
      throw new PropertyAccessError({
        message: `Cannot read ${this.toString()}: found no suitable getter`,
        context: { property: this.toString(), type: typeName(this.declaringClass) },
      });
    }
    return this.getter.call(target);
  }

  setValue(target: object, value: unknown): void {
    this.setter.call(target, value);
  }

  toString(): string {
    return `Property '${this.name}' with type ${typeName(this.type)} of ${typeName(this.declaringClass)}`;
  }
}
