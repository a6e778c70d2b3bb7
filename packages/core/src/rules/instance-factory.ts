/**
 * Instance creation for the recursive rule resolver. Reflection on
 * constructors is one strategy; an explicit factory registry is the other.
 */

import {
  isPrimitiveWrapper,
  isRuntimeType,
  type Constructor,
  type RuntimeType,
  type TypeToken,
} from '../types/type-token.js';

export type Factory<T extends object = object> = () => T;

export interface InstanceFactory {
  /** Zero-argument factory for the type, or undefined when there is none */
  factoryFor(type: Constructor<object>): Factory | undefined;
}

/**
 * Uses the class constructor when it declares no parameters.
 */
export class ConstructorInstanceFactory implements InstanceFactory {
  factoryFor(type: Constructor<object>): Factory | undefined {
    if (type.length !== 0) {
      return undefined;
    }
    return () => new type();
  }
}

/**
 * Explicit per-type factories, falling back to another factory.
 */
export class FactoryRegistry implements InstanceFactory {
  private readonly factories = new Map<RuntimeType, Factory>();

  constructor(private readonly fallback?: InstanceFactory) {}

  register<T extends object>(type: Constructor<T>, factory: Factory<T>): this {
    this.factories.set(type, factory);
    return this;
  }

  factoryFor(type: Constructor<object>): Factory | undefined {
    return this.factories.get(type) ?? this.fallback?.factoryFor(type);
  }
}

/**
 * Ordinary class types the recursive resolver may instantiate: not a tag or
 * enum token, not a primitive wrapper, not a function or array type.
 */
export function isInstantiableType(type: TypeToken): type is Constructor<object> {
  if (!isRuntimeType(type) || isPrimitiveWrapper(type)) {
    return false;
  }
  if (type === Function || type === Array) {
    return false;
  }
  const proto: unknown = type.prototype;
  return !(proto instanceof Array);
}
