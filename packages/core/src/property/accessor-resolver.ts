import { getClassDescriptor } from '../metadata/class-descriptor.js';
import {
  superclassOf,
  UNKNOWN_TYPE,
  type RuntimeType,
  type TypeToken,
} from '../types/type-token.js';
import {
  AccessorProperty,
  type AccessorFunction,
  type Property,
} from './property.js';
import type { PropertyResolver } from './property-resolver.js';

const GETTER_NAME = /^get([^a-z].*)$/;
const SETTER_NAME = /^set([^a-z].*)$/;

interface AccessorCandidate {
  name: string;
  // absent for getter-only accessors, which still hide inherited ones
  setter?: AccessorFunction;
  getter?: AccessorFunction;
}

function isAccessorFunction(value: unknown): value is AccessorFunction {
  return typeof value === 'function';
}

const LEADING_CAPITALS = /^[A-Z]{2}/;

function decapitalize(text: string): string {
  if (LEADING_CAPITALS.test(text)) {
    return text;
  }
  return text.charAt(0).toLowerCase() + text.slice(1);
}

/**
 * Resolves accessor-backed properties from class prototypes:
 * - native `get x()` / `set x(value)` pairs,
 * - `getX()` / `setX(value)` method pairs, matched on the case-insensitive
 *   suffix.
 *
 * Method-pair names drop the first letter's capital unless the suffix starts
 * with two capitals: `setName` gives `name`, `setURL` gives `URL`. Use that
 * name with `addPropertyRule` and `describeClass(type, { accessors })`.
 *
 * Only writable properties are returned; the getter is optional. Declared
 * types come from the class descriptor. A subclass accessor hides a
 * superclass accessor of the same name, so a subclass that overrides only the
 * getter of a native pair makes the property read-only and it is skipped.
 */
export class AccessorResolver implements PropertyResolver {
  resolve(type: RuntimeType, includeInherited: boolean): Property[] {
    const properties: Property[] = [];
    const seen = new Set<string>();
    let current: RuntimeType | undefined = type;
    while (current) {
      const declared = getClassDescriptor(current)?.accessors;
      const readOnly: string[] = [];
      for (const candidate of this.scanPrototype(current)) {
        const key = candidate.name.toLowerCase();
        if (seen.has(key)) {
          continue;
        }
        if (!candidate.setter) {
          readOnly.push(key);
          continue;
        }
        seen.add(key);
        const declaredType: TypeToken =
          declared?.get(candidate.name) ?? UNKNOWN_TYPE;
        properties.push(
          new AccessorProperty(
            current,
            candidate.name,
            declaredType,
            candidate.setter,
            candidate.getter
          )
        );
      }
      // getter-only accessors shadow inherited setters
      readOnly.forEach((key) => seen.add(key));
      current = includeInherited ? superclassOf(current) : undefined;
    }
    return properties;
  }

  protected isValidGetter(name: string, fn: AccessorFunction): boolean {
    return GETTER_NAME.test(name) && fn.length === 0;
  }

  protected isValidSetter(name: string, fn: AccessorFunction): boolean {
    return SETTER_NAME.test(name) && fn.length === 1;
  }

  // an overriding setter keeps the getter its superclass declares
  private inheritedGetter(proto: object, suffix: string): AccessorFunction | undefined {
    const name = `get${suffix}`;
    const getter: unknown = Reflect.get(proto, name);
    return isAccessorFunction(getter) && this.isValidGetter(name, getter) ? getter : undefined;
  }

  private scanPrototype(type: RuntimeType): AccessorCandidate[] {
    const proto: unknown = type.prototype;
    if (typeof proto !== 'object' || proto === null) {
      return [];
    }
    const candidates: AccessorCandidate[] = [];
    const getters = new Map<string, AccessorFunction>();
    const setters: Array<{ suffix: string; setter: AccessorFunction }> = [];

    for (const [key, descriptor] of Object.entries(
      Object.getOwnPropertyDescriptors(proto)
    )) {
      if (key === 'constructor') {
        continue;
      }
      if (descriptor.get || descriptor.set) {
        candidates.push({
          name: key,
          setter: descriptor.set,
          getter: descriptor.get,
        });
        continue;
      }
      const value: unknown = descriptor.value;
      if (!isAccessorFunction(value)) {
        continue;
      }
      if (this.isValidGetter(key, value)) {
        getters.set(key.slice(3).toLowerCase(), value);
      } else if (this.isValidSetter(key, value)) {
        setters.push({ suffix: key.slice(3), setter: value });
      }
    }

    for (const { suffix, setter } of setters) {
      candidates.push({
        name: decapitalize(suffix),
        setter,
        getter: getters.get(suffix.toLowerCase()) ?? this.inheritedGetter(proto, suffix),
      });
    }
    return candidates;
  }
}
