import { ErrorCode } from '../errors/codes.js';
import { ConfigurationError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import { typeName, type RuntimeType } from '../types/type-token.js';
import type { Property } from './property.js';

/**
 * Enumerates the properties of a class that should receive new values.
 *
 * Results must be deterministic per (type, includeInherited) but carry no
 * ordering guarantee beyond the discovery order of the implementation.
 * Discovery never fails; candidates that cannot be written are left out.
 */
export interface PropertyResolver {
  resolve(type: RuntimeType, includeInherited: boolean): readonly Property[];
}

/**
 * Looks up a single property declared by `type` itself, for registration-time
 * validation of property rules.
 */
export function resolveProperty(
  resolver: PropertyResolver,
  type: RuntimeType,
  name: string
): Result<Property, ConfigurationError> {
  const own = resolver.resolve(type, false).find((p) => p.name === name);
  if (own) {
    return ok(own);
  }
  const inherited = resolver.resolve(type, true).find((p) => p.name === name);
  if (inherited) {
    return err(
      new ConfigurationError({
        message:
          `Class '${typeName(type)}' inherits property '${name}' from ` +
          `'${typeName(inherited.declaringClass)}'; register the rule on the declaring class`,
        errorCode: ErrorCode.INHERITED_PROPERTY,
        context: {
          type: typeName(type),
          property: inherited.toString(),
          declaringClass: typeName(inherited.declaringClass),
        },
      })
    );
  }
  return err(
    new ConfigurationError({
      message: `Class '${typeName(type)}' has no non-static property '${name}'`,
      errorCode: ErrorCode.PROPERTY_NOT_FOUND,
      context: { type: typeName(type), name },
    })
  );
}
