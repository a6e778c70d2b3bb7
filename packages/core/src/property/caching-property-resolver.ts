import type { RuntimeType } from '../types/type-token.js';
import type { Property } from './property.js';
import type { PropertyResolver } from './property-resolver.js';

/**
 * Memoizes another resolver per (type, includeInherited).
 *
 * Entries never expire; call `clearCache()` when class descriptors change.
 * The cache is a plain Map and must not be shared across concurrent passes.
 */
export class CachingPropertyResolver implements PropertyResolver {
  private readonly cache = new Map<RuntimeType, Map<boolean, readonly Property[]>>();

  constructor(private readonly wrapped: PropertyResolver) {}

  static wrap(resolver: PropertyResolver): CachingPropertyResolver {
    return new CachingPropertyResolver(resolver);
  }

  resolve(type: RuntimeType, includeInherited: boolean): readonly Property[] {
    let byFlag = this.cache.get(type);
    if (!byFlag) {
      byFlag = new Map();
      this.cache.set(type, byFlag);
    }
    let properties = byFlag.get(includeInherited);
    if (!properties) {
      properties = this.wrapped.resolve(type, includeInherited);
      byFlag.set(includeInherited, properties);
    }
    return properties;
  }

  clearCache(): void {
    this.cache.clear();
  }

  get delegate(): PropertyResolver {
    return this.wrapped;
  }
}
