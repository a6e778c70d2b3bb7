import { describe, it, expect, vi, type Mock } from 'vitest';

import { describeClass } from '../../metadata/class-descriptor.js';
import { CachingPropertyResolver } from '../caching-property-resolver.js';
import { FieldResolver } from '../field-resolver.js';
import type { PropertyResolver } from '../property-resolver.js';

class Entry {
  key = '';
}
describeClass(Entry, { fields: { key: String } });

class Other {}

function countingResolver(): {
  resolver: PropertyResolver;
  resolve: Mock<PropertyResolver['resolve']>;
} {
  const fields = new FieldResolver();
  const resolve = vi.fn<PropertyResolver['resolve']>((type, includeInherited) =>
    fields.resolve(type, includeInherited)
  );
  return { resolver: { resolve }, resolve };
}

describe('CachingPropertyResolver', () => {
  it('calls the delegate once per type and flag', () => {
    const { resolver, resolve } = countingResolver();
    const caching = CachingPropertyResolver.wrap(resolver);

    const first = caching.resolve(Entry, true);
    const second = caching.resolve(Entry, true);
    caching.resolve(Entry, false);
    caching.resolve(Other, true);

    expect(second).toBe(first);
    expect(resolve).toHaveBeenCalledTimes(3);
    expect(resolve).toHaveBeenNthCalledWith(2, Entry, false);
  });

  it('asks the delegate again after clearCache', () => {
    const { resolver, resolve } = countingResolver();
    const caching = new CachingPropertyResolver(resolver);

    caching.resolve(Entry, true);
    caching.clearCache();
    caching.resolve(Entry, true);

    expect(resolve).toHaveBeenCalledTimes(2);
  });

  it('exposes the wrapped resolver', () => {
    const { resolver } = countingResolver();

    expect(CachingPropertyResolver.wrap(resolver).delegate).toBe(resolver);
  });
});
