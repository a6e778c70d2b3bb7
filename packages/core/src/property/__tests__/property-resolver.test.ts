import { describe, it, expect } from 'vitest';

import { ErrorCode } from '../../errors/codes.js';
import { describeClass } from '../../metadata/class-descriptor.js';
import { isErr, isOk } from '../../types/result.js';
import { FieldResolver } from '../field-resolver.js';
import { resolveProperty } from '../property-resolver.js';

class Account {
  static count = 0;
  owner = '';
}
describeClass(Account, {
  fields: { count: { type: Number, static: true }, owner: String },
});

class SavingsAccount extends Account {
  rate = 0;
}
describeClass(SavingsAccount, { fields: { rate: Number } });

describe('resolveProperty', () => {
  const resolver = new FieldResolver();

  it('finds properties the class declares itself', () => {
    const result = resolveProperty(resolver, SavingsAccount, 'rate');

    expect(isOk(result) ? result.value.toString() : undefined).toBe(
      "Field 'rate' with type Number of SavingsAccount"
    );
  });

  it('reports inherited properties with their declaring class', () => {
    const result = resolveProperty(resolver, SavingsAccount, 'owner');

    expect(isErr(result)).toBe(true);
    if (isErr(result)) {
      expect(result.error.errorCode).toBe(ErrorCode.INHERITED_PROPERTY);
      expect(result.error.context?.['declaringClass']).toBe('Account');
    }
  });

  it('reports unknown and static names as missing', () => {
    for (const name of ['missing', 'count']) {
      const result = resolveProperty(resolver, Account, name);

      expect(isErr(result) ? result.error.message : undefined).toBe(
        `Class 'Account' has no non-static property '${name}'`
      );
      expect(isErr(result) ? result.error.errorCode : undefined).toBe(
        ErrorCode.PROPERTY_NOT_FOUND
      );
    }
  });
});
