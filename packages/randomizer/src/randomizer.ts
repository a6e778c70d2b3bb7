/**
 * Randomizer
 * Default value generators for common types, backed by a seedable Faker
 * instance so test runs can be reproduced.
 */

import { Faker, en } from '@faker-js/faker';
import {
  ConfigurationError,
  ScalarTypes,
  fromGenerator,
  type EnumType,
  type EnumValue,
  type Fuzzer,
  type TypeToken,
  type ValueGenerator,
  type ValueSupplier,
} from '@objfuzz/core';

/** Default set of characters used for random strings */
export const DEFAULT_CHARS = 'abcdefghijklmnopqrstuvwxyz0123456789';

/** Turns a supplier into the generator that gets registered */
export type SupplierWrapper = <T>(supplier: ValueSupplier<T>) => ValueGenerator<T>;

export interface IntRange {
  min: number;
  max: number;
}

const INT8: IntRange = { min: -128, max: 127 };
const INT16: IntRange = { min: -32_768, max: 32_767 };
const INT32: IntRange = { min: -2_147_483_648, max: 2_147_483_647 };
const INT64 = { min: -(2n ** 63n), max: 2n ** 63n - 1n };
// ECMAScript time value limits
const MAX_TIME_MS = 8_640_000_000_000_000;

const passThrough: SupplierWrapper = <T>(supplier: ValueSupplier<T>): ValueGenerator<T> =>
  () => supplier();

export class Randomizer {
  constructor(readonly faker: Faker = new Faker({ locale: [en] })) {}

  /**
   * Randomizer whose output is fully determined by `seed`.
   */
  static seeded(seed: number): Randomizer {
    const faker = new Faker({ locale: [en] });
    faker.seed(seed);
    return new Randomizer(faker);
  }

  /**
   * Picks a random value of an enum, or undefined when it has no values.
   */
  pickRandomEnumValue(type: EnumType): EnumValue | undefined {
    if (type.values.length === 0) {
      return undefined;
    }
    return this.faker.helpers.arrayElement(type.values);
  }

  /**
   * Picks `count` elements (capped at the collection size). Without
   * repetition every position is picked at most once. `count` must be a
   * non-negative integer.
   */
  pickRandomElements<T>(
    collection: Iterable<T>,
    count: number,
    repetitionAllowed: boolean
  ): T[] {
    if (!Number.isInteger(count) || count < 0) {
      throw new ConfigurationError({
        message: `count must be a non-negative integer, got ${count}`,
        context: { setting: 'count', value: count },
      });
    }
    const items = Array.from(collection);
    const wanted = Math.min(items.length, count);
    if (wanted <= 0) {
      return [];
    }
    if (!repetitionAllowed) {
      return this.faker.helpers.arrayElements(items, wanted);
    }
    const picked: T[] = [];
    while (picked.length < wanted) {
      picked.push(this.faker.helpers.arrayElement(items));
    }
    return picked;
  }

  /**
   * Map with 1–29 random string entries; duplicate keys collapse.
   */
  createRandomStringMap(
    minKeyLen: number,
    maxKeyLen: number,
    minValueLen: number,
    maxValueLen: number
  ): Map<string, string> {
    const size = this.faker.number.int({ min: 1, max: 29 });
    const map = new Map<string, string>();
    for (let i = 0; i < size; i++) {
      map.set(
        this.createRandomString(minKeyLen, maxKeyLen),
        this.createRandomString(minValueLen, maxValueLen)
      );
    }
    return map;
  }

  /**
   * Random string with a length in [minLen, maxLen] (both inclusive).
   */
  createRandomString(minLen: number, maxLen: number, chars: string = DEFAULT_CHARS): string {
    if (!Number.isInteger(minLen) || minLen < 0) {
      throw new ConfigurationError({
        message: `minLen must be a non-negative integer, got ${minLen}`,
        context: { setting: 'minLen', value: minLen },
      });
    }
    if (!Number.isInteger(maxLen) || maxLen < minLen) {
      throw new ConfigurationError({
        message: `maxLen must be an integer >= minLen (${minLen}), got ${maxLen}`,
        context: { setting: 'maxLen', value: maxLen },
      });
    }
    if (chars.length === 0) {
      throw new ConfigurationError({
        message: 'Need at least one character to choose from',
        context: { setting: 'chars' },
      });
    }
    return this.faker.string.fromCharacters(chars, { min: minLen, max: maxLen });
  }

  randomInt(range: IntRange): number {
    return this.faker.number.int(range);
  }

  randomBigInt(): bigint {
    return this.faker.number.bigInt(INT64);
  }

  randomDate(): Date {
    return new Date(this.faker.number.int({ min: -MAX_TIME_MS, max: MAX_TIME_MS }));
  }

  /**
   * Registers rules for String, Number, BigInt, Boolean, Date and the
   * byte/short/int/float scalar tags. Uses add semantics, so types that
   * already have a rule make this fail.
   *
   * @param wrap applied to every supplier before registration, e.g.
   *   `new DifferentValueGenerator().differentValues()`
   */
  setupDefaultRules(fuzzer: Fuzzer, wrap: SupplierWrapper = passThrough): Fuzzer {
    const register = <T>(supplier: ValueSupplier<T>, ...types: TypeToken[]): void => {
      fuzzer.addTypeRule(fromGenerator(wrap(supplier)), ...types);
    };

    register(() => this.createRandomString(1, 20), String);
    register(() => this.faker.number.float(), Number);
    register(() => this.randomBigInt(), BigInt);
    register(() => this.faker.datatype.boolean(), Boolean);
    register(() => this.randomDate(), Date);
    register(() => this.randomInt(INT32), ScalarTypes.int);
    register(() => this.randomInt(INT16), ScalarTypes.short);
    register(() => this.randomInt(INT8), ScalarTypes.byte);
    register(() => Math.fround(this.faker.number.float()), ScalarTypes.float);
    return fuzzer;
  }
}
