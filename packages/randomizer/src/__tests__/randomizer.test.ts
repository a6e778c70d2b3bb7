import { describe, it, expect } from 'vitest';
import { ConfigurationError, enumType } from '@objfuzz/core';

import { DEFAULT_CHARS, Randomizer } from '../randomizer.js';

enum Level {
  Low = 'low',
  Mid = 'mid',
  High = 'high',
}

describe('Randomizer', () => {
  const randomizer = Randomizer.seeded(1234);

  describe('createRandomString', () => {
    it('stays within the length bounds and the default alphabet', () => {
      for (let i = 0; i < 200; i++) {
        const value = randomizer.createRandomString(3, 5);

        expect(value.length).toBeGreaterThanOrEqual(3);
        expect(value.length).toBeLessThanOrEqual(5);
        expect([...value].every((c) => DEFAULT_CHARS.includes(c))).toBe(true);
      }
    });

    it('uses a custom alphabet', () => {
      const value = randomizer.createRandomString(50, 50, 'xy');

      expect(value).toMatch(/^[xy]{50}$/);
    });

    it('returns an empty string for a zero length', () => {
      expect(randomizer.createRandomString(0, 0)).toBe('');
    });

    it('rejects invalid bounds and empty alphabets', () => {
      expect(() => randomizer.createRandomString(-1, 3)).toThrow(
        'minLen must be a non-negative integer, got -1'
      );
      expect(() => randomizer.createRandomString(5, 3)).toThrow(
        'maxLen must be an integer >= minLen (5), got 3'
      );
      expect(() => randomizer.createRandomString(1, 2, '')).toThrow(ConfigurationError);
    });
  });

  describe('pickRandomEnumValue', () => {
    it('picks one of the declared values', () => {
      const level = enumType(Level, 'Level');

      for (let i = 0; i < 50; i++) {
        expect(['low', 'mid', 'high']).toContain(randomizer.pickRandomEnumValue(level));
      }
    });

    it('returns undefined for enums without values', () => {
      expect(randomizer.pickRandomEnumValue(enumType({}, 'Empty'))).toBeUndefined();
    });
  });

  describe('pickRandomElements', () => {
    const letters = ['a', 'b', 'c', 'd', 'e', 'f'];

    it('picks distinct elements without repetition', () => {
      for (let i = 0; i < 10; i++) {
        const picked = randomizer.pickRandomElements(letters, 3, false);

        expect(picked).toHaveLength(3);
        expect(new Set(picked).size).toBe(3);
      }
    });

    it('picks the requested count with repetition', () => {
      const picked = randomizer.pickRandomElements(new Set(letters), 3, true);

      expect(picked).toHaveLength(3);
      expect(picked.every((letter) => letters.includes(letter))).toBe(true);
    });

    it('caps the count at the collection size', () => {
      const picked = randomizer.pickRandomElements([1, 2, 3], 5, false);

      expect([...picked].sort()).toEqual([1, 2, 3]);
      expect(randomizer.pickRandomElements([1, 2], 5, true)).toHaveLength(2);
      expect(randomizer.pickRandomElements([], 2, true)).toEqual([]);
    });

    it('rejects fractional and negative counts', () => {
      expect(() => randomizer.pickRandomElements([1, 2, 3, 4], 2.5, true)).toThrow(
        'count must be a non-negative integer, got 2.5'
      );
      expect(() => randomizer.pickRandomElements([1, 2, 3, 4], 2.5, false)).toThrow(
        ConfigurationError
      );
      expect(() => randomizer.pickRandomElements([1], -1, true)).toThrow(ConfigurationError);
      expect(randomizer.pickRandomElements([1, 2], 0, false)).toEqual([]);
    });
  });

  describe('createRandomStringMap', () => {
    it('creates between 1 and 29 entries with bounded lengths', () => {
      const map = randomizer.createRandomStringMap(8, 10, 0, 4);

      expect(map.size).toBeGreaterThanOrEqual(1);
      expect(map.size).toBeLessThanOrEqual(29);
      for (const [key, value] of map) {
        expect(key.length).toBeGreaterThanOrEqual(8);
        expect(key.length).toBeLessThanOrEqual(10);
        expect(value.length).toBeLessThanOrEqual(4);
      }
    });
  });

  describe('numbers and dates', () => {
    it('keeps ints inside the requested range', () => {
      for (let i = 0; i < 100; i++) {
        const value = randomizer.randomInt({ min: -3, max: 3 });

        expect(Number.isInteger(value)).toBe(true);
        expect(Math.abs(value)).toBeLessThanOrEqual(3);
      }
    });

    it('creates valid dates and 64-bit bigints', () => {
      const date = randomizer.randomDate();
      const big = randomizer.randomBigInt();

      expect(Number.isNaN(date.getTime())).toBe(false);
      expect(big >= -(2n ** 63n) && big < 2n ** 63n).toBe(true);
    });
  });

  it('repeats its output for the same seed', () => {
    const first = Randomizer.seeded(99);
    const second = Randomizer.seeded(99);

    expect(first.createRandomString(5, 10)).toBe(second.createRandomString(5, 10));
    expect(first.randomInt({ min: 0, max: 1000 })).toBe(
      second.randomInt({ min: 0, max: 1000 })
    );
  });
});
