import { describe, it, expect } from 'vitest';
/**
 * Tests for the Result<T, E> pattern used at resolution boundaries
 */

import { Ok, Err, ok, err, isOk, isErr, type Result } from '../result.js';
import { ConfigurationError } from '../errors.js';

describe('Result Pattern', () => {
  describe('Ok', () => {
    it('carries its value', () => {
      const result = new Ok(42);

      expect(result.value).toBe(42);
      expect(result._tag).toBe('Ok');
      expect(result.isOk()).toBe(true);
      expect(result.isErr()).toBe(false);
    });

    it('maps over the success value', () => {
      expect(ok(10).map((x) => x * 2).value).toBe(20);
    });

    it('unwraps to the value', () => {
      expect(ok('value').unwrap()).toBe('value');
    });
  });

  describe('Err', () => {
    it('carries its error', () => {
      const result = new Err('failed');

      expect(result.error).toBe('failed');
      expect(result._tag).toBe('Err');
      expect(result.isOk()).toBe(false);
      expect(result.isErr()).toBe(true);
    });

    it('ignores map', () => {
      const result = err('failed').map(() => 1);

      expect(result.error).toBe('failed');
    });

    it('rethrows an Error payload unchanged on unwrap', () => {
      const error = new ConfigurationError({ message: 'bad setting' });

      expect(() => err(error).unwrap()).toThrow(error);
    });

    it('wraps a non-Error payload on unwrap', () => {
      expect(() => err('plain').unwrap()).toThrow(
        'Called unwrap on an Err value: plain'
      );
    });
  });

  describe('type guards', () => {
    it('narrow a Result union', () => {
      const success: Result<number, string> = ok(1);
      const failure: Result<number, string> = err('no');

      expect(isOk(success) ? success.value : undefined).toBe(1);
      expect(isErr(failure) ? failure.error : undefined).toBe('no');
      expect(isErr(success)).toBe(false);
      expect(isOk(failure)).toBe(false);
    });
  });
});
