/**
 * Tests for Result<T, E> pattern
 */

import { describe, it, expect } from 'vitest';

import { DecodeError } from '../errors.js';
import {
  type Result,
  Ok,
  Err,
  ok,
  err,
  isOk,
  isErr,
  matchResult,
} from '../result.js';

function parseCount(text: string): Result<number, string> {
  const parsed = Number(text);
  return Number.isInteger(parsed) ? ok(parsed) : err(`not a count: ${text}`);
}

describe('Result Pattern', () => {
  describe('Ok class', () => {
    it('carries the value and tag', () => {
      const result = new Ok(42);

      expect(result.value).toBe(42);
      expect(result._tag).toBe('Ok');
      expect(result.isOk()).toBe(true);
      expect(result.isErr()).toBe(false);
    });

    it('maps over the success value', () => {
      expect(new Ok(10).map((x) => x * 2).value).toBe(20);
    });

    it('leaves the value alone on mapErr', () => {
      const mapped = new Ok('success').mapErr(() => 'error');
      expect(mapped.value).toBe('success');
    });

    it('flatMaps to another result', () => {
      const chained = new Ok('7').flatMap(parseCount);
      expect(chained.isOk() && chained.value).toBe(7);
    });

    it('unwraps to the value and ignores the default', () => {
      const result = new Ok('actual');
      expect(result.unwrap()).toBe('actual');
      expect(result.unwrapOr('default')).toBe('actual');
      expect(result.toOptional()).toBe('actual');
    });
  });

  describe('Err class', () => {
    it('carries the error and tag', () => {
      const result = new Err('failure');

      expect(result.error).toBe('failure');
      expect(result._tag).toBe('Err');
      expect(result.isOk()).toBe(false);
      expect(result.isErr()).toBe(true);
    });

    it('skips map and flatMap', () => {
      const result = new Err('error');
      expect(result.map(() => 'mapped').error).toBe('error');
      expect(result.flatMap(() => ok('success')).error).toBe('error');
    });

    it('maps over the error value', () => {
      const mapped = new Err('original').mapErr((e) => `Modified: ${e}`);
      expect(mapped.error).toBe('Modified: original');
    });

    it('throws a generic error on unwrap of a non-Error payload', () => {
      expect(() => new Err('test error').unwrap()).toThrow(
        'Called unwrap on an Err value: test error'
      );
    });

    it('rethrows Error payloads as-is on unwrap', () => {
      const error = new DecodeError({ message: 'bad schema' });
      expect(() => new Err(error).unwrap()).toThrow(error);
    });

    it('falls back to the default', () => {
      const result = new Err('error');
      expect(result.unwrapOr('default')).toBe('default');
      expect(result.toOptional()).toBeUndefined();
    });
  });

  describe('Helper functions', () => {
    it('builds Ok and Err instances', () => {
      expect(ok(123)).toBeInstanceOf(Ok);
      expect(err('helper error')).toBeInstanceOf(Err);
    });

    it('identifies variants through the guards', () => {
      const good = parseCount('3');
      const bad = parseCount('x');

      expect(isOk(good)).toBe(true);
      expect(isErr(good)).toBe(false);
      expect(isOk(bad)).toBe(false);
      expect(isErr(bad)).toBe(true);
    });

    it('folds both variants with matchResult', () => {
      const render = (result: Result<number, string>): string =>
        matchResult(result, {
          ok: (value) => `count=${value}`,
          err: (message) => `error=${message}`,
        });

      expect(render(parseCount('4'))).toBe('count=4');
      expect(render(parseCount('four'))).toBe('error=not a count: four');
    });

    it('narrows a union after an isErr check', () => {
      const result = parseCount('12');
      if (result.isErr()) {
        throw new Error('expected Ok');
      }
      expect(result.value + 1).toBe(13);
    });
  });
});
