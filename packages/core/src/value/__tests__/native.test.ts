import { describe, it, expect } from 'vitest';

import { ErrorCode } from '../../errors/codes.js';
import { JSONValue, jsonValueEquals } from '../json-value.js';
import { fromNative, toNative } from '../native.js';

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('fromNative', () => {
  it('converts plain data', () => {
    const value = fromNative({ a: 1, b: [true, null, 'x', 2.5], c: undefined });
    const expected = JSONValue.object({
      a: JSONValue.int(1),
      b: JSONValue.array([
        JSONValue.true,
        JSONValue.null,
        JSONValue.string('x'),
        JSONValue.double(2.5),
      ]),
    });
    expect(jsonValueEquals(value, expected)).toBe(true);
  });

  it('converts maps, bigints and toJSON objects', () => {
    expect(jsonValueEquals(fromNative(new Map([['k', 1]])), JSONValue.object({ k: JSONValue.int(1) }))).toBe(
      true
    );
    expect(fromNative(10n)).toEqual({ kind: 'int', value: 10 });
    expect(fromNative(new Date(0))).toEqual({
      kind: 'string',
      value: '1970-01-01T00:00:00.000Z',
    });
  });

  it('accepts shared references that are not cycles', () => {
    const shared = { x: 1 };
    expect(fromNative({ a: shared, b: shared }).kind).toBe('object');
  });

  it('rejects non-finite numbers', () => {
    expect(thrown(() => fromNative({ n: Number.NaN }))).toMatchObject({
      errorCode: ErrorCode.NON_FINITE_NUMBER,
      context: { schemaPath: '#/n' },
    });
  });

  it('rejects unsupported values with their location', () => {
    expect(thrown(() => fromNative([undefined]))).toMatchObject({
      errorCode: ErrorCode.UNSUPPORTED_NATIVE_VALUE,
      context: { schemaPath: '#/0' },
    });
    expect(thrown(() => fromNative({ f: () => 1 }))).toMatchObject({
      errorCode: ErrorCode.UNSUPPORTED_NATIVE_VALUE,
      context: { schemaPath: '#/f' },
    });
    expect(thrown(() => fromNative(2n ** 64n))).toMatchObject({
      errorCode: ErrorCode.UNSUPPORTED_NATIVE_VALUE,
    });
    expect(thrown(() => fromNative(new Map([[1, 'one']])))).toMatchObject({
      errorCode: ErrorCode.UNSUPPORTED_NATIVE_VALUE,
    });
  });

  it('escapes pointer tokens in locations', () => {
    expect(thrown(() => fromNative({ 'a/b': { '~c': Symbol('s') } }))).toMatchObject({
      context: { schemaPath: '#/a~1b/~0c' },
    });
  });

  it('rejects cycles', () => {
    const node: { self?: unknown } = {};
    node.self = node;
    expect(thrown(() => fromNative(node))).toMatchObject({
      errorCode: ErrorCode.CIRCULAR_STRUCTURE,
      context: { schemaPath: '#/self' },
    });
  });
});

describe('toNative', () => {
  it('produces plain data', () => {
    const value = JSONValue.object({
      a: JSONValue.array([JSONValue.int(1), JSONValue.double(2.5), JSONValue.null]),
      b: JSONValue.false,
    });
    expect(toNative(value)).toEqual({ a: [1, 2.5, null], b: false });
  });

  it('keeps __proto__ as an own key', () => {
    const native = toNative(JSONValue.object([['__proto__', JSONValue.int(1)]]));
    expect(native !== null && typeof native === 'object' && Object.keys(native)).toEqual([
      '__proto__',
    ]);
  });

  it('inverts fromNative for plain data', () => {
    const data = { list: [1, 'two', { three: 3.5 }], flag: true, none: null };
    expect(toNative(fromNative(data))).toEqual(data);
  });
});
