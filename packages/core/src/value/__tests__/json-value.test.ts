import { describe, it, expect } from 'vitest';

import {
  JSONValue,
  arrayValue,
  boolValue,
  canonicalJSONValueText,
  doubleValue,
  formatDouble,
  intValue,
  isNull,
  jsonValueDescription,
  jsonValueEquals,
  jsonValueHash,
  objectValue,
  stringValue,
} from '../json-value.js';

describe('JSONValue constructors', () => {
  it('shares the null and boolean singletons', () => {
    expect(JSONValue.null).toEqual({ kind: 'null' });
    expect(JSONValue.bool(true)).toBe(JSONValue.true);
    expect(JSONValue.bool(false)).toBe(JSONValue.false);
  });

  it('rejects unsafe integers and non-finite doubles', () => {
    expect(() => JSONValue.int(1.5)).toThrow(RangeError);
    expect(() => JSONValue.int(2 ** 53)).toThrow(RangeError);
    expect(() => JSONValue.double(Number.NaN)).toThrow(RangeError);
    expect(() => JSONValue.double(Number.POSITIVE_INFINITY)).toThrow(
      'JSONValue.double expects a finite number, got Infinity'
    );
  });

  it('normalizes negative zero for int', () => {
    expect(Object.is(JSONValue.int(-0).value, 0)).toBe(true);
  });

  it('picks int or double from a plain number', () => {
    expect(JSONValue.number(3)).toEqual({ kind: 'int', value: 3 });
    expect(JSONValue.number(3.5)).toEqual({ kind: 'double', value: 3.5 });
    expect(JSONValue.number(2 ** 60).kind).toBe('double');
  });

  it('builds objects from records, entry lists and maps', () => {
    const fromRecord = JSONValue.object({ a: JSONValue.int(1) });
    const fromEntries = JSONValue.object([['a', JSONValue.int(1)]]);
    const fromMap = JSONValue.object(new Map([['a', JSONValue.int(1)]]));

    expect(fromRecord.entries.get('a')).toEqual({ kind: 'int', value: 1 });
    expect(jsonValueEquals(fromRecord, fromEntries)).toBe(true);
    expect(jsonValueEquals(fromRecord, fromMap)).toBe(true);
    expect(JSONValue.object().entries.size).toBe(0);
  });

  it('is immutable', () => {
    const value = JSONValue.array([JSONValue.int(1)]);
    expect(Object.isFrozen(value)).toBe(true);
    expect(Object.isFrozen(value.items)).toBe(true);
  });
});

describe('accessors', () => {
  it('return the payload only for the matching variant', () => {
    expect(isNull(JSONValue.null)).toBe(true);
    expect(isNull(JSONValue.false)).toBe(false);
    expect(boolValue(JSONValue.true)).toBe(true);
    expect(boolValue(JSONValue.int(1))).toBeUndefined();
    expect(intValue(JSONValue.int(7))).toBe(7);
    expect(intValue(JSONValue.double(7))).toBeUndefined();
    expect(stringValue(JSONValue.string('x'))).toBe('x');
    expect(arrayValue(JSONValue.array([]))).toEqual([]);
    expect(objectValue(JSONValue.string('{}'))).toBeUndefined();
  });

  it('widens int through doubleValue', () => {
    expect(doubleValue(JSONValue.int(2))).toBe(2);
    expect(doubleValue(JSONValue.double(2.5))).toBe(2.5);
    expect(doubleValue(JSONValue.string('2'))).toBeUndefined();
  });
});

describe('equality and hashing', () => {
  const ab = JSONValue.object([
    ['a', JSONValue.int(1)],
    ['b', JSONValue.int(2)],
  ]);
  const ba = JSONValue.object([
    ['b', JSONValue.int(2)],
    ['a', JSONValue.int(1)],
  ]);

  it('ignores object key order', () => {
    expect(jsonValueEquals(ab, ba)).toBe(true);
    expect(jsonValueHash(ab)).toBe(jsonValueHash(ba));
  });

  it('respects array order', () => {
    const one = JSONValue.array([JSONValue.int(1), JSONValue.int(2)]);
    const two = JSONValue.array([JSONValue.int(2), JSONValue.int(1)]);
    expect(jsonValueEquals(one, two)).toBe(false);
  });

  it('keeps int and double distinct', () => {
    expect(jsonValueEquals(JSONValue.int(1), JSONValue.double(1))).toBe(false);
    expect(jsonValueHash(JSONValue.int(1))).not.toBe(jsonValueHash(JSONValue.double(1)));
  });

  it('compares nested structures', () => {
    const left = JSONValue.object({ list: JSONValue.array([ab]) });
    const right = JSONValue.object({ list: JSONValue.array([ba]) });
    const other = JSONValue.object({ list: JSONValue.array([JSONValue.null]) });
    expect(jsonValueEquals(left, right)).toBe(true);
    expect(jsonValueEquals(left, other)).toBe(false);
  });

  it('renders a tagged canonical text', () => {
    expect(canonicalJSONValueText(ba)).toBe('{"a":i1,"b":i2}');
    expect(
      canonicalJSONValueText(
        JSONValue.array([JSONValue.null, JSONValue.true, JSONValue.double(-0), JSONValue.string('s')])
      )
    ).toBe('[n,t,d0,s"s"]');
  });

  it('hashes to a hex sha-256 digest', () => {
    expect(jsonValueHash(JSONValue.null)).toMatch(/^[0-9a-f]{64}$/);
  });
});

describe('description', () => {
  it('renders scalars plainly', () => {
    expect(jsonValueDescription(JSONValue.null)).toBe('');
    expect(jsonValueDescription(JSONValue.true)).toBe('true');
    expect(jsonValueDescription(JSONValue.int(42))).toBe('42');
    expect(jsonValueDescription(JSONValue.double(42))).toBe('42.0');
    expect(jsonValueDescription(JSONValue.string('hi'))).toBe('hi');
  });

  it('quotes nested strings', () => {
    const value = JSONValue.object({
      name: JSONValue.string('Ada'),
      tags: JSONValue.array([JSONValue.string('x'), JSONValue.null]),
    });
    expect(jsonValueDescription(value)).toBe('{"name": "Ada", "tags": ["x", null]}');
  });
});

describe('formatDouble', () => {
  it.each([
    [42, '42.0'],
    [-1, '-1.0'],
    [0.5, '0.5'],
    [1e21, '1e+21'],
    [1.5e-7, '1.5e-7'],
  ])('formats %s as %s', (value, expected) => {
    expect(formatDouble(value)).toBe(expected);
  });
});
