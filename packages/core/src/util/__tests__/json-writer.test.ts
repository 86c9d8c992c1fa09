import { describe, it, expect } from 'vitest';

import { ErrorCode } from '../../errors/codes.js';
import { EncodeError } from '../../types/errors.js';
import { JSONValue } from '../../value/json-value.js';
import { compareCodeUnits, escapePointerToken, writeJSONValue } from '../json-writer.js';

const COMPACT = { indent: 0, sortKeys: false };

describe('writeJSONValue', () => {
  it('writes scalars', () => {
    expect(writeJSONValue(JSONValue.null, COMPACT)).toBe('null');
    expect(writeJSONValue(JSONValue.false, COMPACT)).toBe('false');
    expect(writeJSONValue(JSONValue.int(-7), COMPACT)).toBe('-7');
    expect(writeJSONValue(JSONValue.double(3), COMPACT)).toBe('3.0');
    expect(writeJSONValue(JSONValue.double(1e21), COMPACT)).toBe('1e+21');
    expect(writeJSONValue(JSONValue.string('a"\n'), COMPACT)).toBe('"a\\"\\n"');
  });

  it('keeps insertion order unless sorting', () => {
    const value = JSONValue.object([
      ['b', JSONValue.int(1)],
      ['a', JSONValue.int(2)],
    ]);
    expect(writeJSONValue(value, COMPACT)).toBe('{"b":1,"a":2}');
    expect(writeJSONValue(value, { indent: 0, sortKeys: true })).toBe('{"a":2,"b":1}');
  });

  it('sorts by code unit', () => {
    const value = JSONValue.object([
      ['b', JSONValue.null],
      ['B', JSONValue.null],
      ['a', JSONValue.null],
    ]);
    expect(writeJSONValue(value, { indent: 0, sortKeys: true })).toBe('{"B":null,"a":null,"b":null}');
    expect(['b', 'B', 'a'].sort(compareCodeUnits)).toEqual(['B', 'a', 'b']);
  });

  it('indents nested containers and keeps empty ones inline', () => {
    const value = JSONValue.object([
      ['list', JSONValue.array([JSONValue.int(1), JSONValue.array([])])],
      ['empty', JSONValue.object()],
    ]);
    expect(writeJSONValue(value, { indent: 2, sortKeys: false })).toBe(
      '{\n  "list": [\n    1,\n    []\n  ],\n  "empty": {}\n}'
    );
  });

  it('rejects non-finite doubles with their pointer', () => {
    const value = JSONValue.object([
      ['a/b', JSONValue.array([{ kind: 'double', value: Number.NaN }])],
    ]);
    try {
      writeJSONValue(value, COMPACT);
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(EncodeError);
      expect(error).toMatchObject({
        errorCode: ErrorCode.NON_FINITE_NUMBER,
        context: { schemaPath: '#/a~1b/0', valueExcerpt: 'NaN' },
      });
    }
  });
});

describe('escapePointerToken', () => {
  it('escapes tilde before slash', () => {
    expect(escapePointerToken('a~/b')).toBe('a~0~1b');
  });
});
