import { describe, it, expect } from 'vitest';

import { findDepthViolation, scanStringEnd, skipWhitespace } from '../json-scan.js';

describe('skipWhitespace', () => {
  it('stops at the first JSON token', () => {
    expect(skipWhitespace(' \t\r\n{', 0)).toBe(4);
    expect(skipWhitespace('{}', 1)).toBe(1);
    expect(skipWhitespace('   ', 0)).toBe(3);
  });
});

describe('scanStringEnd', () => {
  it('returns the index past the closing quote', () => {
    expect(scanStringEnd('"abc": 1', 0)).toBe(5);
  });

  it('skips escaped quotes and backslashes', () => {
    expect(scanStringEnd('"a\\"b"', 0)).toBe(6);
    expect(scanStringEnd('"a\\\\"x', 0)).toBe(5);
  });

  it('reports unterminated literals', () => {
    expect(scanStringEnd('"abc', 0)).toBe(-1);
    expect(scanStringEnd('"abc\\"', 0)).toBe(-1);
  });
});

describe('findDepthViolation', () => {
  it('returns the offset of the first container past the limit', () => {
    expect(findDepthViolation('[[[]]]', 2)).toBe(2);
    expect(findDepthViolation('{"a": {"b": []}}', 2)).toBe(12);
  });

  it('accepts text within the limit', () => {
    expect(findDepthViolation('[[]]', 2)).toBeUndefined();
    expect(findDepthViolation('[], [], []', 1)).toBeUndefined();
  });

  it('ignores brackets inside strings', () => {
    expect(findDepthViolation('["[[[[", "{{{{"]', 1)).toBeUndefined();
  });
});
