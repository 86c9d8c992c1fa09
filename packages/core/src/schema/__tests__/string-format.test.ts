import { describe, it, expect } from 'vitest';

import {
  STANDARD_STRING_FORMATS,
  customStringFormat,
  isStandardStringFormat,
  parseStringFormat,
  stringFormatEquals,
  stringFormatToRaw,
} from '../string-format.js';

describe('StringFormat', () => {
  it('lists the eighteen standard formats', () => {
    expect(STANDARD_STRING_FORMATS).toHaveLength(18);
    expect(STANDARD_STRING_FORMATS).toContain('relative-json-pointer');
  });

  it.each([...STANDARD_STRING_FORMATS])('parses %s as a named format', (name) => {
    expect(parseStringFormat(name)).toBe(name);
    expect(stringFormatToRaw(parseStringFormat(name))).toBe(name);
  });

  it('falls back to custom for unknown names', () => {
    expect(parseStringFormat('semver')).toEqual({ kind: 'custom', value: 'semver' });
    expect(parseStringFormat('Date-Time')).toEqual({ kind: 'custom', value: 'Date-Time' });
    expect(stringFormatToRaw(customStringFormat('semver'))).toBe('semver');
  });

  it('recognizes names exactly', () => {
    expect(isStandardStringFormat('email')).toBe(true);
    expect(isStandardStringFormat(' email')).toBe(false);
  });

  it('compares formats structurally', () => {
    expect(stringFormatEquals('email', 'email')).toBe(true);
    expect(stringFormatEquals(customStringFormat('x'), customStringFormat('x'))).toBe(true);
    expect(stringFormatEquals('email', customStringFormat('email'))).toBe(false);
  });
});
