/**
 * Native-scalar conversions out of JSONValue.
 *
 * Every conversion takes a `strict` flag (default true) and returns
 * `undefined` when the value does not convert; none of them throw.
 */

import { formatDouble, type JSONValue } from './json-value.js';

export interface ConversionOptions {
  strict?: boolean;
}

const TRUE_TOKENS: ReadonlySet<string> = new Set([
  'true',
  't',
  'yes',
  'y',
  'on',
  '1',
]);
const FALSE_TOKENS: ReadonlySet<string> = new Set([
  'false',
  'f',
  'no',
  'n',
  'off',
  '0',
]);

const INTEGER_TEXT = /^[+-]?\d+$/;
const DECIMAL_TEXT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

function isStrict(options: ConversionOptions | undefined): boolean {
  return options?.strict ?? true;
}

/**
 * Strict: `bool` only. Non-strict also accepts 0/1 numbers and the
 * lowercase tokens true/t/yes/y/on/1 and false/f/no/n/off/0.
 */
export function toBool(
  value: JSONValue,
  options?: ConversionOptions
): boolean | undefined {
  if (value.kind === 'bool') return value.value;
  if (isStrict(options)) return undefined;

  switch (value.kind) {
    case 'int':
    case 'double':
      if (value.value === 0) return false;
      if (value.value === 1) return true;
      return undefined;
    case 'string':
      if (TRUE_TOKENS.has(value.value)) return true;
      if (FALSE_TOKENS.has(value.value)) return false;
      return undefined;
    default:
      return undefined;
  }
}

/**
 * Strict: `int` only. Non-strict also accepts integral doubles in the safe
 * integer range and base-10 integer strings.
 */
export function toInt(
  value: JSONValue,
  options?: ConversionOptions
): number | undefined {
  if (value.kind === 'int') return value.value;
  if (isStrict(options)) return undefined;

  switch (value.kind) {
    case 'double':
      return Number.isSafeInteger(value.value)
        ? normalizeZero(value.value)
        : undefined;
    case 'string': {
      if (!INTEGER_TEXT.test(value.value)) return undefined;
      const parsed = Number(value.value);
      return Number.isSafeInteger(parsed) ? normalizeZero(parsed) : undefined;
    }
    default:
      return undefined;
  }
}

/**
 * Strict: `double` or `int`. Non-strict also accepts decimal strings.
 */
export function toDouble(
  value: JSONValue,
  options?: ConversionOptions
): number | undefined {
  if (value.kind === 'double' || value.kind === 'int') return value.value;
  if (isStrict(options)) return undefined;

  if (value.kind === 'string' && DECIMAL_TEXT.test(value.value)) {
    const parsed = Number(value.value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/**
 * Strict: `string` only. Non-strict also renders numbers and booleans in
 * their canonical form (`42`, `42.0`, `true`).
 */
export function toString(
  value: JSONValue,
  options?: ConversionOptions
): string | undefined {
  if (value.kind === 'string') return value.value;
  if (isStrict(options)) return undefined;

  switch (value.kind) {
    case 'int':
      return String(value.value);
    case 'double':
      return formatDouble(value.value);
    case 'bool':
      return value.value ? 'true' : 'false';
    default:
      return undefined;
  }
}

function normalizeZero(value: number): number {
  return value === 0 ? 0 : value;
}
