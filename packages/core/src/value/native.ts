/**
 * Conversions between JSONValue and plain JavaScript data.
 */

import { ErrorCode } from '../errors/codes.js';
import { EncodeError } from '../types/errors.js';
import { escapePointerToken } from '../util/json-writer.js';
import { JSONValue } from './json-value.js';

/**
 * Native data that maps onto JSON directly. `fromNative` accepts `unknown`
 * and validates; this type documents the happy path.
 */
export type NativeJSON =
  | null
  | boolean
  | number
  | string
  | NativeJSON[]
  | { [key: string]: NativeJSON };

/**
 * Build a JSONValue from native data. Safe integers become `int`, other
 * finite numbers `double`. Object properties holding `undefined` are
 * skipped; `undefined` anywhere else, functions, symbols, non-finite
 * numbers, bigints outside the safe range and cycles throw EncodeError.
 * Objects with a `toJSON` method (Date) are converted through it.
 */
export function fromNative(native: unknown): JSONValue {
  return convert(native, '#', new Set<object>());
}

function convert(native: unknown, pointer: string, ancestors: Set<object>): JSONValue {
  if (native === null) return JSONValue.null;

  switch (typeof native) {
    case 'boolean':
      return JSONValue.bool(native);
    case 'string':
      return JSONValue.string(native);
    case 'number':
      if (!Number.isFinite(native)) {
        throw new EncodeError({
          message: `Cannot encode non-finite number ${native} at ${pointer}`,
          errorCode: ErrorCode.NON_FINITE_NUMBER,
          context: { schemaPath: pointer, valueExcerpt: String(native) },
        });
      }
      return JSONValue.number(native);
    case 'bigint': {
      const asNumber = Number(native);
      if (!Number.isSafeInteger(asNumber)) {
        throw unsupported(pointer, `bigint ${native.toString()} is outside the safe integer range`);
      }
      return JSONValue.int(asNumber);
    }
    case 'object':
      break;
    default:
      throw unsupported(pointer, `values of type ${typeof native} have no JSON form`);
  }

  if (ancestors.has(native)) {
    throw new EncodeError({
      message: `Circular structure at ${pointer}`,
      errorCode: ErrorCode.CIRCULAR_STRUCTURE,
      context: { schemaPath: pointer },
    });
  }

  ancestors.add(native);
  try {
    if (Array.isArray(native)) {
      const items: unknown[] = native;
      return JSONValue.array(
        items.map((item, index) => convert(item, `${pointer}/${index}`, ancestors))
      );
    }

    if (native instanceof Map) {
      const entries = new Map<string, JSONValue>();
      for (const [key, item] of native) {
        if (typeof key !== 'string') {
          throw unsupported(pointer, 'Map keys must be strings');
        }
        entries.set(key, convert(item, `${pointer}/${escapePointerToken(key)}`, ancestors));
      }
      return JSONValue.object(entries);
    }

    if ('toJSON' in native && typeof native.toJSON === 'function') {
      const replaced: unknown = native.toJSON();
      return convert(replaced, pointer, ancestors);
    }

    const entries = new Map<string, JSONValue>();
    for (const [key, item] of Object.entries(native)) {
      if (item === undefined) continue;
      entries.set(key, convert(item, `${pointer}/${escapePointerToken(key)}`, ancestors));
    }
    return JSONValue.object(entries);
  } finally {
    ancestors.delete(native);
  }
}

function unsupported(pointer: string, detail: string): EncodeError {
  return new EncodeError({
    message: `Cannot encode value at ${pointer}: ${detail}`,
    errorCode: ErrorCode.UNSUPPORTED_NATIVE_VALUE,
    context: { schemaPath: pointer },
  });
}

/**
 * Plain JavaScript data for a JSONValue. `int` and `double` both become
 * numbers; objects become plain objects with own data properties.
 */
export function toNative(value: JSONValue): NativeJSON {
  switch (value.kind) {
    case 'null':
      return null;
    case 'bool':
    case 'int':
    case 'double':
    case 'string':
      return value.value;
    case 'array':
      return value.items.map(toNative);
    case 'object':
      return Object.fromEntries(
        [...value.entries].map(([key, item]) => [key, toNative(item)])
      );
  }
}
