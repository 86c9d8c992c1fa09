/**
 * JSON text writer for JSONValue trees.
 *
 * Layout follows JSON.stringify: compact by default, otherwise one member
 * per line indented by `indent` spaces, with empty containers kept inline.
 */

import { ErrorCode } from '../errors/codes.js';
import { EncodeError } from '../types/errors.js';
import { formatDouble, type JSONValue } from '../value/json-value.js';

export interface WriterOptions {
  indent: number;
  sortKeys: boolean;
}

export function writeJSONValue(value: JSONValue, options: WriterOptions): string {
  return write(value, options, '', '#');
}

function write(
  value: JSONValue,
  options: WriterOptions,
  currentIndent: string,
  pointer: string
): string {
  switch (value.kind) {
    case 'null':
      return 'null';
    case 'bool':
      return value.value ? 'true' : 'false';
    case 'int':
      return String(value.value);
    case 'double':
      if (!Number.isFinite(value.value)) {
        throw new EncodeError({
          message: `Cannot encode non-finite number ${value.value}`,
          errorCode: ErrorCode.NON_FINITE_NUMBER,
          context: { schemaPath: pointer, valueExcerpt: String(value.value) },
        });
      }
      return formatDouble(value.value);
    case 'string':
      return JSON.stringify(value.value);
    case 'array': {
      const parts = value.items.map((item, index) =>
        write(item, options, childIndent(currentIndent, options), `${pointer}/${index}`)
      );
      return wrap('[', ']', parts, currentIndent, options);
    }
    case 'object': {
      const keys = [...value.entries.keys()];
      if (options.sortKeys) keys.sort(compareCodeUnits);
      const inner = childIndent(currentIndent, options);
      const separator = options.indent > 0 ? ': ' : ':';
      const parts = keys.map((key) => {
        const item = value.entries.get(key);
        const text =
          item === undefined
            ? 'null'
            : write(item, options, inner, `${pointer}/${escapePointerToken(key)}`);
        return `${JSON.stringify(key)}${separator}${text}`;
      });
      return wrap('{', '}', parts, currentIndent, options);
    }
  }
}

function childIndent(currentIndent: string, options: WriterOptions): string {
  return currentIndent + ' '.repeat(options.indent);
}

function wrap(
  open: string,
  close: string,
  parts: readonly string[],
  currentIndent: string,
  options: WriterOptions
): string {
  if (parts.length === 0) return `${open}${close}`;
  if (options.indent === 0) return `${open}${parts.join(',')}${close}`;
  const inner = childIndent(currentIndent, options);
  const body = parts.map((part) => `${inner}${part}`).join(',\n');
  return `${open}\n${body}\n${currentIndent}${close}`;
}

/** Code-unit order, independent of locale */
export function compareCodeUnits(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function escapePointerToken(token: string): string {
  return token.replace(/~/g, '~0').replace(/\//g, '~1');
}
