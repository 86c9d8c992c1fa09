/**
 * JSON text codec for JSONValue.
 */

import { parseJSONDocument, type JSONInput } from '../parser/json-text-parser.js';
import type { DecodeError } from '../types/errors.js';
import {
  resolveDecodeOptions,
  resolveEncodeOptions,
  type EncodeOptions,
} from '../types/options.js';
import { ok, type Result } from '../types/result.js';
import { writeJSONValue } from '../util/json-writer.js';
import type { JSONValue } from './json-value.js';

export interface ValueDecodeOptions {
  /** Maximum nesting depth of arrays/objects (default: 256) */
  maxDepth?: number;
}

/**
 * Parse JSON text (or UTF-8 bytes) into a JSONValue. Literals without a
 * fraction or exponent decode as `int` when they fit a safe integer. A
 * repeated object key keeps its last value.
 */
export function decodeJSONValue(
  input: JSONInput,
  options: ValueDecodeOptions = {}
): Result<JSONValue, DecodeError> {
  const { maxDepth } = resolveDecodeOptions({ maxDepth: options.maxDepth });
  const parsed = parseJSONDocument(input, maxDepth);
  if (parsed.isErr()) return parsed;
  return ok(parsed.value.value);
}

/**
 * Serialize a JSONValue. Integral doubles keep a fractional part (`42.0`),
 * so decoding the output yields an equal value.
 *
 * @throws EncodeError for non-finite doubles
 * @throws ConfigError for invalid options
 */
export function encodeJSONValue(
  value: JSONValue,
  options: EncodeOptions = {}
): string {
  return writeJSONValue(value, resolveEncodeOptions(options));
}
