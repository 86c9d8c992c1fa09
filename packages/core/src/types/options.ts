/**
 * Configuration options for decoding and encoding
 *
 * All options are optional with conservative defaults; `resolve*Options`
 * merges user input over the defaults and validates the result.
 */

import { ConfigError } from './errors.js';

export interface DecodeOptions {
  /**
   * Iteration order for the `properties` of every object schema decoded in
   * the call. Listed names come first, in list order; names missing from
   * the list follow in their natural decode order.
   */
  propertyOrder?: readonly string[];
  /** Maximum nesting depth of arrays/objects (default: 256) */
  maxDepth?: number;
}

export interface EncodeOptions {
  /**
   * Pretty-print with the given indentation. `true` means two spaces,
   * `false` or `0` produce compact output (default: false)
   */
  pretty?: boolean | number;
  /** Emit object keys in code-unit order, including `properties` (default: false) */
  sortKeys?: boolean;
}

export interface ResolvedDecodeOptions {
  propertyOrder: readonly string[] | undefined;
  maxDepth: number;
}

export interface ResolvedEncodeOptions {
  indent: number;
  sortKeys: boolean;
}

export const DEFAULT_DECODE_OPTIONS: ResolvedDecodeOptions = Object.freeze({
  propertyOrder: undefined,
  maxDepth: 256,
});

export const DEFAULT_ENCODE_OPTIONS: ResolvedEncodeOptions = Object.freeze({
  indent: 0,
  sortKeys: false,
});

const MAX_INDENT = 10;

export function resolveDecodeOptions(
  options: DecodeOptions = {}
): ResolvedDecodeOptions {
  const resolved: ResolvedDecodeOptions = {
    propertyOrder: options.propertyOrder ?? DEFAULT_DECODE_OPTIONS.propertyOrder,
    maxDepth: options.maxDepth ?? DEFAULT_DECODE_OPTIONS.maxDepth,
  };

  if (!Number.isInteger(resolved.maxDepth) || resolved.maxDepth <= 0) {
    throw new ConfigError('maxDepth must be a positive integer', 'maxDepth');
  }
  if (resolved.propertyOrder !== undefined) {
    if (!Array.isArray(resolved.propertyOrder)) {
      throw new ConfigError(
        'propertyOrder must be an array of strings',
        'propertyOrder'
      );
    }
    for (const name of resolved.propertyOrder) {
      if (typeof name !== 'string') {
        throw new ConfigError(
          'propertyOrder must be an array of strings',
          'propertyOrder'
        );
      }
    }
  }
  return resolved;
}

export function resolveEncodeOptions(
  options: EncodeOptions = {}
): ResolvedEncodeOptions {
  const pretty = options.pretty ?? false;
  const indent = pretty === true ? 2 : pretty === false ? 0 : pretty;
  if (!Number.isInteger(indent) || indent < 0 || indent > MAX_INDENT) {
    throw new ConfigError(
      `pretty must be a boolean or an integer between 0 and ${MAX_INDENT}`,
      'pretty'
    );
  }
  return {
    indent,
    sortKeys: options.sortKeys ?? DEFAULT_ENCODE_OPTIONS.sortKeys,
  };
}
