import {
  ConfigError,
  type DecodeOptions,
  type EncodeOptions,
} from '@schemakit/core';

/**
 * CLI options interface matching Commander.js option structure
 */
export interface CliOptions {
  indent?: string | number;
  sortKeys?: boolean;
  maxDepth?: string | number;
  order?: string;
  path?: string;
  json?: boolean;
  quiet?: boolean;
}

/**
 * Parse an integer flag. Commander hands option values over as strings;
 * absent flags stay undefined so the library defaults apply.
 */
function parseIntegerFlag(name: string, value: unknown): number | undefined {
  if (value === undefined) return undefined;
  const num = typeof value === 'number' ? value : Number(String(value).trim());
  if (!Number.isInteger(num) || String(value).trim() === '') {
    throw new ConfigError(
      `Invalid --${name} value "${String(value)}". Expected an integer.`,
      name
    );
  }
  return num;
}

/**
 * Encode options from --indent and --sort-keys. The range of --indent is
 * checked by the library.
 */
export function resolveEncodeFlags(
  options: Pick<CliOptions, 'indent' | 'sortKeys'>
): EncodeOptions {
  const indent = parseIntegerFlag('indent', options.indent);
  return {
    pretty: indent ?? false,
    sortKeys: options.sortKeys === true,
  };
}

export function resolveDecodeFlags(
  options: Pick<CliOptions, 'maxDepth' | 'order'>
): DecodeOptions {
  return {
    maxDepth: parseIntegerFlag('max-depth', options.maxDepth),
    propertyOrder: parseNameList(options.order),
  };
}

/**
 * Split a comma-separated list of property names. Blank entries are
 * dropped; an absent or blank flag yields undefined.
 */
export function parseNameList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  const names = value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
  return names.length > 0 ? names : undefined;
}

/**
 * Resolve --path into key segments: `a.b` → ['a', 'b']; absent or empty
 * means the root object.
 */
export function parseKeyPath(value: string | undefined): string[] {
  if (value === undefined || value === '') return [];
  const segments = value.split('.');
  if (segments.some((segment) => segment === '')) {
    throw new ConfigError(
      `Invalid --path value "${value}". Segments must not be empty.`,
      'path'
    );
  }
  return segments;
}
