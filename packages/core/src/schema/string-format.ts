/**
 * `format` keyword values for string schemas.
 */

export const STANDARD_STRING_FORMATS = [
  'date-time',
  'date',
  'time',
  'duration',
  'email',
  'idn-email',
  'hostname',
  'idn-hostname',
  'ipv4',
  'ipv6',
  'uri',
  'uri-reference',
  'iri-reference',
  'uri-template',
  'json-pointer',
  'relative-json-pointer',
  'regex',
  'uuid',
] as const;

export type StandardStringFormat = (typeof STANDARD_STRING_FORMATS)[number];

export interface CustomStringFormat {
  readonly kind: 'custom';
  readonly value: string;
}

export type StringFormat = StandardStringFormat | CustomStringFormat;

const STANDARD_SET: ReadonlySet<string> = new Set(STANDARD_STRING_FORMATS);

export function isStandardStringFormat(raw: string): raw is StandardStringFormat {
  return STANDARD_SET.has(raw);
}

/**
 * Total: a recognized name yields the named format, anything else a custom
 * format carrying the raw string.
 */
export function parseStringFormat(raw: string): StringFormat {
  return isStandardStringFormat(raw) ? raw : customStringFormat(raw);
}

export function customStringFormat(value: string): CustomStringFormat {
  return Object.freeze({ kind: 'custom', value });
}

export function stringFormatToRaw(format: StringFormat): string {
  return typeof format === 'string' ? format : format.value;
}

export function stringFormatEquals(a: StringFormat, b: StringFormat): boolean {
  if (typeof a === 'string' || typeof b === 'string') return a === b;
  return a.value === b.value;
}
