import type { JSONValue } from '../value/json-value.js';
import type { JSONSchema } from './json-schema.js';

export interface CompatibilityOptions {
  /** When false, `int` satisfies `number` and integral doubles satisfy `integer` (default: true) */
  strict?: boolean;
}

/**
 * Type-level check of a value against the type a schema declares. Only the
 * JSON type is compared; keywords such as `minimum` or `pattern` are not
 * evaluated. Composite, reference, empty and any schemas accept every value.
 */
export function isCompatible(
  value: JSONValue,
  schema: JSONSchema,
  options: CompatibilityOptions = {}
): boolean {
  const strict = options.strict ?? true;

  switch (schema.kind) {
    case 'object':
      return value.kind === 'object';
    case 'array':
      return value.kind === 'array';
    case 'string':
      return value.kind === 'string';
    case 'boolean':
      return value.kind === 'bool';
    case 'null':
      return value.kind === 'null';
    case 'number':
      return value.kind === 'double' || (!strict && value.kind === 'int');
    case 'integer':
      return (
        value.kind === 'int' ||
        (!strict && value.kind === 'double' && Number.isInteger(value.value))
      );
    case 'reference':
    case 'anyOf':
    case 'allOf':
    case 'oneOf':
    case 'not':
    case 'empty':
    case 'any':
      return true;
  }
}
