import type { JSONSchema } from './json-schema.js';

/**
 * `additionalProperties`: either a plain boolean or a schema that extra
 * properties must satisfy.
 */
export type AdditionalProperties =
  | { readonly kind: 'boolean'; readonly value: boolean }
  | { readonly kind: 'schema'; readonly schema: JSONSchema };

const ALLOWED: AdditionalProperties = Object.freeze({ kind: 'boolean', value: true });
const FORBIDDEN: AdditionalProperties = Object.freeze({ kind: 'boolean', value: false });

export const AdditionalProperties = Object.freeze({
  boolean(value: boolean): AdditionalProperties {
    return value ? ALLOWED : FORBIDDEN;
  },
  schema(schema: JSONSchema): AdditionalProperties {
    return Object.freeze({ kind: 'schema', schema });
  },
});
