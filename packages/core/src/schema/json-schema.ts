/**
 * JSONSchema: an immutable tree over a draft-2020-12 subset.
 *
 * Each node is one variant of a closed union discriminated by `kind`.
 * Object `properties` keep insertion order; that order is what the encoder
 * writes.
 */

import {
  jsonValueEquals,
  type JSONValue,
} from '../value/json-value.js';
import { AdditionalProperties } from './additional-properties.js';
import { stringFormatEquals, type StringFormat } from './string-format.js';

/** Annotation and value-constraint fields shared by the typed variants */
export interface SchemaMetadata {
  readonly title?: string;
  readonly description?: string;
  readonly default?: JSONValue;
  readonly examples?: readonly JSONValue[];
  readonly enum?: readonly JSONValue[];
  readonly const?: JSONValue;
}

export interface ObjectSchema extends SchemaMetadata {
  readonly kind: 'object';
  readonly properties: ReadonlyMap<string, JSONSchema>;
  readonly required: readonly string[];
  readonly additionalProperties?: AdditionalProperties;
}

export interface ArraySchema extends SchemaMetadata {
  readonly kind: 'array';
  readonly items?: JSONSchema;
  readonly minItems?: number;
  readonly maxItems?: number;
  readonly uniqueItems?: boolean;
}

export interface StringSchema extends SchemaMetadata {
  readonly kind: 'string';
  readonly minLength?: number;
  readonly maxLength?: number;
  readonly pattern?: string;
  readonly format?: StringFormat;
}

export interface NumericBounds {
  readonly minimum?: number;
  readonly maximum?: number;
  readonly exclusiveMinimum?: number;
  readonly exclusiveMaximum?: number;
  readonly multipleOf?: number;
}

export interface NumberSchema extends SchemaMetadata, NumericBounds {
  readonly kind: 'number';
}

/** Same bounds as NumberSchema, restricted to integers */
export interface IntegerSchema extends SchemaMetadata, NumericBounds {
  readonly kind: 'integer';
}

export interface BooleanSchema extends SchemaMetadata {
  readonly kind: 'boolean';
}

export interface NullSchema {
  readonly kind: 'null';
}

/** `$ref`, kept as an opaque string */
export interface ReferenceSchema {
  readonly kind: 'reference';
  readonly ref: string;
}

export interface CompositeSchema<K extends 'anyOf' | 'allOf' | 'oneOf'> {
  readonly kind: K;
  readonly schemas: readonly JSONSchema[];
}

export interface NotSchema {
  readonly kind: 'not';
  readonly schema: JSONSchema;
}

/** `{}` */
export interface EmptySchema {
  readonly kind: 'empty';
}

/** `true`; `not(any)` stands for `false` */
export interface AnySchema {
  readonly kind: 'any';
}

export type JSONSchema =
  | ObjectSchema
  | ArraySchema
  | StringSchema
  | NumberSchema
  | IntegerSchema
  | BooleanSchema
  | NullSchema
  | ReferenceSchema
  | CompositeSchema<'anyOf'>
  | CompositeSchema<'allOf'>
  | CompositeSchema<'oneOf'>
  | NotSchema
  | EmptySchema
  | AnySchema;

export type JSONSchemaKind = JSONSchema['kind'];

export type TypedSchema =
  | ObjectSchema
  | ArraySchema
  | StringSchema
  | NumberSchema
  | IntegerSchema
  | BooleanSchema;

export type PropertiesInit =
  | ReadonlyMap<string, JSONSchema>
  | Iterable<readonly [string, JSONSchema]>
  | { readonly [name: string]: JSONSchema };

export interface ObjectSchemaInit extends SchemaMetadata {
  properties?: PropertiesInit;
  required?: readonly string[];
  /** `true`/`false`, or `AdditionalProperties.schema(...)` */
  additionalProperties?: AdditionalProperties | boolean;
}

type Init<S> = Omit<S, 'kind'>;

// ---------------------------------------------------------------------------
// Builders

const NULL_SCHEMA: NullSchema = Object.freeze({ kind: 'null' });
const EMPTY_SCHEMA: EmptySchema = Object.freeze({ kind: 'empty' });
const ANY_SCHEMA: AnySchema = Object.freeze({ kind: 'any' });
const NEVER_SCHEMA: NotSchema = Object.freeze({ kind: 'not', schema: ANY_SCHEMA });

/** Freeze a node, dropping keys explicitly set to undefined */
function build<S extends { kind: string }>(node: S): S {
  const copy = { ...node };
  for (const key of Object.keys(copy)) {
    if (Reflect.get(copy, key) === undefined) Reflect.deleteProperty(copy, key);
  }
  Object.freeze(copy);
  return copy;
}

function toPropertyMap(init: PropertiesInit | undefined): ReadonlyMap<string, JSONSchema> {
  if (init === undefined) return new Map();
  if (Symbol.iterator in init) return new Map(init);
  return new Map(Object.entries(init));
}

function toAdditionalProperties(
  value: ObjectSchemaInit['additionalProperties']
): AdditionalProperties | undefined {
  if (typeof value === 'boolean') return AdditionalProperties.boolean(value);
  return value;
}

export const JSONSchema = Object.freeze({
  object(init: ObjectSchemaInit = {}): ObjectSchema {
    const { properties, required, additionalProperties, ...metadata } = init;
    return build({
      ...metadata,
      kind: 'object',
      properties: toPropertyMap(properties),
      required: Object.freeze([...(required ?? [])]),
      additionalProperties: toAdditionalProperties(additionalProperties),
    });
  },
  array(init: Init<ArraySchema> = {}): ArraySchema {
    return build({ ...init, kind: 'array' });
  },
  string(init: Init<StringSchema> = {}): StringSchema {
    return build({ ...init, kind: 'string' });
  },
  number(init: Init<NumberSchema> = {}): NumberSchema {
    return build({ ...init, kind: 'number' });
  },
  integer(init: Init<IntegerSchema> = {}): IntegerSchema {
    return build({ ...init, kind: 'integer' });
  },
  boolean(init: Init<BooleanSchema> = {}): BooleanSchema {
    return build({ ...init, kind: 'boolean' });
  },
  null: NULL_SCHEMA,
  ref(ref: string): ReferenceSchema {
    return Object.freeze({ kind: 'reference', ref });
  },
  anyOf(schemas: readonly JSONSchema[]): CompositeSchema<'anyOf'> {
    return Object.freeze({ kind: 'anyOf', schemas: Object.freeze([...schemas]) });
  },
  allOf(schemas: readonly JSONSchema[]): CompositeSchema<'allOf'> {
    return Object.freeze({ kind: 'allOf', schemas: Object.freeze([...schemas]) });
  },
  oneOf(schemas: readonly JSONSchema[]): CompositeSchema<'oneOf'> {
    return Object.freeze({ kind: 'oneOf', schemas: Object.freeze([...schemas]) });
  },
  not(schema: JSONSchema): NotSchema {
    return schema.kind === 'any' ? NEVER_SCHEMA : Object.freeze({ kind: 'not', schema });
  },
  empty: EMPTY_SCHEMA,
  any: ANY_SCHEMA,
  /** The `false` schema */
  never: NEVER_SCHEMA,
});

export function isTypedSchema(schema: JSONSchema): schema is TypedSchema {
  switch (schema.kind) {
    case 'object':
    case 'array':
    case 'string':
    case 'number':
    case 'integer':
    case 'boolean':
      return true;
    default:
      return false;
  }
}

/** True for `not(any)`, the schema written as `false` */
export function isNeverSchema(schema: JSONSchema): boolean {
  return schema.kind === 'not' && schema.schema.kind === 'any';
}

// ---------------------------------------------------------------------------
// Equality

/**
 * Structural equality. `properties` compare in order, so two object schemas
 * listing the same properties differently are not equal.
 */
export function schemaEquals(a: JSONSchema, b: JSONSchema): boolean {
  if (a === b) return true;
  switch (a.kind) {
    case 'object':
      return (
        b.kind === 'object' &&
        metadataEquals(a, b) &&
        propertiesEqual(a.properties, b.properties) &&
        arrayEquals(a.required, b.required, (x, y) => x === y) &&
        optionalEquals(a.additionalProperties, b.additionalProperties, additionalEquals)
      );
    case 'array':
      return (
        b.kind === 'array' &&
        metadataEquals(a, b) &&
        optionalEquals(a.items, b.items, schemaEquals) &&
        a.minItems === b.minItems &&
        a.maxItems === b.maxItems &&
        a.uniqueItems === b.uniqueItems
      );
    case 'string':
      return (
        b.kind === 'string' &&
        metadataEquals(a, b) &&
        a.minLength === b.minLength &&
        a.maxLength === b.maxLength &&
        a.pattern === b.pattern &&
        optionalEquals(a.format, b.format, stringFormatEquals)
      );
    case 'number':
      return b.kind === 'number' && metadataEquals(a, b) && boundsEqual(a, b);
    case 'integer':
      return b.kind === 'integer' && metadataEquals(a, b) && boundsEqual(a, b);
    case 'boolean':
      return b.kind === 'boolean' && metadataEquals(a, b);
    case 'reference':
      return b.kind === 'reference' && a.ref === b.ref;
    case 'anyOf':
    case 'allOf':
    case 'oneOf':
      return (
        b.kind === a.kind &&
        'schemas' in b &&
        arrayEquals(a.schemas, b.schemas, schemaEquals)
      );
    case 'not':
      return b.kind === 'not' && schemaEquals(a.schema, b.schema);
    case 'null':
    case 'empty':
    case 'any':
      return b.kind === a.kind;
  }
}

function metadataEquals(a: SchemaMetadata, b: SchemaMetadata): boolean {
  return (
    a.title === b.title &&
    a.description === b.description &&
    optionalEquals(a.default, b.default, jsonValueEquals) &&
    optionalEquals(a.examples, b.examples, valueListEquals) &&
    optionalEquals(a.enum, b.enum, valueListEquals) &&
    optionalEquals(a.const, b.const, jsonValueEquals)
  );
}

function boundsEqual(a: NumericBounds, b: NumericBounds): boolean {
  return (
    a.minimum === b.minimum &&
    a.maximum === b.maximum &&
    a.exclusiveMinimum === b.exclusiveMinimum &&
    a.exclusiveMaximum === b.exclusiveMaximum &&
    a.multipleOf === b.multipleOf
  );
}

function propertiesEqual(
  a: ReadonlyMap<string, JSONSchema>,
  b: ReadonlyMap<string, JSONSchema>
): boolean {
  if (a.size !== b.size) return false;
  const left = [...a];
  const right = [...b];
  return left.every(([name, schema], index) => {
    const other = right[index];
    return other !== undefined && other[0] === name && schemaEquals(schema, other[1]);
  });
}

function additionalEquals(a: AdditionalProperties, b: AdditionalProperties): boolean {
  if (a.kind === 'boolean') return b.kind === 'boolean' && a.value === b.value;
  return b.kind === 'schema' && schemaEquals(a.schema, b.schema);
}

function valueListEquals(a: readonly JSONValue[], b: readonly JSONValue[]): boolean {
  return arrayEquals(a, b, jsonValueEquals);
}

function arrayEquals<T>(
  a: readonly T[],
  b: readonly T[],
  equals: (x: T, y: T) => boolean
): boolean {
  if (a.length !== b.length) return false;
  return a.every((item, index) => {
    const other = b[index];
    return other !== undefined && equals(item, other);
  });
}

function optionalEquals<T>(
  a: T | undefined,
  b: T | undefined,
  equals: (x: T, y: T) => boolean
): boolean {
  if (a === undefined || b === undefined) return a === b;
  return equals(a, b);
}
