/**
 * JSONSchema → JSON Schema document.
 *
 * Typed variants write `type` first, then the shared annotations, then their
 * own keywords. Unset fields and empty `properties`/`required` are omitted.
 */

import { ErrorCode } from '../errors/codes.js';
import { EncodeError } from '../types/errors.js';
import { resolveEncodeOptions, type EncodeOptions } from '../types/options.js';
import { escapePointerToken, writeJSONValue } from '../util/json-writer.js';
import { JSONValue } from '../value/json-value.js';
import type {
  JSONSchema,
  NumericBounds,
  SchemaMetadata,
  TypedSchema,
} from './json-schema.js';
import { stringFormatToRaw } from './string-format.js';

type Members = Array<[string, JSONValue]>;

/**
 * Serialize a schema to JSON text.
 *
 * @throws EncodeError when a numeric keyword is not finite
 * @throws ConfigError for invalid options
 */
export function encodeSchema(schema: JSONSchema, options: EncodeOptions = {}): string {
  const resolved = resolveEncodeOptions(options);
  return writeJSONValue(encodeSchemaToValue(schema), resolved);
}

/** The schema document as a JSONValue */
export function encodeSchemaToValue(schema: JSONSchema): JSONValue {
  return encodeNode(schema, '#');
}

function encodeNode(schema: JSONSchema, pointer: string): JSONValue {
  switch (schema.kind) {
    case 'any':
      return JSONValue.true;
    case 'empty':
      return JSONValue.object();
    case 'null':
      return JSONValue.object([['type', JSONValue.string('null')]]);
    case 'reference':
      return JSONValue.object([['$ref', JSONValue.string(schema.ref)]]);
    case 'anyOf':
    case 'allOf':
    case 'oneOf':
      return JSONValue.object([
        [
          schema.kind,
          JSONValue.array(
            schema.schemas.map((item, index) =>
              encodeNode(item, `${pointer}/${schema.kind}/${index}`)
            )
          ),
        ],
      ]);
    case 'not':
      if (schema.schema.kind === 'any') return JSONValue.false;
      return JSONValue.object([['not', encodeNode(schema.schema, `${pointer}/not`)]]);
    default:
      return encodeTyped(schema, pointer);
  }
}

function encodeTyped(schema: TypedSchema, pointer: string): JSONValue {
  const members: Members = [['type', JSONValue.string(schema.kind)]];
  pushMetadata(members, schema);

  switch (schema.kind) {
    case 'object': {
      if (schema.properties.size > 0) {
        const properties = new Map<string, JSONValue>();
        for (const [name, property] of schema.properties) {
          properties.set(
            name,
            encodeNode(property, `${pointer}/properties/${escapePointerToken(name)}`)
          );
        }
        members.push(['properties', JSONValue.object(properties)]);
      }
      if (schema.required.length > 0) {
        members.push(['required', JSONValue.array(schema.required.map(JSONValue.string))]);
      }
      const additional = schema.additionalProperties;
      if (additional !== undefined) {
        members.push([
          'additionalProperties',
          additional.kind === 'boolean'
            ? JSONValue.bool(additional.value)
            : encodeNode(additional.schema, `${pointer}/additionalProperties`),
        ]);
      }
      break;
    }
    case 'array':
      if (schema.items !== undefined) {
        members.push(['items', encodeNode(schema.items, `${pointer}/items`)]);
      }
      pushNumber(members, 'minItems', schema.minItems, pointer);
      pushNumber(members, 'maxItems', schema.maxItems, pointer);
      if (schema.uniqueItems !== undefined) {
        members.push(['uniqueItems', JSONValue.bool(schema.uniqueItems)]);
      }
      break;
    case 'string':
      pushNumber(members, 'minLength', schema.minLength, pointer);
      pushNumber(members, 'maxLength', schema.maxLength, pointer);
      if (schema.pattern !== undefined) {
        members.push(['pattern', JSONValue.string(schema.pattern)]);
      }
      if (schema.format !== undefined) {
        members.push(['format', JSONValue.string(stringFormatToRaw(schema.format))]);
      }
      break;
    case 'number':
    case 'integer':
      pushBounds(members, schema, pointer);
      break;
    case 'boolean':
      break;
  }

  return JSONValue.object(members);
}

function pushMetadata(members: Members, metadata: SchemaMetadata): void {
  if (metadata.title !== undefined) {
    members.push(['title', JSONValue.string(metadata.title)]);
  }
  if (metadata.description !== undefined) {
    members.push(['description', JSONValue.string(metadata.description)]);
  }
  if (metadata.default !== undefined) members.push(['default', metadata.default]);
  if (metadata.examples !== undefined) {
    members.push(['examples', JSONValue.array(metadata.examples)]);
  }
  if (metadata.enum !== undefined) members.push(['enum', JSONValue.array(metadata.enum)]);
  if (metadata.const !== undefined) members.push(['const', metadata.const]);
}

const BOUND_KEYWORDS = [
  'minimum',
  'maximum',
  'exclusiveMinimum',
  'exclusiveMaximum',
  'multipleOf',
] as const satisfies ReadonlyArray<keyof NumericBounds>;

function pushBounds(members: Members, bounds: NumericBounds, pointer: string): void {
  for (const keyword of BOUND_KEYWORDS) {
    pushNumber(members, keyword, bounds[keyword], pointer);
  }
}

// Plain numbers: integral values are written without a fraction
function pushNumber(
  members: Members,
  keyword: string,
  value: number | undefined,
  pointer: string
): void {
  if (value === undefined) return;
  if (!Number.isFinite(value)) {
    throw new EncodeError({
      message: `Cannot encode non-finite ${keyword} (${value}) at ${pointer}`,
      errorCode: ErrorCode.NON_FINITE_NUMBER,
      context: { schemaPath: pointer, keyword, valueExcerpt: String(value) },
    });
  }
  members.push([keyword, JSONValue.number(value)]);
}
