/**
 * JSON Schema document → JSONSchema.
 *
 * Dispatch order: boolean literal, `$ref`, `anyOf`, `allOf`, `oneOf`, `not`,
 * then `type`. An object without `type` is `empty` when it has no keys and
 * `any` otherwise. Keywords the chosen variant does not carry are dropped
 * and reported as notes.
 */

import { ErrorCode } from '../errors/codes.js';
import { extractSchemaPropertyOrder } from '../order/property-order.js';
import {
  depthError,
  parseJSONDocument,
  type JSONInput,
} from '../parser/json-text-parser.js';
import { DecodeError } from '../types/errors.js';
import {
  resolveDecodeOptions,
  type DecodeOptions,
  type ResolvedDecodeOptions,
} from '../types/options.js';
import { err, ok, type Result } from '../types/result.js';
import { escapePointerToken, writeJSONValue } from '../util/json-writer.js';
import type { JSONValue } from '../value/json-value.js';
import { AdditionalProperties } from './additional-properties.js';
import {
  JSONSchema,
  type NumericBounds,
  type SchemaMetadata,
} from './json-schema.js';
import { parseStringFormat } from './string-format.js';

export type DecodeNoteCode =
  | 'UNRECOGNIZED_KEYWORDS_DROPPED'
  | 'KEYWORDS_IGNORED'
  | 'DUPLICATE_KEY';

export interface DecodeNote {
  /** JSON Pointer of the schema (or object) the note is about */
  schemaPath: string;
  code: DecodeNoteCode;
  details?: { keywords?: string[]; key?: string };
}

export interface DecodedSchemaDocument {
  schema: JSONSchema;
  notes: DecodeNote[];
}

type Members = ReadonlyMap<string, JSONValue>;

const METADATA_KEYWORDS = [
  'title',
  'description',
  'default',
  'examples',
  'enum',
  'const',
] as const;

const BOUND_KEYWORDS = [
  'minimum',
  'maximum',
  'exclusiveMinimum',
  'exclusiveMaximum',
  'multipleOf',
] as const satisfies ReadonlyArray<keyof NumericBounds>;

const KEYWORDS_BY_TYPE: ReadonlyMap<string, readonly string[]> = new Map([
  ['object', ['type', ...METADATA_KEYWORDS, 'properties', 'required', 'additionalProperties']],
  ['array', ['type', ...METADATA_KEYWORDS, 'items', 'minItems', 'maxItems', 'uniqueItems']],
  ['string', ['type', ...METADATA_KEYWORDS, 'minLength', 'maxLength', 'pattern', 'format']],
  ['number', ['type', ...METADATA_KEYWORDS, ...BOUND_KEYWORDS]],
  ['integer', ['type', ...METADATA_KEYWORDS, ...BOUND_KEYWORDS]],
  ['boolean', ['type', ...METADATA_KEYWORDS]],
  ['null', ['type']],
]);

const COMPOSITE_KEYWORDS = ['anyOf', 'allOf', 'oneOf'] as const;

interface OrderEntry {
  raw: string;
  unescaped: string | undefined;
}

/** `all` applies the order to every object schema, `root` to the root's only */
type OrderScope = 'all' | 'root';

class DecodeContext {
  readonly notes: DecodeNote[] = [];
  private readonly order: readonly OrderEntry[] | undefined;

  constructor(
    readonly options: ResolvedDecodeOptions,
    private readonly orderScope: OrderScope = 'all'
  ) {
    this.order = options.propertyOrder?.map((raw) => ({
      raw,
      unescaped: unescapeKeyText(raw),
    }));
  }

  /** Order for the `properties` of the object schema at `pointer` */
  orderAt(pointer: string): readonly OrderEntry[] | undefined {
    if (this.orderScope === 'root' && pointer !== '#') return undefined;
    return this.order;
  }

  note(schemaPath: string, code: DecodeNoteCode, keywords: string[]): void {
    if (keywords.length === 0) return;
    this.notes.push({ schemaPath, code, details: { keywords } });
  }
}

// ---------------------------------------------------------------------------
// Entry points

/**
 * Decode a schema document and collect notes about dropped keywords and
 * repeated keys.
 */
export function decodeSchemaDocument(
  input: JSONInput,
  options: DecodeOptions = {}
): Result<DecodedSchemaDocument, DecodeError> {
  return decodeDocument(input, new DecodeContext(resolveDecodeOptions(options)));
}

export function decodeSchema(
  input: JSONInput,
  options: DecodeOptions = {}
): Result<JSONSchema, DecodeError> {
  const decoded = decodeSchemaDocument(input, options);
  if (decoded.isErr()) return decoded;
  return ok(decoded.value.schema);
}

/** Decode an already-parsed document */
export function decodeSchemaValue(
  value: JSONValue,
  options: DecodeOptions = {}
): Result<JSONSchema, DecodeError> {
  const decoded = run(value, new DecodeContext(resolveDecodeOptions(options)));
  if (decoded.isErr()) return decoded;
  return ok(decoded.value.schema);
}

/**
 * Decode with the root's `properties` order recovered from the source text.
 * Nested object schemas keep their own source order.
 */
export function decodeOrderedSchema(
  input: JSONInput,
  options: Omit<DecodeOptions, 'propertyOrder'> = {}
): Result<DecodedSchemaDocument, DecodeError> {
  const resolved = resolveDecodeOptions(options);
  const propertyOrder = extractSchemaPropertyOrder(input, { maxDepth: resolved.maxDepth });
  return decodeDocument(input, new DecodeContext({ ...resolved, propertyOrder }, 'root'));
}

function decodeDocument(
  input: JSONInput,
  context: DecodeContext
): Result<DecodedSchemaDocument, DecodeError> {
  const parsed = parseJSONDocument(input, context.options.maxDepth);
  if (parsed.isErr()) return parsed;

  for (const duplicate of parsed.value.duplicates) {
    context.notes.push({
      schemaPath: duplicate.pointer,
      code: 'DUPLICATE_KEY',
      details: { key: duplicate.key },
    });
  }
  return run(parsed.value.value, context);
}

function run(
  value: JSONValue,
  context: DecodeContext
): Result<DecodedSchemaDocument, DecodeError> {
  try {
    const schema = decodeNode(value, '#', 1, context);
    return ok({ schema, notes: context.notes });
  } catch (error) {
    if (error instanceof DecodeError) return err(error);
    throw error;
  }
}

// ---------------------------------------------------------------------------
// Dispatch

function decodeNode(
  value: JSONValue,
  pointer: string,
  depth: number,
  context: DecodeContext
): JSONSchema {
  if (depth > context.options.maxDepth) {
    throw depthError(context.options.maxDepth);
  }
  if (value.kind === 'bool') {
    return value.value ? JSONSchema.any : JSONSchema.never;
  }
  if (value.kind !== 'object') {
    throw new DecodeError({
      message: `Expected a schema object or boolean at ${pointer}, got ${value.kind}`,
      errorCode: ErrorCode.INVALID_SCHEMA_STRUCTURE,
      context: { schemaPath: pointer },
    });
  }

  const members = value.entries;

  if (members.has('$ref')) {
    context.note(pointer, 'KEYWORDS_IGNORED', otherKeys(members, '$ref'));
    return JSONSchema.ref(requireString(members, '$ref', pointer));
  }

  for (const keyword of COMPOSITE_KEYWORDS) {
    if (!members.has(keyword)) continue;
    context.note(pointer, 'KEYWORDS_IGNORED', otherKeys(members, keyword));
    const schemas = requireArray(members, keyword, pointer).map((item, index) =>
      decodeNode(item, `${pointer}/${keyword}/${index}`, depth + 1, context)
    );
    switch (keyword) {
      case 'anyOf':
        return JSONSchema.anyOf(schemas);
      case 'allOf':
        return JSONSchema.allOf(schemas);
      case 'oneOf':
        return JSONSchema.oneOf(schemas);
    }
  }

  const negated = members.get('not');
  if (negated !== undefined) {
    context.note(pointer, 'KEYWORDS_IGNORED', otherKeys(members, 'not'));
    return JSONSchema.not(decodeNode(negated, `${pointer}/not`, depth + 1, context));
  }

  const type = members.get('type');
  if (type === undefined) {
    if (members.size === 0) return JSONSchema.empty;
    context.note(pointer, 'UNRECOGNIZED_KEYWORDS_DROPPED', [...members.keys()]);
    return JSONSchema.any;
  }

  const allowed = type.kind === 'string' ? KEYWORDS_BY_TYPE.get(type.value) : undefined;
  if (type.kind !== 'string' || allowed === undefined) {
    throw new DecodeError({
      message: `Unknown schema type ${writeJSONValue(type, { indent: 0, sortKeys: false })} at ${pointer}`,
      errorCode: ErrorCode.UNKNOWN_SCHEMA_TYPE,
      context: { schemaPath: `${pointer}/type`, keyword: 'type' },
    });
  }
  context.note(
    pointer,
    'KEYWORDS_IGNORED',
    [...members.keys()].filter((key) => !allowed.includes(key))
  );

  return decodeTyped(type.value, members, pointer, depth, context);
}

function decodeTyped(
  type: string,
  members: Members,
  pointer: string,
  depth: number,
  context: DecodeContext
): JSONSchema {
  if (type === 'null') return JSONSchema.null;

  const metadata = readMetadata(members, pointer);
  switch (type) {
    case 'object':
      return JSONSchema.object({
        ...metadata,
        properties: readProperties(members, pointer, depth, context),
        required: readStringList(members, 'required', pointer),
        additionalProperties: readAdditionalProperties(members, pointer, depth, context),
      });
    case 'array': {
      const items = members.get('items');
      return JSONSchema.array({
        ...metadata,
        items:
          items === undefined || items.kind === 'null'
            ? undefined
            : decodeNode(items, `${pointer}/items`, depth + 1, context),
        minItems: readInteger(members, 'minItems', pointer),
        maxItems: readInteger(members, 'maxItems', pointer),
        uniqueItems: readBoolean(members, 'uniqueItems', pointer),
      });
    }
    case 'string': {
      const format = readString(members, 'format', pointer);
      return JSONSchema.string({
        ...metadata,
        minLength: readInteger(members, 'minLength', pointer),
        maxLength: readInteger(members, 'maxLength', pointer),
        pattern: readString(members, 'pattern', pointer),
        format: format === undefined ? undefined : parseStringFormat(format),
      });
    }
    case 'number':
      return JSONSchema.number({
        ...metadata,
        ...readBounds(members, pointer, readNumber),
      });
    case 'integer':
      return JSONSchema.integer({
        ...metadata,
        ...readBounds(members, pointer, readInteger),
      });
    default:
      return JSONSchema.boolean(metadata);
  }
}

// ---------------------------------------------------------------------------
// Keyword readers. `null` reads as absent except for `default` and `const`,
// where it is a value.

function readMetadata(members: Members, pointer: string): SchemaMetadata {
  return {
    title: readString(members, 'title', pointer),
    description: readString(members, 'description', pointer),
    default: members.get('default'),
    examples: readValueList(members, 'examples', pointer),
    enum: readValueList(members, 'enum', pointer),
    const: members.get('const'),
  };
}

function readBounds(
  members: Members,
  pointer: string,
  read: (members: Members, keyword: string, pointer: string) => number | undefined
): NumericBounds {
  return {
    minimum: read(members, 'minimum', pointer),
    maximum: read(members, 'maximum', pointer),
    exclusiveMinimum: read(members, 'exclusiveMinimum', pointer),
    exclusiveMaximum: read(members, 'exclusiveMaximum', pointer),
    multipleOf: read(members, 'multipleOf', pointer),
  };
}

function readProperties(
  members: Members,
  pointer: string,
  depth: number,
  context: DecodeContext
): Map<string, JSONSchema> {
  const properties = new Map<string, JSONSchema>();
  const value = members.get('properties');
  if (value === undefined || value.kind === 'null') return properties;
  if (value.kind !== 'object') {
    throw invalidKeyword(pointer, 'properties', 'an object');
  }

  for (const name of orderPropertyNames(value.entries, context.orderAt(pointer))) {
    const property = value.entries.get(name);
    if (property === undefined) continue;
    properties.set(
      name,
      decodeNode(
        property,
        `${pointer}/properties/${escapePointerToken(name)}`,
        depth + 1,
        context
      )
    );
  }
  return properties;
}

/**
 * Listed names first, in list order; the rest in natural order. A listed
 * name that matches no key verbatim is tried again with JSON escapes
 * resolved, since the extractor returns raw key text.
 */
function orderPropertyNames(
  entries: Members,
  order: readonly OrderEntry[] | undefined
): string[] {
  if (order === undefined) return [...entries.keys()];

  const placed = new Set<string>();
  const names: string[] = [];
  for (const { raw, unescaped } of order) {
    const key = entries.has(raw)
      ? raw
      : unescaped !== undefined && entries.has(unescaped)
        ? unescaped
        : undefined;
    if (key === undefined || placed.has(key)) continue;
    placed.add(key);
    names.push(key);
  }
  for (const key of entries.keys()) {
    if (!placed.has(key)) names.push(key);
  }
  return names;
}

function unescapeKeyText(raw: string): string | undefined {
  if (!raw.includes('\\')) return undefined;
  try {
    const parsed: unknown = JSON.parse(`"${raw}"`);
    return typeof parsed === 'string' ? parsed : undefined;
  } catch {
    // not a valid escaped key; only the verbatim form can match
    return undefined;
  }
}

function readAdditionalProperties(
  members: Members,
  pointer: string,
  depth: number,
  context: DecodeContext
): AdditionalProperties | undefined {
  const value = members.get('additionalProperties');
  if (value === undefined || value.kind === 'null') return undefined;
  if (value.kind === 'bool') return AdditionalProperties.boolean(value.value);
  return AdditionalProperties.schema(
    decodeNode(value, `${pointer}/additionalProperties`, depth + 1, context)
  );
}

function readString(members: Members, keyword: string, pointer: string): string | undefined {
  const value = members.get(keyword);
  if (value === undefined || value.kind === 'null') return undefined;
  if (value.kind !== 'string') throw invalidKeyword(pointer, keyword, 'a string');
  return value.value;
}

function requireString(members: Members, keyword: string, pointer: string): string {
  const value = members.get(keyword);
  if (value === undefined || value.kind !== 'string') {
    throw invalidKeyword(pointer, keyword, 'a string');
  }
  return value.value;
}

function requireArray(
  members: Members,
  keyword: string,
  pointer: string
): readonly JSONValue[] {
  const value = members.get(keyword);
  if (value === undefined || value.kind !== 'array') {
    throw invalidKeyword(pointer, keyword, 'an array');
  }
  return value.items;
}

function readBoolean(members: Members, keyword: string, pointer: string): boolean | undefined {
  const value = members.get(keyword);
  if (value === undefined || value.kind === 'null') return undefined;
  if (value.kind !== 'bool') throw invalidKeyword(pointer, keyword, 'a boolean');
  return value.value;
}

function readInteger(members: Members, keyword: string, pointer: string): number | undefined {
  const value = members.get(keyword);
  if (value === undefined || value.kind === 'null') return undefined;
  if (value.kind === 'int') return value.value;
  if (value.kind === 'double' && Number.isSafeInteger(value.value)) {
    return value.value === 0 ? 0 : value.value;
  }
  throw invalidKeyword(pointer, keyword, 'an integer');
}

function readNumber(members: Members, keyword: string, pointer: string): number | undefined {
  const value = members.get(keyword);
  if (value === undefined || value.kind === 'null') return undefined;
  if (value.kind === 'int' || value.kind === 'double') return value.value;
  throw invalidKeyword(pointer, keyword, 'a number');
}

function readValueList(
  members: Members,
  keyword: string,
  pointer: string
): readonly JSONValue[] | undefined {
  const value = members.get(keyword);
  if (value === undefined || value.kind === 'null') return undefined;
  if (value.kind !== 'array') throw invalidKeyword(pointer, keyword, 'an array');
  return value.items;
}

function readStringList(members: Members, keyword: string, pointer: string): string[] {
  const value = members.get(keyword);
  if (value === undefined || value.kind === 'null') return [];
  if (value.kind !== 'array') throw invalidKeyword(pointer, keyword, 'an array of strings');
  return value.items.map((item, index) => {
    if (item.kind !== 'string') {
      throw invalidKeyword(`${pointer}/${keyword}`, String(index), 'a string');
    }
    return item.value;
  });
}

function invalidKeyword(pointer: string, keyword: string, expected: string): DecodeError {
  const schemaPath = `${pointer}/${escapePointerToken(keyword)}`;
  return new DecodeError({
    message: `Expected ${expected} at ${schemaPath}`,
    errorCode: ErrorCode.INVALID_KEYWORD_VALUE,
    context: { schemaPath, keyword },
  });
}

function otherKeys(members: Members, keyword: string): string[] {
  return [...members.keys()].filter((key) => key !== keyword);
}
