// @schemakit/core entry point
//
// Public API:
// - JSONValue: the JSON data model, its text codec, native and scalar conversions.
// - JSONSchema: the schema model, builders, equality, type compatibility and
//   the schema document codec (encode/decode with decode notes).
// - Property-order extraction over raw JSON text, used by decodeOrderedSchema.
// - Result, the error hierarchy, error codes and the presenter used by the CLI.

// JSON values
export {
  JSONValue,
  isNull,
  boolValue,
  intValue,
  doubleValue,
  stringValue,
  arrayValue,
  objectValue,
  jsonValueEquals,
  jsonValueHash,
  canonicalJSONValueText,
  jsonValueDescription,
  formatDouble,
  type JSONNull,
  type JSONBool,
  type JSONInt,
  type JSONDouble,
  type JSONString,
  type JSONArray,
  type JSONObject,
  type JSONValueKind,
  type JSONObjectInit,
} from './value/json-value.js';
export {
  toBool,
  toInt,
  toDouble,
  toString,
  type ConversionOptions,
} from './value/conversions.js';
export { fromNative, toNative, type NativeJSON } from './value/native.js';
export {
  decodeJSONValue,
  encodeJSONValue,
  type ValueDecodeOptions,
} from './value/codec.js';
export type { JSONInput } from './parser/json-text-parser.js';

// Schemas
export {
  JSONSchema,
  schemaEquals,
  isTypedSchema,
  isNeverSchema,
  type SchemaMetadata,
  type ObjectSchema,
  type ArraySchema,
  type StringSchema,
  type NumberSchema,
  type IntegerSchema,
  type NumericBounds,
  type BooleanSchema,
  type NullSchema,
  type ReferenceSchema,
  type CompositeSchema,
  type NotSchema,
  type EmptySchema,
  type AnySchema,
  type JSONSchemaKind,
  type TypedSchema,
  type PropertiesInit,
  type ObjectSchemaInit,
} from './schema/json-schema.js';
export { AdditionalProperties } from './schema/additional-properties.js';
export {
  STANDARD_STRING_FORMATS,
  parseStringFormat,
  customStringFormat,
  stringFormatToRaw,
  stringFormatEquals,
  isStandardStringFormat,
  type StringFormat,
  type StandardStringFormat,
  type CustomStringFormat,
} from './schema/string-format.js';
export { isCompatible, type CompatibilityOptions } from './schema/compat.js';
export { encodeSchema, encodeSchemaToValue } from './schema/encoder.js';
export {
  decodeSchema,
  decodeSchemaValue,
  decodeSchemaDocument,
  decodeOrderedSchema,
  type DecodeNote,
  type DecodeNoteCode,
  type DecodedSchemaDocument,
} from './schema/decoder.js';

// Property order
export {
  extractPropertyOrder,
  extractSchemaPropertyOrder,
  type PropertyOrderOptions,
} from './order/property-order.js';

// Results, options and errors
export {
  Ok,
  Err,
  ok,
  err,
  isOk,
  isErr,
  matchResult,
  type Result,
  type ResultMatcher,
} from './types/result.js';
export {
  DEFAULT_DECODE_OPTIONS,
  DEFAULT_ENCODE_OPTIONS,
  resolveDecodeOptions,
  resolveEncodeOptions,
  type DecodeOptions,
  type EncodeOptions,
  type ResolvedDecodeOptions,
  type ResolvedEncodeOptions,
} from './types/options.js';
export {
  SchemaKitError,
  DecodeError,
  EncodeError,
  ConfigError,
  isSchemaKitError,
  type ErrorContext,
  type SerializedError,
} from './types/errors.js';
export { ErrorCode, type Severity, getExitCode } from './errors/codes.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type PresenterOptions,
} from './errors/presenter.js';
