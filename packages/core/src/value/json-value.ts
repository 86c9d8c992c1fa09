/**
 * JSONValue: a closed tagged union over the JSON data model.
 *
 * `int` and `double` are distinct variants: the decoder keeps the
 * distinction a JSON literal carries (`42` vs `42.0`) and the encoder
 * writes it back. Objects are unordered maps; arrays are ordered.
 */

import { createHash } from 'node:crypto';
import { Buffer } from 'node:buffer';

export interface JSONNull {
  readonly kind: 'null';
}

export interface JSONBool {
  readonly kind: 'bool';
  readonly value: boolean;
}

export interface JSONInt {
  readonly kind: 'int';
  readonly value: number;
}

export interface JSONDouble {
  readonly kind: 'double';
  readonly value: number;
}

export interface JSONString {
  readonly kind: 'string';
  readonly value: string;
}

export interface JSONArray {
  readonly kind: 'array';
  readonly items: readonly JSONValue[];
}

export interface JSONObject {
  readonly kind: 'object';
  readonly entries: ReadonlyMap<string, JSONValue>;
}

export type JSONValue =
  | JSONNull
  | JSONBool
  | JSONInt
  | JSONDouble
  | JSONString
  | JSONArray
  | JSONObject;

export type JSONValueKind = JSONValue['kind'];

export type JSONObjectInit =
  | ReadonlyMap<string, JSONValue>
  | Iterable<readonly [string, JSONValue]>
  | { readonly [key: string]: JSONValue };

const NULL: JSONNull = Object.freeze({ kind: 'null' });
const TRUE: JSONBool = Object.freeze({ kind: 'bool', value: true });
const FALSE: JSONBool = Object.freeze({ kind: 'bool', value: false });

function bool(value: boolean): JSONBool {
  return value ? TRUE : FALSE;
}

function int(value: number): JSONInt {
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`JSONValue.int expects a safe integer, got ${value}`);
  }
  // -0 has no integer literal
  return Object.freeze({ kind: 'int', value: value === 0 ? 0 : value });
}

function double(value: number): JSONDouble {
  if (!Number.isFinite(value)) {
    throw new RangeError(`JSONValue.double expects a finite number, got ${value}`);
  }
  return Object.freeze({ kind: 'double', value });
}

function string(value: string): JSONString {
  return Object.freeze({ kind: 'string', value });
}

function array(items: Iterable<JSONValue>): JSONArray {
  return Object.freeze({ kind: 'array', items: Object.freeze([...items]) });
}

function object(init: JSONObjectInit = []): JSONObject {
  const entries = new Map<string, JSONValue>(
    isEntryIterable(init) ? init : Object.entries(init)
  );
  return Object.freeze({ kind: 'object', entries });
}

function isEntryIterable(
  init: JSONObjectInit
): init is Iterable<readonly [string, JSONValue]> {
  return Symbol.iterator in init;
}

/**
 * Number helper: safe integers become `int`, everything else `double`.
 */
function number(value: number): JSONInt | JSONDouble {
  return Number.isSafeInteger(value) ? int(value) : double(value);
}

/**
 * Constructors for JSONValue. The object shares its name with the type so
 * call sites read `JSONValue.int(1)`.
 */
export const JSONValue = Object.freeze({
  null: NULL,
  true: TRUE,
  false: FALSE,
  bool,
  int,
  double,
  number,
  string,
  array,
  object,
});

// ---------------------------------------------------------------------------
// Accessors

export function isNull(value: JSONValue): value is JSONNull {
  return value.kind === 'null';
}

export function boolValue(value: JSONValue): boolean | undefined {
  return value.kind === 'bool' ? value.value : undefined;
}

export function intValue(value: JSONValue): number | undefined {
  return value.kind === 'int' ? value.value : undefined;
}

/** Double payload; `int` values are widened */
export function doubleValue(value: JSONValue): number | undefined {
  return value.kind === 'double' || value.kind === 'int'
    ? value.value
    : undefined;
}

export function stringValue(value: JSONValue): string | undefined {
  return value.kind === 'string' ? value.value : undefined;
}

export function arrayValue(
  value: JSONValue
): readonly JSONValue[] | undefined {
  return value.kind === 'array' ? value.items : undefined;
}

export function objectValue(
  value: JSONValue
): ReadonlyMap<string, JSONValue> | undefined {
  return value.kind === 'object' ? value.entries : undefined;
}

// ---------------------------------------------------------------------------
// Equality and hashing

/**
 * Structural equality. Object key order is ignored, array order is not,
 * and `int(1)` differs from `double(1)`.
 */
export function jsonValueEquals(a: JSONValue, b: JSONValue): boolean {
  if (a === b) return true;
  switch (a.kind) {
    case 'null':
      return b.kind === 'null';
    case 'bool':
    case 'int':
    case 'double':
    case 'string':
      return b.kind === a.kind && 'value' in b && b.value === a.value;
    case 'array': {
      if (b.kind !== 'array' || b.items.length !== a.items.length) {
        return false;
      }
      return a.items.every((item, index) => {
        const other = b.items[index];
        return other !== undefined && jsonValueEquals(item, other);
      });
    }
    case 'object': {
      if (b.kind !== 'object' || b.entries.size !== a.entries.size) {
        return false;
      }
      for (const [key, item] of a.entries) {
        const other = b.entries.get(key);
        if (other === undefined || !jsonValueEquals(item, other)) {
          return false;
        }
      }
      return true;
    }
  }
}

/**
 * Canonical text used for hashing: keys sorted, every node tagged with its
 * variant so that `int(1)` and `double(1)` hash differently.
 */
export function canonicalJSONValueText(value: JSONValue): string {
  switch (value.kind) {
    case 'null':
      return 'n';
    case 'bool':
      return value.value ? 't' : 'f';
    case 'int':
      return `i${value.value}`;
    case 'double':
      return `d${Object.is(value.value, -0) ? 0 : value.value}`;
    case 'string':
      return `s${JSON.stringify(value.value)}`;
    case 'array':
      return `[${value.items.map(canonicalJSONValueText).join(',')}]`;
    case 'object': {
      const keys = [...value.entries.keys()].sort();
      const parts = keys.map((key) => {
        const item = value.entries.get(key) ?? NULL;
        return `${JSON.stringify(key)}:${canonicalJSONValueText(item)}`;
      });
      return `{${parts.join(',')}}`;
    }
  }
}

/**
 * Stable structural hash (hex SHA-256). Equal values hash equally.
 */
export function jsonValueHash(value: JSONValue): string {
  const canonical = Buffer.from(canonicalJSONValueText(value), 'utf8');
  return createHash('sha256').update(canonical).digest('hex');
}

// ---------------------------------------------------------------------------
// Description

/**
 * Human-readable rendering. `null` renders as the empty string, strings
 * render unquoted at the top level.
 */
export function jsonValueDescription(value: JSONValue): string {
  switch (value.kind) {
    case 'null':
      return '';
    case 'bool':
      return String(value.value);
    case 'int':
      return String(value.value);
    case 'double':
      return formatDouble(value.value);
    case 'string':
      return value.value;
    case 'array':
      return `[${value.items.map(describeNested).join(', ')}]`;
    case 'object': {
      const parts = [...value.entries].map(
        ([key, item]) => `${JSON.stringify(key)}: ${describeNested(item)}`
      );
      return `{${parts.join(', ')}}`;
    }
  }
}

function describeNested(value: JSONValue): string {
  if (value.kind === 'string') return JSON.stringify(value.value);
  if (value.kind === 'null') return 'null';
  return jsonValueDescription(value);
}

/**
 * Canonical textual form of a double: the shortest round-trip form, with
 * `.0` appended when it would otherwise read as an integer literal.
 */
export function formatDouble(value: number): string {
  const text = JSON.stringify(value);
  return /[.eE]/.test(text) ? text : `${text}.0`;
}
