/**
 * Property-order extraction: recovers the textual key order of one object in
 * a JSON document. Parsed values are unordered maps, so the order is read
 * back from the source text with a string/bracket-aware scanner.
 */

import {
  parseJSONDocument,
  readJSONText,
  type JSONInput,
} from '../parser/json-text-parser.js';
import { resolveDecodeOptions, type DecodeOptions } from '../types/options.js';
import { scanStringEnd, skipWhitespace } from '../util/json-scan.js';
import type { JSONValue } from '../value/json-value.js';

export type PropertyOrderOptions = Pick<DecodeOptions, 'maxDepth'>;

interface ScannedMember {
  /** Key text between the quotes, escapes as written */
  raw: string;
  key: string;
  valueStart: number;
}

/**
 * Keys of the object at `keyPath`, in the order they appear in the text.
 * Repeated keys are listed every time they occur. Returns `undefined` when
 * the input is not valid JSON, when the root or the target is not an object
 * or when a path segment is missing. Nesting deeper than `maxDepth` counts
 * as invalid, so callers decoding with a raised limit pass the same one.
 */
export function extractPropertyOrder(
  input: JSONInput,
  keyPath: readonly string[] = [],
  options: PropertyOrderOptions = {}
): string[] | undefined {
  const { maxDepth } = resolveDecodeOptions({ maxDepth: options.maxDepth });
  const text = readJSONText(input).toOptional();
  if (text === undefined) return undefined;

  const parsed = parseJSONDocument(text, maxDepth);
  if (parsed.isErr()) return undefined;
  if (!isObjectPath(parsed.value.value, keyPath)) return undefined;

  let objectStart = skipWhitespace(text, 0);
  for (const segment of keyPath) {
    const members = scanObjectMembers(text, objectStart);
    let target: ScannedMember | undefined;
    for (const member of members) {
      if (member.key === segment) target = member;
    }
    if (target === undefined) return undefined;
    objectStart = target.valueStart;
  }

  return scanObjectMembers(text, objectStart).map((member) => member.raw);
}

/** Order of the root schema's `properties` */
export function extractSchemaPropertyOrder(
  input: JSONInput,
  options: PropertyOrderOptions = {}
): string[] | undefined {
  return extractPropertyOrder(input, ['properties'], options);
}

function isObjectPath(root: JSONValue, keyPath: readonly string[]): boolean {
  let current: JSONValue | undefined = root;
  for (const segment of keyPath) {
    if (current?.kind !== 'object') return false;
    current = current.entries.get(segment);
  }
  return current?.kind === 'object';
}

/**
 * Members of the object whose `{` sits at `start`. The text is known to be
 * valid JSON, so the scanner only tracks positions.
 */
function scanObjectMembers(text: string, start: number): ScannedMember[] {
  const members: ScannedMember[] = [];
  let cursor = skipWhitespace(text, start + 1);
  if (text.charAt(cursor) === '}') return members;

  while (cursor < text.length) {
    const keyEnd = scanStringEnd(text, cursor);
    if (keyEnd < 0) break;
    const raw = text.slice(cursor + 1, keyEnd - 1);
    const decoded: unknown = JSON.parse(text.slice(cursor, keyEnd));
    const colon = skipWhitespace(text, keyEnd);
    const valueStart = skipWhitespace(text, colon + 1);
    members.push({
      raw,
      key: typeof decoded === 'string' ? decoded : raw,
      valueStart,
    });

    cursor = skipWhitespace(text, skipValue(text, valueStart));
    if (text.charAt(cursor) !== ',') break;
    cursor = skipWhitespace(text, cursor + 1);
  }
  return members;
}

/** Index just past the value starting at `start` */
function skipValue(text: string, start: number): number {
  const first = text.charAt(start);
  if (first === '"') {
    const end = scanStringEnd(text, start);
    return end < 0 ? text.length : end;
  }

  if (first === '{' || first === '[') {
    let depth = 0;
    let cursor = start;
    while (cursor < text.length) {
      const ch = text.charAt(cursor);
      if (ch === '"') {
        const end = scanStringEnd(text, cursor);
        if (end < 0) return text.length;
        cursor = end;
        continue;
      }
      if (ch === '{' || ch === '[') depth += 1;
      else if (ch === '}' || ch === ']') {
        depth -= 1;
        if (depth === 0) return cursor + 1;
      }
      cursor += 1;
    }
    return cursor;
  }

  let cursor = start;
  while (cursor < text.length && !/[\s,\]}]/.test(text.charAt(cursor))) {
    cursor += 1;
  }
  return cursor;
}
