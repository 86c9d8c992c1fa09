/**
 * JSON text → JSONValue, on top of jsonc-parser's syntax tree.
 *
 * jsonc-parser runs in strict mode (no comments, no trailing commas). Its
 * number nodes lose the literal form, so the int/double split is decided
 * from the source slice each node spans.
 */

import jsonc from 'jsonc-parser';
import type { Node as SyntaxNode, ParseError } from 'jsonc-parser';

import { ErrorCode } from '../errors/codes.js';
import { DecodeError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import { findDepthViolation } from '../util/json-scan.js';
import { escapePointerToken } from '../util/json-writer.js';
import { JSONValue } from '../value/json-value.js';

export type JSONInput = string | Uint8Array;

export interface DuplicateKey {
  /** JSON Pointer of the object holding the repeated key */
  pointer: string;
  key: string;
}

export interface ParsedJSONDocument {
  text: string;
  value: JSONValue;
  duplicates: DuplicateKey[];
}

const PARSE_OPTIONS = {
  disallowComments: true,
  allowTrailingComma: false,
  allowEmptyContent: false,
};

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Bytes are decoded as strict UTF-8; a leading byte-order mark is dropped
 * for both bytes and strings.
 */
export function readJSONText(input: JSONInput): Result<string, DecodeError> {
  if (typeof input === 'string') {
    return ok(input.startsWith('\uFEFF') ? input.slice(1) : input);
  }
  try {
    return ok(utf8.decode(input));
  } catch (error) {
    return err(
      new DecodeError({
        message: 'Input is not valid UTF-8',
        errorCode: ErrorCode.INVALID_ENCODING,
        cause: error instanceof Error ? error : undefined,
      })
    );
  }
}

export function parseJSONDocument(
  input: JSONInput,
  maxDepth: number
): Result<ParsedJSONDocument, DecodeError> {
  const textResult = readJSONText(input);
  if (textResult.isErr()) return textResult;
  const text = textResult.value;

  const tooDeep = findDepthViolation(text, maxDepth);
  if (tooDeep !== undefined) {
    return err(depthError(maxDepth, tooDeep));
  }

  const errors: ParseError[] = [];
  const root = jsonc.parseTree(text, errors, PARSE_OPTIONS);
  const first = errors[0];
  if (first !== undefined) {
    return err(
      new DecodeError({
        message: `Invalid JSON: ${jsonc.printParseErrorCode(first.error)} at offset ${first.offset}`,
        errorCode: ErrorCode.INVALID_JSON,
        context: { offset: first.offset },
      })
    );
  }
  if (root === undefined) {
    return err(
      new DecodeError({
        message: 'Invalid JSON: empty input',
        errorCode: ErrorCode.INVALID_JSON,
        context: { offset: 0 },
      })
    );
  }

  const duplicates: DuplicateKey[] = [];
  const converted = convertNode(root, text, '#', duplicates);
  if (converted.isErr()) return converted;
  return ok({ text, value: converted.value, duplicates });
}

function convertNode(
  node: SyntaxNode,
  text: string,
  pointer: string,
  duplicates: DuplicateKey[]
): Result<JSONValue, DecodeError> {
  switch (node.type) {
    case 'null':
      return ok(JSONValue.null);
    case 'boolean':
      return ok(JSONValue.bool(node.value === true));
    case 'string':
      return typeof node.value === 'string'
        ? ok(JSONValue.string(node.value))
        : err(malformed(node));
    case 'number':
      return convertNumber(node, text);
    case 'array': {
      const items: JSONValue[] = [];
      const children = node.children ?? [];
      for (let index = 0; index < children.length; index += 1) {
        const child = children[index];
        if (child === undefined) continue;
        const item = convertNode(child, text, `${pointer}/${index}`, duplicates);
        if (item.isErr()) return item;
        items.push(item.value);
      }
      return ok(JSONValue.array(items));
    }
    case 'object': {
      const entries = new Map<string, JSONValue>();
      for (const property of node.children ?? []) {
        const [keyNode, valueNode] = property.children ?? [];
        if (
          keyNode === undefined ||
          valueNode === undefined ||
          typeof keyNode.value !== 'string'
        ) {
          return err(malformed(property));
        }
        const key: string = keyNode.value;
        const item = convertNode(
          valueNode,
          text,
          `${pointer}/${escapePointerToken(key)}`,
          duplicates
        );
        if (item.isErr()) return item;
        if (entries.has(key)) {
          duplicates.push({ pointer, key });
          // last occurrence wins, at the position of the last occurrence
          entries.delete(key);
        }
        entries.set(key, item.value);
      }
      return ok(JSONValue.object(entries));
    }
    case 'property':
      return err(malformed(node));
  }
}

function convertNumber(
  node: SyntaxNode,
  text: string
): Result<JSONValue, DecodeError> {
  const literal = text.slice(node.offset, node.offset + node.length);
  const parsed = Number(literal);
  if (!Number.isFinite(parsed)) {
    return err(
      new DecodeError({
        message: `Number ${literal} is out of range at offset ${node.offset}`,
        errorCode: ErrorCode.INVALID_JSON,
        context: { offset: node.offset, valueExcerpt: literal },
      })
    );
  }
  if (!/[.eE]/.test(literal) && Number.isSafeInteger(parsed)) {
    return ok(JSONValue.int(parsed));
  }
  return ok(JSONValue.double(parsed));
}

function malformed(node: SyntaxNode): DecodeError {
  return new DecodeError({
    message: `Invalid JSON at offset ${node.offset}`,
    errorCode: ErrorCode.INVALID_JSON,
    context: { offset: node.offset },
  });
}

export function depthError(maxDepth: number, offset?: number): DecodeError {
  return new DecodeError({
    message:
      offset === undefined
        ? `Nesting exceeds the maximum depth of ${maxDepth}`
        : `Nesting exceeds the maximum depth of ${maxDepth} at offset ${offset}`,
    errorCode: ErrorCode.DEPTH_LIMIT_EXCEEDED,
    context: offset === undefined ? undefined : { offset },
  });
}
