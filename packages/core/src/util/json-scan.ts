/**
 * Lexical helpers over raw JSON text. These only track string literals and
 * bracket depth; they never interpret values.
 */

const WHITESPACE = new Set([' ', '\t', '\n', '\r']);

export function skipWhitespace(text: string, pos: number): number {
  let cursor = pos;
  while (cursor < text.length && WHITESPACE.has(text.charAt(cursor))) {
    cursor += 1;
  }
  return cursor;
}

/**
 * Given the index of an opening quote, return the index just past the
 * closing quote, or -1 when the literal is unterminated. Backslash escapes
 * are skipped as a pair, so `\"` and `\\` never end the literal early.
 */
export function scanStringEnd(text: string, start: number): number {
  let cursor = start + 1;
  while (cursor < text.length) {
    const ch = text.charAt(cursor);
    if (ch === '\\') {
      cursor += 2;
      continue;
    }
    if (ch === '"') {
      return cursor + 1;
    }
    cursor += 1;
  }
  return -1;
}

/**
 * Offset of the first `{` or `[` that opens a container nested deeper than
 * `maxDepth`, or undefined when the text stays within the limit.
 */
export function findDepthViolation(
  text: string,
  maxDepth: number
): number | undefined {
  let depth = 0;
  let cursor = 0;
  while (cursor < text.length) {
    const ch = text.charAt(cursor);
    if (ch === '"') {
      const end = scanStringEnd(text, cursor);
      if (end < 0) return undefined;
      cursor = end;
      continue;
    }
    if (ch === '{' || ch === '[') {
      depth += 1;
      if (depth > maxDepth) return cursor;
    } else if (ch === '}' || ch === ']') {
      depth -= 1;
    }
    cursor += 1;
  }
  return undefined;
}
