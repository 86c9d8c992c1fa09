import type { CLIErrorView, DecodeNote } from '@schemakit/core';

// Minimal ANSI helpers (no external deps)
const ANSI = {
  reset: '\u001B[0m',
  red: '\u001B[31m',
  yellow: '\u001B[33m',
  bold: '\u001B[1m',
};

export const LOG_PREFIX = '[schemakit]';

function colorize(text: string, useColor: boolean, color: string): string {
  if (!useColor) return text;
  return `${color}${text}${ANSI.reset}`;
}

export function wrapText(text: string, width: number): string {
  if (!text) return '';
  const words = text.split(/\s+/);
  const lines: string[] = [];
  let line = '';
  for (const word of words) {
    if ((line + (line ? ' ' : '') + word).length > width) {
      if (line) lines.push(line);
      line = word;
    } else {
      line = line ? `${line} ${word}` : word;
    }
  }
  if (line) lines.push(line);
  return lines.join('\n');
}

export function renderCLIView(view: CLIErrorView): string {
  const width = view.terminalWidth || 80;
  const lines: string[] = [];

  lines.push(
    colorize(colorize(`${LOG_PREFIX} ${view.title}`, view.colors, ANSI.bold), view.colors, ANSI.red)
  );

  if (view.location) {
    lines.push(wrapText(view.location, width));
  }
  if (view.excerpt) {
    lines.push(wrapText(`Excerpt: ${view.excerpt}`, width));
  }
  if (view.workaround) {
    lines.push(wrapText(`Workaround: ${view.workaround}`, width));
  }

  return lines.join('\n');
}

/** One stderr line per decode note */
export function renderNote(note: DecodeNote, colors = false): string {
  const subject =
    note.details?.key !== undefined
      ? `key ${JSON.stringify(note.details.key)}`
      : (note.details?.keywords ?? []).join(', ');
  const label = colorize(note.code, colors, ANSI.yellow);
  return `${LOG_PREFIX} ${label} at ${note.schemaPath}: ${subject}`;
}
