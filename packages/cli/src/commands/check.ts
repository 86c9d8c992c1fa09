import type { Command } from 'commander';

import { decodeSchemaDocument, type JSONInput } from '@schemakit/core';

import { resolveDecodeFlags, type CliOptions } from '../flags.js';
import { emit, readInputFile, type CommandOutput } from '../io.js';
import { renderNote } from '../render.js';

export type CheckOptions = Pick<CliOptions, 'maxDepth' | 'json' | 'quiet'>;

/**
 * Decode a schema document and report its notes. With --json the report,
 * failures included, goes to stdout as one JSON object; otherwise a
 * failure is thrown for the CLI error handler.
 */
export function runCheck(
  input: JSONInput,
  options: CheckOptions = {},
  label = 'input'
): CommandOutput {
  const decoded = decodeSchemaDocument(input, resolveDecodeFlags({ maxDepth: options.maxDepth }));

  if (options.json === true) {
    if (decoded.isErr()) {
      return {
        stdout: JSON.stringify({ ok: false, error: decoded.error.toJSON('prod') }),
        diagnostics: [],
        exitCode: decoded.error.getExitCode(),
      };
    }
    const { schema, notes } = decoded.value;
    return {
      stdout: JSON.stringify({ ok: true, kind: schema.kind, notes }),
      diagnostics: [],
      exitCode: 0,
    };
  }

  if (decoded.isErr()) throw decoded.error;
  const { schema, notes } = decoded.value;
  const plural = notes.length === 1 ? 'note' : 'notes';
  return {
    stdout: `${label}: ok (${schema.kind}, ${notes.length} ${plural})`,
    diagnostics: options.quiet === true ? [] : notes.map((note) => renderNote(note)),
    exitCode: 0,
  };
}

export function registerCheckCommand(program: Command): void {
  program
    .command('check')
    .description('Decode a JSON Schema document and report dropped keywords')
    .argument('<file>', 'JSON Schema file')
    .option('--max-depth <n>', 'Maximum nesting depth')
    .option('--json', 'Print the report as JSON')
    .option('-q, --quiet', 'Do not print decode notes')
    .action((file: string, options: CheckOptions) => {
      emit(runCheck(readInputFile(file), options, file));
    });
}
