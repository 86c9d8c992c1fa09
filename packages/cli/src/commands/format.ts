import type { Command } from 'commander';

import {
  decodeOrderedSchema,
  decodeSchemaDocument,
  encodeSchema,
  type JSONInput,
} from '@schemakit/core';

import { resolveDecodeFlags, resolveEncodeFlags, type CliOptions } from '../flags.js';
import { emit, readInputFile, type CommandOutput } from '../io.js';
import { renderNote } from '../render.js';

export type FormatOptions = Pick<
  CliOptions,
  'indent' | 'sortKeys' | 'maxDepth' | 'order' | 'quiet'
>;

/**
 * Decode a schema document and write it back in canonical keyword order.
 * Without --order the root `properties` keep their source order.
 */
export function runFormat(input: JSONInput, options: FormatOptions = {}): CommandOutput {
  const decodeOptions = resolveDecodeFlags(options);
  const encodeOptions = resolveEncodeFlags(options);

  const decoded =
    decodeOptions.propertyOrder === undefined
      ? decodeOrderedSchema(input, { maxDepth: decodeOptions.maxDepth })
      : decodeSchemaDocument(input, decodeOptions);
  const { schema, notes } = decoded.unwrap();

  return {
    stdout: encodeSchema(schema, encodeOptions),
    diagnostics: options.quiet === true ? [] : notes.map((note) => renderNote(note)),
    exitCode: 0,
  };
}

export function registerFormatCommand(program: Command): void {
  program
    .command('format')
    .description('Decode a JSON Schema document and re-encode it')
    .argument('<file>', 'JSON Schema file')
    .option('--indent <n>', 'Indentation width (0-10); compact when omitted')
    .option('--sort-keys', 'Sort object keys by code unit')
    .option('--max-depth <n>', 'Maximum nesting depth')
    .option(
      '--order <names>',
      'Comma-separated property order applied to every object schema'
    )
    .option('-q, --quiet', 'Do not print decode notes')
    .action((file: string, options: FormatOptions) => {
      emit(runFormat(readInputFile(file), options));
    });
}
