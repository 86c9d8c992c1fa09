import type { Command } from 'commander';

import { decodeJSONValue, encodeJSONValue, type JSONInput } from '@schemakit/core';

import { resolveDecodeFlags, resolveEncodeFlags, type CliOptions } from '../flags.js';
import { emit, readInputFile, type CommandOutput } from '../io.js';

export type ConvertOptions = Pick<CliOptions, 'indent' | 'sortKeys' | 'maxDepth'>;

/** Re-encode a JSON document; `1.0` stays `1.0` and `1` stays `1` */
export function runConvert(input: JSONInput, options: ConvertOptions = {}): CommandOutput {
  const { maxDepth } = resolveDecodeFlags({ maxDepth: options.maxDepth });
  const value = decodeJSONValue(input, { maxDepth }).unwrap();
  return {
    stdout: encodeJSONValue(value, resolveEncodeFlags(options)),
    diagnostics: [],
    exitCode: 0,
  };
}

export function registerConvertCommand(program: Command): void {
  program
    .command('convert')
    .description('Decode a JSON document and re-encode it')
    .argument('<file>', 'JSON file')
    .option('--indent <n>', 'Indentation width (0-10); compact when omitted')
    .option('--sort-keys', 'Sort object keys by code unit')
    .option('--max-depth <n>', 'Maximum nesting depth')
    .action((file: string, options: ConvertOptions) => {
      emit(runConvert(readInputFile(file), options));
    });
}
