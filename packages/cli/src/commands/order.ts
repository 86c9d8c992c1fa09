import type { Command } from 'commander';

import { extractPropertyOrder, type JSONInput } from '@schemakit/core';

import { parseKeyPath, type CliOptions } from '../flags.js';
import { emit, readInputFile, type CommandOutput } from '../io.js';
import { LOG_PREFIX } from '../render.js';

export type OrderOptions = Pick<CliOptions, 'path'>;

/** Key order of one object as a JSON array of raw key texts */
export function runOrder(input: JSONInput, options: OrderOptions = {}): CommandOutput {
  const keyPath = parseKeyPath(options.path);
  const order = extractPropertyOrder(input, keyPath);
  if (order === undefined) {
    const where = keyPath.length > 0 ? ` at ${keyPath.join('.')}` : '';
    return {
      diagnostics: [`${LOG_PREFIX} no object found${where}`],
      exitCode: 1,
    };
  }
  return { stdout: JSON.stringify(order), diagnostics: [], exitCode: 0 };
}

export function registerOrderCommand(program: Command): void {
  program
    .command('order')
    .description('Print the textual key order of an object in a JSON document')
    .argument('<file>', 'JSON file')
    .option('-p, --path <keys>', 'Dot-separated key path to the object (default: root)')
    .action((file: string, options: OrderOptions) => {
      emit(runOrder(readInputFile(file), options));
    });
}
