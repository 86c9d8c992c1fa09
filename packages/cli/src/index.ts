#!/usr/bin/env node

// CLI entry point
// - Command name: `schemakit` with subcommands `format`, `order`, `check` and `convert`.
// - Each subcommand reads one file as bytes and hands it to @schemakit/core; payloads go
//   to stdout, notes and errors to stderr with a `[schemakit]` prefix.
// - Library errors carry a stable code; the process exits with that code's exit code.

import { Command } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  ErrorPresenter,
  isSchemaKitError,
  SchemaKitError,
  ErrorCode,
} from '@schemakit/core';
import { renderCLIView } from './render.js';
import { registerCheckCommand } from './commands/check.js';
import { registerConvertCommand } from './commands/convert.js';
import { registerFormatCommand } from './commands/format.js';
import { registerOrderCommand } from './commands/order.js';

const program = new Command();

program
  .name('schemakit')
  .description('Decode, re-encode and inspect JSON Schema documents')
  .version('0.1.0');

registerFormatCommand(program);
registerOrderCommand(program);
registerCheckCommand(program);
registerConvertCommand(program);

async function handleCliError(err: unknown): Promise<never> {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: process.stderr.isTTY === true });

  let error: SchemaKitError;
  if (isSchemaKitError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new (class extends SchemaKitError {})({
      message: message || 'Unexpected error',
      errorCode: ErrorCode.INTERNAL_ERROR,
      cause: err instanceof Error ? err : undefined,
    });
  }

  const view = presenter.formatForCLI(error);
  console.error(renderCLIView(view));

  process.exit(error.getExitCode());
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv).catch(handleCliError);
}

export { program, handleCliError };

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
