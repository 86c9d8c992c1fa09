import fs from 'node:fs';
import path from 'node:path';

import { ConfigError } from '@schemakit/core';

/**
 * What a command produces. Commands are pure over their input bytes; the
 * action wrappers hand the output to `emit`.
 */
export interface CommandOutput {
  /** Payload for stdout, written with a trailing newline */
  stdout?: string;
  /** Lines for stderr */
  diagnostics: string[];
  exitCode: number;
}

export function resolvePath(p: string): string {
  return path.isAbsolute(p) ? p : path.resolve(process.cwd(), p);
}

/** Raw bytes of an input file; decoding (BOM, UTF-8) is left to the library */
export function readInputFile(file: string): Uint8Array {
  const resolved = resolvePath(file);
  if (!fs.existsSync(resolved)) {
    throw new ConfigError(`Input file not found: ${resolved}`, 'file');
  }
  return fs.readFileSync(resolved);
}

export function emit(output: CommandOutput): void {
  for (const line of output.diagnostics) {
    process.stderr.write(line + '\n');
  }
  if (output.stdout !== undefined) {
    process.stdout.write(output.stdout + '\n');
  }
  if (output.exitCode !== 0) {
    process.exitCode = output.exitCode;
  }
}
