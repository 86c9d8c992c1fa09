/**
 * ErrorPresenter - pure presentation layer for SchemaKitError instances
 * - No business logic; formats into environment-specific view objects
 */

import { ErrorCode } from './codes.js';
import type { ErrorContext, SchemaKitError } from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  schemaPath?: string;
  excerpt?: string;
  workaround?: string;
  colors: boolean;
  terminalWidth: number;
}

const WORKAROUNDS: Partial<Record<ErrorCode, string>> = {
  [ErrorCode.INVALID_JSON]: 'Check the document with a JSON linter; comments and trailing commas are not accepted',
  [ErrorCode.INVALID_ENCODING]: 'Save the file as UTF-8',
  [ErrorCode.DEPTH_LIMIT_EXCEEDED]: 'Raise the limit with --max-depth',
  [ErrorCode.UNKNOWN_SCHEMA_TYPE]:
    'Use one of: object, array, string, number, integer, boolean, null',
  [ErrorCode.NON_FINITE_NUMBER]: 'NaN and Infinity have no JSON representation',
};

export class ErrorPresenter {
  constructor(
    private readonly _env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: SchemaKitError): CLIErrorView {
    return {
      title: this.#formatTitle(error),
      code: error.errorCode,
      location: this.#formatLocation(error.context),
      schemaPath: error.context?.schemaPath,
      excerpt: error.context?.valueExcerpt,
      workaround: WORKAROUNDS[error.errorCode],
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.#getTerminalWidth(this.options.terminalWidth),
    };
  }

  // Helpers
  #formatTitle(error: SchemaKitError): string {
    return `Error ${error.errorCode}: ${error.message}`;
  }

  #formatLocation(ctx?: ErrorContext): string | undefined {
    if (!ctx) return undefined;
    if (ctx.schemaPath !== undefined) return `Location: ${ctx.schemaPath}`;
    if (ctx.offset !== undefined) return `Location: offset ${ctx.offset}`;
    if (ctx.setting !== undefined) return `Setting: ${ctx.setting}`;
    return undefined;
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    if (opt === undefined) return this._env === 'dev';
    return opt;
  }

  #getTerminalWidth(opt?: number): number {
    return opt || process.stdout?.columns || 80;
  }
}
