/**
 * Error hierarchy for schemakit
 * Structured errors with stable codes and location context
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  schemaPath?: string; // JSON Pointer into the schema document (e.g. '#/properties/name')
  offset?: number; // Character offset into the source text
  keyword?: string; // Offending keyword, when one is involved
  valueExcerpt?: string; // Offending value, as text
  setting?: string; // Option name for configuration errors
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface ErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base error class for all schemakit errors
 */
export abstract class SchemaKitError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  constructor(params: ErrorParams) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = new.target.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack and full context
   * - prod: excludes stack
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }
}

/**
 * Malformed input: invalid JSON text, or a JSON value that does not match
 * any JSONValue / JSONSchema alternative.
 */
export class DecodeError extends SchemaKitError {
  constructor(params: {
    message: string;
    errorCode?: ErrorCode;
    context?: ErrorContext;
    severity?: Severity;
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: params.errorCode ?? ErrorCode.INVALID_SCHEMA_STRUCTURE,
      context: params.context,
      severity: params.severity,
      cause: params.cause,
    });
  }

  get schemaPath(): string | undefined {
    return this.context?.schemaPath;
  }

  get offset(): number | undefined {
    return this.context?.offset;
  }
}

/**
 * Values the wire format cannot carry (non-finite numbers, functions, cycles)
 */
export class EncodeError extends SchemaKitError {
  constructor(params: {
    message: string;
    errorCode?: ErrorCode;
    context?: ErrorContext;
    severity?: Severity;
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: params.errorCode ?? ErrorCode.UNSUPPORTED_NATIVE_VALUE,
      context: params.context,
      severity: params.severity,
      cause: params.cause,
    });
  }
}

/**
 * Invalid decode/encode options
 */
export class ConfigError extends SchemaKitError {
  constructor(message: string, setting?: string) {
    super({
      message,
      errorCode: ErrorCode.CONFIGURATION_ERROR,
      context: setting === undefined ? undefined : { setting },
    });
  }

  get setting(): string | undefined {
    return this.context?.setting;
  }
}

export function isSchemaKitError(error: unknown): error is SchemaKitError {
  return error instanceof SchemaKitError;
}
