/**
 * Error Code Infrastructure
 * Stable error codes and CLI exit codes.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Decode Errors (E100–E199)
  INVALID_JSON = 'E100',
  INVALID_ENCODING = 'E101',
  DEPTH_LIMIT_EXCEEDED = 'E102',
  UNKNOWN_SCHEMA_TYPE = 'E110',
  INVALID_KEYWORD_VALUE = 'E111',
  INVALID_SCHEMA_STRUCTURE = 'E112',

  // Encode Errors (E200–E299)
  NON_FINITE_NUMBER = 'E200',
  UNSUPPORTED_NATIVE_VALUE = 'E201',
  CIRCULAR_STRUCTURE = 'E202',

  // Configuration Errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.INVALID_JSON]: 10,
  [ErrorCode.INVALID_ENCODING]: 11,
  [ErrorCode.DEPTH_LIMIT_EXCEEDED]: 12,
  [ErrorCode.UNKNOWN_SCHEMA_TYPE]: 20,
  [ErrorCode.INVALID_KEYWORD_VALUE]: 21,
  [ErrorCode.INVALID_SCHEMA_STRUCTURE]: 22,
  [ErrorCode.NON_FINITE_NUMBER]: 30,
  [ErrorCode.UNSUPPORTED_NATIVE_VALUE]: 31,
  [ErrorCode.CIRCULAR_STRUCTURE]: 32,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
