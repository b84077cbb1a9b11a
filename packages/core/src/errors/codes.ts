/**
 * Error Code Infrastructure
 * Stable error codes, exit codes, and HTTP status mappings.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Generation Errors (E100–E199)
  NON_FEASIBLE_CONFIG = 'E100',
  EMPTY_CHARSET = 'E101',

  // Configuration Errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',
  INVALID_ARGUMENT = 'E310',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.NON_FEASIBLE_CONFIG]: 30,
  [ErrorCode.EMPTY_CHARSET]: 31,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.INVALID_ARGUMENT]: 51,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

// HTTP status mapping for API responses
export const HTTP_STATUS_BY_CODE = {
  [ErrorCode.NON_FEASIBLE_CONFIG]: 422,
  [ErrorCode.EMPTY_CHARSET]: 422,
  [ErrorCode.CONFIGURATION_ERROR]: 400,
  [ErrorCode.INVALID_ARGUMENT]: 400,
  [ErrorCode.INTERNAL_ERROR]: 500,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}

export function getHttpStatus(code: ErrorCode): number {
  return HTTP_STATUS_BY_CODE[code];
}
