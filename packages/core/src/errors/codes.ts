/**
 * Error Code Infrastructure
 * Stable error codes and exit codes for boundary errors.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Schema and parse errors (E001–E099)
  SCHEMA_COMPILATION_FAILED = 'E010',
  PARSE_FAILED = 'E011',
  UNKNOWN_SCHEMA = 'E012',

  // Validation Errors (E200–E299)
  DOCUMENT_VALIDATION_FAILED = 'E200',

  // Configuration Errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',
  FILE_ERROR = 'E310',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// Every failure surfaces as a plain non-zero status; the code is for reports.
export const EXIT_CODES = {
  [ErrorCode.SCHEMA_COMPILATION_FAILED]: 1,
  [ErrorCode.PARSE_FAILED]: 1,
  [ErrorCode.UNKNOWN_SCHEMA]: 1,
  [ErrorCode.DOCUMENT_VALIDATION_FAILED]: 1,
  [ErrorCode.CONFIGURATION_ERROR]: 1,
  [ErrorCode.FILE_ERROR]: 1,
  [ErrorCode.INTERNAL_ERROR]: 1,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
