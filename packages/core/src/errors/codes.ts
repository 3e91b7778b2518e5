/**
 * Error Code Infrastructure
 * Stable error codes and exit codes.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Schema document errors (E001–E099)
  INVALID_SCHEMA_DOCUMENT = 'E010',
  UNRESOLVED_PREFIX = 'E011',

  // Lookup errors (E100–E199)
  MODULE_NOT_FOUND = 'E100',
  AUGMENT_TARGET_NOT_FOUND = 'E101',

  // Configuration errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',

  // Parse errors (E400–E499)
  PARSE_ERROR = 'E400',

  // Internal errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.INVALID_SCHEMA_DOCUMENT]: 20,
  [ErrorCode.UNRESOLVED_PREFIX]: 21,
  [ErrorCode.MODULE_NOT_FOUND]: 10,
  [ErrorCode.AUGMENT_TARGET_NOT_FOUND]: 11,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.PARSE_ERROR]: 60,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
