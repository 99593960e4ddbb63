/**
 * Semantic exit codes for the CLI.
 * Following POSIX conventions.
 */
export const ExitCodes = {
  /** Successful execution */
  SUCCESS: 0,

  /** General error (catch-all), also used when at least one lender failed */
  GENERAL_ERROR: 1,

  /** Invalid command arguments or options */
  INVALID_ARGS: 2,

  /** Resource not found (query template, tier list, input directory) */
  NOT_FOUND: 4,

  /** Query source could not be opened or listed */
  DATABASE_ERROR: 7,

  /** Input data failed validation (malformed tier list) */
  VALIDATION_ERROR: 8,

  /** Required configuration missing or invalid */
  CONFIG_ERROR: 11,

  /** Output location not writable */
  PERMISSION_DENIED: 13,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];
