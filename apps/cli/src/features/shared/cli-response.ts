import type { ExitCode } from './exit-codes.js';

export interface CLIResponseMetadata {
  [key: string]: unknown;

  /** Command execution duration in milliseconds */
  duration_ms?: number | undefined;
}

/**
 * Standardized CLI response format printed in --json mode.
 */
export interface CLIResponse<T = unknown> {
  /** Whether the command executed successfully */
  success: boolean;

  /** Command that was executed */
  command: string;

  /** ISO 8601 timestamp of when the response was generated */
  timestamp: string;

  /** Response data (only present on success) */
  data?: T;

  /** Error information (only present on failure) */
  error?:
    | {
        /** Machine-readable error code */
        code: string;

        /** Human-readable error message */
        message: string;

        /** Stack trace (development only) */
        stack?: string | undefined;
      }
    | undefined;

  metadata?: CLIResponseMetadata | undefined;
}

export function createSuccessResponse<T>(command: string, data: T, metadata?: CLIResponseMetadata): CLIResponse<T> {
  const response: CLIResponse<T> = {
    success: true,
    command,
    timestamp: new Date().toISOString(),
    data,
  };

  if (metadata) {
    response.metadata = metadata;
  }

  return response;
}

export function createErrorResponse(command: string, error: Error, code: string): CLIResponse<never> {
  const errorObj: { code: string; message: string; stack?: string | undefined } = {
    code,
    message: error.message,
  };

  if (process.env['NODE_ENV'] === 'development' && error.stack) {
    errorObj.stack = error.stack;
  }

  return {
    success: false,
    command,
    timestamp: new Date().toISOString(),
    error: errorObj,
  };
}

const ERROR_CODES: Record<ExitCode, string> = {
  0: 'SUCCESS',
  1: 'GENERAL_ERROR',
  2: 'INVALID_ARGS',
  4: 'NOT_FOUND',
  7: 'DATABASE_ERROR',
  8: 'VALIDATION_ERROR',
  11: 'CONFIG_ERROR',
  13: 'PERMISSION_DENIED',
};

/**
 * Map exit code to error code string.
 */
export function exitCodeToErrorCode(exitCode: ExitCode): string {
  return ERROR_CODES[exitCode];
}
