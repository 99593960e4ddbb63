import type { Result } from 'neverthrow';

import { ExitCodes, type ExitCode } from './exit-codes.js';

/**
 * Error carrying the exit code the command should terminate with.
 */
export class CliError extends Error {
  constructor(
    message: string,
    readonly exitCode: ExitCode,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'CliError';
  }
}

/**
 * Tag the error of a result with an exit code. Errors that already carry one
 * keep it.
 */
export function withExitCode<T>(result: Result<T, Error>, exitCode: ExitCode): Result<T, Error> {
  return result.mapErr((error) =>
    error instanceof CliError ? error : new CliError(error.message, exitCode, { cause: error })
  );
}

export function exitCodeFor(error: Error): ExitCode {
  return error instanceof CliError ? error.exitCode : ExitCodes.GENERAL_ERROR;
}
