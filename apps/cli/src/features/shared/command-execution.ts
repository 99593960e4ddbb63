import { getErrorMessage } from '@lender-rank/core';
import { getPipelineEnv, type PipelineEnv } from '@lender-rank/env';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { CliError } from './cli-error.js';
import { ExitCodes } from './exit-codes.js';

/**
 * Command handler interface.
 */
export interface CommandHandler<TParams, TResult> {
  execute(params: TParams): Promise<Result<TResult, Error>>;
  destroy(): Promise<void>;
}

/**
 * Convert Result to value or throw error.
 */
export function unwrapResult<T>(result: Result<T, Error>): T {
  if (result.isErr()) {
    throw result.error;
  }
  return result.value;
}

/**
 * Validated pipeline environment, with validation failures mapped to CONFIG_ERROR.
 */
export function loadPipelineEnv(): Result<PipelineEnv, Error> {
  try {
    return ok(getPipelineEnv());
  } catch (error) {
    return err(new CliError(getErrorMessage(error), ExitCodes.CONFIG_ERROR));
  }
}
