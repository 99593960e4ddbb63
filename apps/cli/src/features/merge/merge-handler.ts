import * as fs from 'node:fs/promises';

import { getErrorMessage, hasErrorCode } from '@lender-rank/core';
import { getLogger } from '@lender-rank/logger';
import { mergeExportFiles, type MergeExportsResult } from '@lender-rank/tabular';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { CliError } from '../shared/cli-error.js';
import { ExitCodes } from '../shared/exit-codes.js';

import type { MergeHandlerParams } from './merge-utils.js';

/**
 * Unions the per-lender exports into one file.
 */
export class MergeHandler {
  private readonly logger = getLogger('MergeHandler');

  async execute(params: MergeHandlerParams): Promise<Result<MergeExportsResult, Error>> {
    const missing = await this.checkInputDirectory(params.inputDir);
    if (missing) {
      return err(missing);
    }

    const result = await mergeExportFiles({ inputDir: params.inputDir, outputPath: params.outputPath });
    if (result.isErr()) {
      return err(result.error);
    }

    this.logger.info(
      {
        files: result.value.inputFiles.length,
        skipped: result.value.skippedFiles.length,
        rows: result.value.rowCount,
        outputPath: result.value.outputPath,
      },
      'Merged lender exports'
    );

    return ok(result.value);
  }

  private async checkInputDirectory(inputDir: string): Promise<CliError | undefined> {
    try {
      const stats = await fs.stat(inputDir);
      if (!stats.isDirectory()) {
        return new CliError(`Input path is not a directory: ${inputDir}`, ExitCodes.INVALID_ARGS);
      }
      return undefined;
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return new CliError(`Input directory not found: ${inputDir}`, ExitCodes.NOT_FOUND);
      }
      return new CliError(
        `Cannot access input directory ${inputDir}: ${getErrorMessage(error)}`,
        ExitCodes.GENERAL_ERROR
      );
    }
  }
}
