import * as path from 'node:path';

import type { PipelineEnv } from '@lender-rank/env';
import type { z } from 'zod';

import type { MergeCommandOptionsSchema } from '../shared/schemas.js';

export type MergeCommandOptions = z.infer<typeof MergeCommandOptionsSchema>;

/**
 * Merge handler parameters.
 */
export interface MergeHandlerParams {
  /** Directory holding the per-lender export files */
  inputDir: string;

  /** Merged file, resolved against the result directory */
  outputPath: string;
}

/**
 * Merge CLI flags over the environment. The input directory defaults to the
 * export output directory; an absolute --output-file ignores the result directory.
 */
export function buildMergeParamsFromFlags(options: MergeCommandOptions, env: PipelineEnv): MergeHandlerParams {
  const resultDir = options.resultDir ?? env.LENDER_RANK_RESULT_DIR;
  const outputFile = options.outputFile ?? env.LENDER_RANK_MERGED_FILE;

  return {
    inputDir: options.inputDir ?? env.LENDER_RANK_OUTPUT_DIR,
    outputPath: path.resolve(resultDir, outputFile),
  };
}
