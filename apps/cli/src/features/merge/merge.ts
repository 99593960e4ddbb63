import { toError } from '@lender-rank/core';
import type { Command } from 'commander';
import pc from 'picocolors';

import { exitCodeFor } from '../shared/cli-error.js';
import { loadPipelineEnv, unwrapResult } from '../shared/command-execution.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { OutputManager } from '../shared/output.js';
import { MergeCommandOptionsSchema } from '../shared/schemas.js';

import { MergeHandler } from './merge-handler.js';
import { buildMergeParamsFromFlags } from './merge-utils.js';

/**
 * Register the merge command.
 */
export function registerMergeCommand(program: Command): void {
  program
    .command('merge')
    .description('Union every per-lender export into one delimited file')
    .option('--input-dir <path>', 'Directory holding the per-lender exports (defaults to the export output directory)')
    .option('--result-dir <path>', 'Directory for the merged file')
    .option('--output-file <name>', 'Merged file name')
    .option('--json', 'Output results in JSON format')
    .action(async (rawOptions: unknown) => {
      await executeMergeCommand(rawOptions);
    });
}

async function executeMergeCommand(rawOptions: unknown): Promise<void> {
  const isJsonMode =
    typeof rawOptions === 'object' && rawOptions !== null && 'json' in rawOptions && rawOptions.json === true;

  const validationResult = MergeCommandOptionsSchema.safeParse(rawOptions);
  if (!validationResult.success) {
    const output = new OutputManager(isJsonMode ? 'json' : 'text');
    const firstError = validationResult.error.issues[0];
    output.error('merge', new Error(firstError?.message ?? 'Invalid options'), ExitCodes.INVALID_ARGS);
    return;
  }

  const options = validationResult.data;
  const output = new OutputManager(options.json ? 'json' : 'text');

  try {
    const env = unwrapResult(loadPipelineEnv());
    const params = buildMergeParamsFromFlags(options, env);

    output.intro('lender-rank merge');

    const handler = new MergeHandler();
    const result = await handler.execute(params);
    if (result.isErr()) {
      output.error('merge', result.error, exitCodeFor(result.error));
      return;
    }

    const merged = result.value;
    if (output.isTextMode()) {
      for (const diagnostic of merged.diagnostics) {
        output.warn(diagnostic.message);
      }
      output.outro(
        `✨ Merged ${merged.inputFiles.length} file(s), ${merged.rowCount} rows → ${pc.dim(merged.outputPath)}`
      );
    }

    output.json('merge', merged);
    process.exit(ExitCodes.SUCCESS);
  } catch (error) {
    const failure = toError(error);
    output.error('merge', failure, exitCodeFor(failure));
  }
}
