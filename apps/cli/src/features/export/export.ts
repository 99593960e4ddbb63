import { DEFAULT_RECORD_LAYOUT, toError } from '@lender-rank/core';
import { loadQueryTemplate, SqliteQuerySource } from '@lender-rank/data';
import { loadTierLookup } from '@lender-rank/ranking';
import type { Command } from 'commander';
import pc from 'picocolors';

import { exitCodeFor, withExitCode } from '../shared/cli-error.js';
import { loadPipelineEnv, unwrapResult } from '../shared/command-execution.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { OutputManager } from '../shared/output.js';
import { ExportCommandOptionsSchema } from '../shared/schemas.js';

import type { ExportResult } from './export-handler.js';
import { ExportHandler } from './export-handler.js';
import { buildExportConfigFromFlags, prepareOutputDirectory } from './export-utils.js';

/**
 * Register the export command.
 */
export function registerExportCommand(program: Command): void {
  program
    .command('export')
    .description('Rank lenders within their tier and write one delimited export file per lender')
    .option('--start <date>', 'Start of the query window, inclusive (YYYY-MM-DD or ISO timestamp)')
    .option('--end <date>', 'End of the query window, exclusive (YYYY-MM-DD or ISO timestamp)')
    .option('--report-date <date>', 'Any date in the report month (YYYY-MM or YYYY-MM-DD, defaults to today)')
    .option('--database <path>', 'SQLite database holding the lender records')
    .option('--query-file <path>', 'SQL template with {start_date}, {end_date} and {lender_name} placeholders')
    .option('--tier-list <path>', 'Tier list CSV with Lender and Tier columns')
    .option('--output-dir <path>', 'Directory for the per-lender export files')
    .option('--lender <name...>', 'Only export these lenders')
    .option('--json', 'Output results in JSON format')
    .action(async (rawOptions: unknown) => {
      await executeExportCommand(rawOptions);
    });
}

/**
 * Execute the export command.
 */
async function executeExportCommand(rawOptions: unknown): Promise<void> {
  // Check for --json flag early (even before validation) to determine output format
  const isJsonMode =
    typeof rawOptions === 'object' && rawOptions !== null && 'json' in rawOptions && rawOptions.json === true;

  const validationResult = ExportCommandOptionsSchema.safeParse(rawOptions);
  if (!validationResult.success) {
    const output = new OutputManager(isJsonMode ? 'json' : 'text');
    const firstError = validationResult.error.issues[0];
    output.error('export', new Error(firstError?.message ?? 'Invalid options'), ExitCodes.INVALID_ARGS);
    return;
  }

  const options = validationResult.data;
  const output = new OutputManager(options.json ? 'json' : 'text');

  try {
    const env = unwrapResult(loadPipelineEnv());
    const config = unwrapResult(buildExportConfigFromFlags(options, env));

    output.intro('lender-rank export');

    unwrapResult(await prepareOutputDirectory(config.params.outputDir));
    const template = unwrapResult(withExitCode(await loadQueryTemplate(config.queryFile), ExitCodes.NOT_FOUND));
    const tierLookup = unwrapResult(withExitCode(await loadTierLookup(config.tierList), ExitCodes.VALIDATION_ERROR));
    const querySource = unwrapResult(
      withExitCode(
        SqliteQuerySource.open({
          databasePath: config.databasePath,
          template,
          sourceTable: config.sourceTable,
          entityColumn: DEFAULT_RECORD_LAYOUT.entityColumn,
        }),
        ExitCodes.DATABASE_ERROR
      )
    );

    const handler = new ExportHandler(querySource, tierLookup);
    const spinner = output.spinner();
    spinner?.start('Exporting lenders...');

    try {
      const result = await handler.execute(config.params);
      await handler.destroy();
      spinner?.stop('Exports finished');

      if (result.isErr()) {
        output.error('export', result.error, exitCodeFor(result.error));
        return; // TypeScript needs this even though output.error never returns
      }

      handleExportSuccess(output, result.value);
    } catch (error) {
      await handler.destroy();
      spinner?.stop('Export failed');
      throw error;
    }
  } catch (error) {
    const failure = toError(error);
    output.error('export', failure, exitCodeFor(failure));
  }
}

/**
 * Report per-lender results. Exits with GENERAL_ERROR when any lender failed.
 */
function handleExportSuccess(output: OutputManager, result: ExportResult): never {
  if (output.isTextMode()) {
    for (const entry of result.exports) {
      if (entry.path === undefined) {
        output.warn(`${entry.lender}: query returned no rows, no file written`);
        continue;
      }
      const warnings = entry.diagnostics.length > 0 ? pc.yellow(` (${entry.diagnostics.length} warnings)`) : '';
      output.log(`${pc.green('✓')} ${entry.lender}: ${entry.rowCount} rows → ${pc.dim(entry.path)}${warnings}`);
    }

    for (const failure of result.failures) {
      output.warn(`${failure.lender}: ${failure.error}`);
    }

    const written = result.exports.filter((entry) => entry.path !== undefined).length;
    output.outro(
      result.failures.length === 0
        ? `✨ Exported ${written} lender file(s) for ${result.reportMonth}`
        : `⚠️  Exported ${written} lender file(s) for ${result.reportMonth}, ${result.failures.length} failed`
    );
  }

  output.json('export', result);

  if (result.failures.length > 0) {
    process.exit(ExitCodes.GENERAL_ERROR);
  }
  process.exit(ExitCodes.SUCCESS);
}
