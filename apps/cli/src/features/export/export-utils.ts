// Pure helpers for the export command, plus the output directory check

import { constants } from 'node:fs';
import * as fs from 'node:fs/promises';

import type { CalendarMonth } from '@lender-rank/core';
import { calendarMonthOf, getErrorMessage, parseCalendarMonth, parseTimestamp } from '@lender-rank/core';
import type { PipelineEnv } from '@lender-rank/env';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { z } from 'zod';

import { CliError } from '../shared/cli-error.js';
import { ExitCodes } from '../shared/exit-codes.js';
import type { ExportCommandOptionsSchema } from '../shared/schemas.js';

/**
 * Export command options validated by Zod at CLI boundary
 */
export type ExportCommandOptions = z.infer<typeof ExportCommandOptionsSchema>;

/**
 * Export handler parameters.
 */
export interface ExportHandlerParams {
  /** Inclusive start of the query window */
  startDate: Date;

  /** Exclusive end of the query window */
  endDate: Date;

  /** Month the trailing ranks are computed for */
  reportMonth: CalendarMonth;

  /** Directory receiving one `results_<lender>.csv` per lender */
  outputDir: string;

  /** Restrict the run to these lenders */
  lenders?: string[] | undefined;
}

/**
 * Everything the export command resolves before it opens its collaborators.
 */
export interface ExportCommandConfig {
  databasePath: string;
  queryFile: string;
  tierList: string;
  sourceTable: string;
  params: ExportHandlerParams;
}

function parseDateOption(label: string, flag: string, text: string): Result<Date, Error> {
  const date = parseTimestamp(text);
  if (!date) {
    return err(
      new CliError(`Invalid ${label} "${text}" (${flag}). Use YYYY-MM-DD or an ISO timestamp`, ExitCodes.INVALID_ARGS)
    );
  }
  return ok(date);
}

function requireSetting(value: string | undefined, flag: string, envKey: string, label: string): Result<string, Error> {
  if (value === undefined) {
    return err(new CliError(`${label} is required. Pass ${flag} or set ${envKey}`, ExitCodes.CONFIG_ERROR));
  }
  return ok(value);
}

/**
 * Merge CLI flags over the environment and parse the dates.
 * The report month defaults to the month of `today` in UTC.
 */
export function buildExportConfigFromFlags(
  options: ExportCommandOptions,
  env: PipelineEnv,
  today: Date = new Date()
): Result<ExportCommandConfig, Error> {
  const startText = requireSetting(
    options.start ?? env.LENDER_RANK_START_DATE,
    '--start',
    'LENDER_RANK_START_DATE',
    'Start date'
  );
  if (startText.isErr()) return err(startText.error);
  const endText = requireSetting(options.end ?? env.LENDER_RANK_END_DATE, '--end', 'LENDER_RANK_END_DATE', 'End date');
  if (endText.isErr()) return err(endText.error);

  const startDate = parseDateOption('start date', '--start', startText.value);
  if (startDate.isErr()) return err(startDate.error);
  const endDate = parseDateOption('end date', '--end', endText.value);
  if (endDate.isErr()) return err(endDate.error);

  if (endDate.value.getTime() <= startDate.value.getTime()) {
    return err(new CliError('End date must be after start date', ExitCodes.INVALID_ARGS));
  }

  let reportMonth = calendarMonthOf(today);
  const reportText = options.reportDate ?? env.LENDER_RANK_REPORT_DATE;
  if (reportText !== undefined) {
    const parsed = parseCalendarMonth(reportText);
    if (parsed.isErr()) {
      return err(new CliError(`${parsed.error.message} (--report-date)`, ExitCodes.INVALID_ARGS));
    }
    reportMonth = parsed.value;
  }

  const databasePath = requireSetting(
    options.database ?? env.LENDER_RANK_DATABASE_PATH,
    '--database',
    'LENDER_RANK_DATABASE_PATH',
    'Database path'
  );
  if (databasePath.isErr()) return err(databasePath.error);
  const queryFile = requireSetting(
    options.queryFile ?? env.LENDER_RANK_QUERY_FILE,
    '--query-file',
    'LENDER_RANK_QUERY_FILE',
    'Query file'
  );
  if (queryFile.isErr()) return err(queryFile.error);

  return ok({
    databasePath: databasePath.value,
    queryFile: queryFile.value,
    tierList: options.tierList ?? env.LENDER_RANK_TIER_LIST,
    sourceTable: env.LENDER_RANK_SOURCE_TABLE,
    params: {
      startDate: startDate.value,
      endDate: endDate.value,
      reportMonth,
      outputDir: options.outputDir ?? env.LENDER_RANK_OUTPUT_DIR,
      lenders: options.lender,
    },
  });
}

/**
 * `results_<lender>.csv`, with path separators and other characters that
 * are unsafe in file names replaced by `_`.
 */
export function toExportFileName(lender: string): string {
  const safe = lender.trim().replace(/[\\/:*?"<>|\u0000-\u001f]/g, '_');
  return `results_${safe}.csv`;
}

/**
 * Lenders to export: the listed ones, narrowed to `requested` when given.
 * Requested lenders the source does not know come back as `missing`.
 */
export function selectLenders(
  listed: readonly string[],
  requested: readonly string[] | undefined
): { lenders: string[]; missing: string[] } {
  if (!requested || requested.length === 0) {
    return { lenders: [...listed], missing: [] };
  }

  const wanted = new Set(requested);
  const known = new Set(listed);
  return {
    lenders: listed.filter((lender) => wanted.has(lender)),
    missing: [...wanted].filter((lender) => !known.has(lender)),
  };
}

/**
 * Create the output directory if needed and check it is writable.
 */
export async function prepareOutputDirectory(dir: string): Promise<Result<string, Error>> {
  try {
    await fs.mkdir(dir, { recursive: true });
    await fs.access(dir, constants.W_OK);
    return ok(dir);
  } catch (error) {
    return err(
      new CliError(
        `Failed to create or access output directory ${dir}: ${getErrorMessage(error)}`,
        ExitCodes.PERMISSION_DENIED
      )
    );
  }
}
