import * as path from 'node:path';

import type { Diagnostic, RecordLayout } from '@lender-rank/core';
import {
  countMissingValues,
  DEFAULT_RECORD_LAYOUT,
  formatCalendarMonth,
  toSourceRecords,
  wrapError,
} from '@lender-rank/core';
import type { QuerySource } from '@lender-rank/data';
import { getLogger } from '@lender-rank/logger';
import type { RankingWindow, SanitizerOptions, TierLookup } from '@lender-rank/ranking';
import {
  DEFAULT_SANITIZER_OPTIONS,
  joinTiers,
  rankRecords,
  resolveRankingWindow,
  sanitizeRows,
  toExportTable,
} from '@lender-rank/ranking';
import { writeDelimitedFile } from '@lender-rank/tabular';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { CliError } from '../shared/cli-error.js';
import type { CommandHandler } from '../shared/command-execution.js';
import { ExitCodes } from '../shared/exit-codes.js';

import { selectLenders, toExportFileName, type ExportHandlerParams } from './export-utils.js';

export interface LenderExport {
  lender: string;

  /** Written file, or undefined when the query returned no rows */
  path: string | undefined;

  rowCount: number;
  diagnostics: Diagnostic[];
}

export interface LenderFailure {
  lender: string;
  error: string;
}

/**
 * Result of the export operation.
 */
export interface ExportResult {
  reportMonth: string;
  exports: LenderExport[];
  failures: LenderFailure[];
}

export interface ExportHandlerOptions {
  layout?: RecordLayout | undefined;
  sanitizer?: SanitizerOptions | undefined;
}

/**
 * Runs the per-lender pipeline: query, tier join, ranking, sanitizing and
 * the delimited export. A failing lender is recorded and the run moves on;
 * failing to list lenders aborts the run. Lenders whose file name collides
 * with an earlier lender's are recorded as failures.
 *
 * Owns the query source and closes it on destroy().
 */
export class ExportHandler implements CommandHandler<ExportHandlerParams, ExportResult> {
  private readonly logger = getLogger('ExportHandler');
  private readonly layout: RecordLayout;
  private readonly sanitizer: SanitizerOptions;

  constructor(
    private readonly querySource: QuerySource,
    private readonly tierLookup: TierLookup,
    options: ExportHandlerOptions = {}
  ) {
    this.layout = options.layout ?? DEFAULT_RECORD_LAYOUT;
    this.sanitizer = {
      ...(options.sanitizer ?? DEFAULT_SANITIZER_OPTIONS),
      timestampColumn: this.layout.timestampColumn,
    };
  }

  async execute(params: ExportHandlerParams): Promise<Result<ExportResult, Error>> {
    const listed = await this.querySource.listEntities();
    if (listed.isErr()) {
      return err(new CliError(listed.error.message, ExitCodes.DATABASE_ERROR, { cause: listed.error }));
    }

    const { lenders, missing } = selectLenders(listed.value, params.lenders);
    const window = resolveRankingWindow(params.reportMonth);

    this.logger.info(
      {
        lenders: lenders.length,
        reportMonth: formatCalendarMonth(window.current),
        startDate: params.startDate.toISOString(),
        endDate: params.endDate.toISOString(),
      },
      'Starting lender exports'
    );

    const exports: LenderExport[] = [];
    const failures: LenderFailure[] = missing.map((lender) => ({
      lender,
      error: `Lender not found in source: ${lender}`,
    }));

    // sanitized names can coincide; a later lender must not overwrite an earlier file
    const fileOwners = new Map<string, string>();

    for (const lender of lenders) {
      const fileName = toExportFileName(lender);
      const owner = fileOwners.get(fileName);
      if (owner !== undefined) {
        const error = `Export file name ${fileName} is already used by ${owner}`;
        this.logger.error({ lender, owner, fileName }, 'Lender export skipped');
        failures.push({ lender, error });
        continue;
      }
      fileOwners.set(fileName, lender);

      const result = await this.exportLender(lender, fileName, params, window);
      if (result.isErr()) {
        this.logger.error({ lender, error: result.error.message }, 'Lender export failed');
        failures.push({ lender, error: result.error.message });
        continue;
      }
      exports.push(result.value);
    }

    this.logger.info({ exported: exports.length, failed: failures.length }, 'Lender exports finished');

    return ok({ reportMonth: formatCalendarMonth(window.current), exports, failures });
  }

  async destroy(): Promise<void> {
    await this.querySource.close();
  }

  private async exportLender(
    lender: string,
    fileName: string,
    params: ExportHandlerParams,
    window: RankingWindow
  ): Promise<Result<LenderExport, Error>> {
    try {
      const queried = await this.querySource.executeQuery({
        startDate: params.startDate,
        endDate: params.endDate,
        lenderName: lender,
      });
      if (queried.isErr()) {
        return err(queried.error);
      }

      const recordSet = queried.value;
      if (recordSet.rows.length === 0) {
        this.logger.warn({ lender }, 'Query returned no rows, no file written');
        return ok({
          lender,
          path: undefined,
          rowCount: 0,
          diagnostics: [{ stage: 'export', code: 'EMPTY_RESULT', message: `No rows for ${lender}` }],
        });
      }

      const records = toSourceRecords(recordSet, this.layout);
      if (records.isErr()) {
        return err(records.error);
      }

      const ranked = rankRecords(joinTiers(records.value, this.tierLookup), window);
      const table = toExportTable(recordSet.columns, ranked.records, this.layout);

      this.logger.info(
        { lender, rows: table.rows.length, missing: countMissingValues(table.columns, table.rows) },
        'Prepared export rows'
      );

      const sanitized = sanitizeRows(table.rows, this.sanitizer);
      const outputPath = path.join(params.outputDir, fileName);
      const written = await writeDelimitedFile(outputPath, { columns: table.columns, rows: sanitized.rows });
      if (written.isErr()) {
        return err(written.error);
      }

      this.logger.info({ lender, path: outputPath, rows: written.value.rowCount }, 'Saved lender export');

      return ok({
        lender,
        path: written.value.path,
        rowCount: written.value.rowCount,
        diagnostics: [...sanitized.diagnostics, ...written.value.diagnostics],
      });
    } catch (error) {
      return wrapError(error, `Export failed for ${lender}`);
    }
  }
}
