import type { Dirent } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import type { CellValue, Diagnostic, TableRow } from '@lender-rank/core';
import { formatExportTimestamp, hasErrorCode, parseTimestamp, wrapError } from '@lender-rank/core';
import { getLogger } from '@lender-rank/logger';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { readDelimitedFile } from './delimited-format.js';
import { writeDelimitedFile } from './tabular-exporter.js';

const logger = getLogger('MergeExports');

const EXPORT_EXTENSION = '.csv';

export interface MergeExportsOptions {
  inputDir: string;
  outputPath: string;
  /** Column re-rendered in the export timestamp format. Defaults to `time`. */
  timestampColumn?: string | undefined;
}

export interface MergeExportsResult {
  outputPath: string;
  inputFiles: string[];
  skippedFiles: string[];
  columns: string[];
  rowCount: number;
  diagnostics: Diagnostic[];
}

function normalizeTimestampCell(value: CellValue | undefined): CellValue {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return formatExportTimestamp(value);
  const parsed = parseTimestamp(String(value));
  return parsed ? formatExportTimestamp(parsed) : null;
}

async function listExportFiles(inputDir: string, outputPath: string): Promise<Result<string[], Error>> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(inputDir, { withFileTypes: true });
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return err(new Error(`Input directory not found: ${inputDir}`));
    }
    return wrapError(error, `Failed to read input directory ${inputDir}`);
  }

  const resolvedOutput = path.resolve(outputPath);
  const files = entries
    .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith(EXPORT_EXTENSION))
    .map((entry) => path.join(inputDir, entry.name))
    .filter((filePath) => path.resolve(filePath) !== resolvedOutput)
    .sort();

  return ok(files);
}

/**
 * Union every export file in a directory into one file of the same format.
 *
 * Columns are the union of all headers in order of first appearance. Files
 * that cannot be read are skipped with a diagnostic; the run fails only when
 * no file could be read.
 */
export async function mergeExportFiles(options: MergeExportsOptions): Promise<Result<MergeExportsResult, Error>> {
  const { inputDir, outputPath } = options;
  const timestampColumn = options.timestampColumn ?? 'time';

  const filesResult = await listExportFiles(inputDir, outputPath);
  if (filesResult.isErr()) {
    return err(filesResult.error);
  }

  const files = filesResult.value;
  if (files.length === 0) {
    return err(new Error(`No ${EXPORT_EXTENSION} files found in ${inputDir}`));
  }

  const columns: string[] = [];
  const seenColumns = new Set<string>();
  const tables: { filePath: string; rows: readonly TableRow[] }[] = [];
  const skippedFiles: string[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const filePath of files) {
    const tableResult = await readDelimitedFile(filePath);
    if (tableResult.isErr()) {
      logger.warn({ filePath, error: tableResult.error.message }, 'Skipping unreadable export file');
      skippedFiles.push(filePath);
      diagnostics.push({
        stage: 'merge',
        code: 'UNREADABLE_FILE',
        message: `${path.basename(filePath)}: ${tableResult.error.message}`,
      });
      continue;
    }

    for (const column of tableResult.value.columns) {
      if (!seenColumns.has(column)) {
        seenColumns.add(column);
        columns.push(column);
      }
    }
    tables.push({ filePath, rows: tableResult.value.rows });
    logger.debug({ filePath, rows: tableResult.value.rows.length }, 'Read export file');
  }

  if (tables.length === 0) {
    return err(new Error(`None of the ${files.length} file(s) in ${inputDir} could be read`));
  }

  const rows: TableRow[] = [];
  for (const table of tables) {
    for (const source of table.rows) {
      const row: Record<string, CellValue> = {};
      for (const column of columns) {
        const value = source[column];
        row[column] = column === timestampColumn ? normalizeTimestampCell(value) : (value ?? null);
      }
      rows.push(row);
    }
  }

  const writeResult = await writeDelimitedFile(outputPath, { columns, rows }, { stage: 'merge' });
  if (writeResult.isErr()) {
    return err(writeResult.error);
  }

  logger.info(
    { outputPath, files: tables.length, skipped: skippedFiles.length, rows: rows.length },
    'Merged export files'
  );

  return ok({
    outputPath,
    inputFiles: tables.map((table) => table.filePath),
    skippedFiles,
    columns,
    rowCount: rows.length,
    diagnostics: [...diagnostics, ...writeResult.value.diagnostics],
  });
}
