import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import type { Diagnostic, DiagnosticStage } from '@lender-rank/core';
import { getErrorMessage, wrapError } from '@lender-rank/core';
import { getLogger } from '@lender-rank/logger';
import type { Result } from 'neverthrow';
import { ok } from 'neverthrow';

import { type DelimitedTable, parseDelimitedRecords, serializeDelimited } from './delimited-format.js';

const logger = getLogger('TabularExporter');

export interface WrittenFile {
  path: string;
  columns: readonly string[];
  rowCount: number;
  /** Structural warnings from the post-write check. The file is kept regardless. */
  diagnostics: Diagnostic[];
}

export interface WriteDelimitedFileOptions {
  /** Stage recorded on validation diagnostics. Defaults to 'export'. */
  stage?: DiagnosticStage | undefined;
}

function compareHeader(
  header: readonly string[],
  expectedColumns: readonly string[],
  stage: DiagnosticStage
): Diagnostic | undefined {
  if (header.length !== expectedColumns.length) {
    return {
      stage,
      code: 'HEADER_MISMATCH',
      message: `Header has ${header.length} columns, expected ${expectedColumns.length}`,
    };
  }

  const index = expectedColumns.findIndex((column, i) => header[i] !== column);
  if (index === -1) return undefined;

  const expected = expectedColumns[index] ?? '';
  return {
    stage,
    code: 'HEADER_MISMATCH',
    column: expected,
    message: `Header column ${index}: expected "${expected}", found "${header[index] ?? ''}"`,
  };
}

/**
 * Re-read a written file and check its header field-for-field and the width
 * of the first data record. Problems come back as diagnostics, never errors.
 */
export async function validateDelimitedFile(
  filePath: string,
  expectedColumns: readonly string[],
  stage: DiagnosticStage = 'export'
): Promise<Diagnostic[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    return [{ stage, code: 'VALIDATION_FAILED', message: `Could not re-read ${filePath}: ${getErrorMessage(error)}` }];
  }

  const recordsResult = parseDelimitedRecords(content);
  if (recordsResult.isErr()) {
    return [{ stage, code: 'VALIDATION_FAILED', message: `${filePath}: ${recordsResult.error.message}` }];
  }

  const [header = [], firstRecord] = recordsResult.value;
  const diagnostics: Diagnostic[] = [];

  const headerDiagnostic = compareHeader(header, expectedColumns, stage);
  if (headerDiagnostic) {
    diagnostics.push(headerDiagnostic);
  }

  if (firstRecord && firstRecord.length !== expectedColumns.length) {
    diagnostics.push({
      stage,
      code: 'ROW_WIDTH_MISMATCH',
      rowIndex: 0,
      message: `First data row has ${firstRecord.length} fields, expected ${expectedColumns.length}`,
    });
  }

  return diagnostics;
}

/**
 * Write a table in the export format, then validate the written file.
 * Only I/O failures are errors; structural mismatches are reported on the result.
 */
export async function writeDelimitedFile(
  filePath: string,
  table: DelimitedTable,
  options?: WriteDelimitedFileOptions
): Promise<Result<WrittenFile, Error>> {
  const stage = options?.stage ?? 'export';

  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, serializeDelimited(table), 'utf8');
  } catch (error) {
    logger.error({ error, filePath }, 'Failed to write delimited file');
    return wrapError(error, `Failed to write ${filePath}`);
  }

  const diagnostics = await validateDelimitedFile(filePath, table.columns, stage);
  for (const diagnostic of diagnostics) {
    logger.warn({ filePath, code: diagnostic.code }, diagnostic.message);
  }

  logger.debug({ filePath, rows: table.rows.length, columns: table.columns.length }, 'Wrote delimited file');

  return ok({ path: filePath, columns: table.columns, rowCount: table.rows.length, diagnostics });
}
