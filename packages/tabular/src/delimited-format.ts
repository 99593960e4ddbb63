import * as fs from 'node:fs/promises';

import type { CellValue, TableRow } from '@lender-rank/core';
import { formatExportTimestamp, getErrorMessage, wrapError } from '@lender-rank/core';
import { parse } from 'csv-parse/sync';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { z } from 'zod';

export const FIELD_DELIMITER = '\t';
export const RECORD_SEPARATOR = '\n';
export const BYTE_ORDER_MARK = '\uFEFF';

const RawRecordsSchema = z.array(z.array(z.string()));

/**
 * An ordered table: `columns` fixes the field order of every row.
 */
export interface DelimitedTable {
  columns: readonly string[];
  rows: readonly TableRow[];
}

/**
 * Quote one field. Embedded quotes are doubled; every other character,
 * backslash included, is written as is. Missing and non-finite values
 * render as an empty quoted field.
 */
export function formatDelimitedField(value: CellValue | undefined): string {
  let text: string;
  if (value === null || value === undefined) {
    text = '';
  } else if (value instanceof Date) {
    text = Number.isNaN(value.getTime()) ? '' : formatExportTimestamp(value);
  } else if (typeof value === 'number') {
    text = Number.isFinite(value) ? String(value) : '';
  } else {
    text = value;
  }
  return `"${text.replaceAll('"', '""')}"`;
}

function formatRecord(fields: readonly (CellValue | undefined)[]): string {
  return fields.map(formatDelimitedField).join(FIELD_DELIMITER) + RECORD_SEPARATOR;
}

/**
 * Serialize a table to the export format: BOM, quoted header, one
 * newline-terminated record per row.
 */
export function serializeDelimited(table: DelimitedTable): string {
  const lines = [formatRecord(table.columns)];
  for (const row of table.rows) {
    lines.push(formatRecord(table.columns.map((column) => row[column])));
  }
  return BYTE_ORDER_MARK + lines.join('');
}

/**
 * Parse export-format text into raw string records, header first.
 * Records keep their own width so callers can detect column shifts.
 */
export function parseDelimitedRecords(content: string): Result<string[][], Error> {
  const cleanContent = content.replace(/^\uFEFF/, '');

  let parsed: unknown;
  try {
    parsed = parse(cleanContent, {
      delimiter: FIELD_DELIMITER,
      record_delimiter: RECORD_SEPARATOR,
      relax_column_count: true,
      skip_empty_lines: true,
    });
  } catch (error) {
    return err(new Error(`Failed to parse delimited content: ${getErrorMessage(error)}`));
  }

  const records = RawRecordsSchema.safeParse(parsed);
  if (!records.success) {
    return err(new Error(`Unexpected parser output: ${records.error.message}`));
  }
  return ok(records.data);
}

/**
 * Parse export-format text into a table. Empty fields read back as null;
 * cells beyond the header width are dropped and missing cells are null.
 */
export function parseDelimited(content: string): Result<DelimitedTable, Error> {
  const recordsResult = parseDelimitedRecords(content);
  if (recordsResult.isErr()) {
    return err(recordsResult.error);
  }

  const [header, ...records] = recordsResult.value;
  if (!header) {
    return err(new Error('Delimited content has no header row'));
  }

  const rows = records.map((record) => {
    const row: Record<string, CellValue> = {};
    header.forEach((column, index) => {
      const cell = record[index];
      row[column] = cell === undefined || cell === '' ? null : cell;
    });
    return row;
  });

  return ok({ columns: header, rows });
}

export async function readDelimitedFile(filePath: string): Promise<Result<DelimitedTable, Error>> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    return wrapError(error, `Failed to read ${filePath}`);
  }
  return parseDelimited(content);
}
