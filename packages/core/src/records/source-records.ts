import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { z } from 'zod';

import type { CellValue, RecordLayout, SourceRecord, SourceRecordSet } from '../types/records.js';
import { toTimestamp } from '../utils/timestamp-utils.js';

const EntityIdSchema = z
  .string({ invalid_type_error: 'lender must be a string', required_error: 'lender is missing' })
  .refine((value) => value.trim().length > 0, { message: 'lender is empty' });

/**
 * Convert a raw driver value into a cell. Booleans and bigints become their
 * text/number form, objects are serialized so the sanitizer can inspect them.
 */
export function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || value instanceof Date) return value;
  if (typeof value === 'number') return Number.isNaN(value) ? null : value;
  if (typeof value === 'bigint') {
    return value <= BigInt(Number.MAX_SAFE_INTEGER) && value >= BigInt(Number.MIN_SAFE_INTEGER)
      ? Number(value)
      : value.toString();
  }
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  return JSON.stringify(value);
}

/**
 * Turn a query record set into typed source records, in order.
 *
 * Every row must carry a non-empty lender in the entity column; a row without
 * one fails the whole set rather than being dropped. Missing or unparseable
 * timestamps parse to null; the cell itself is kept as `rawTimestamp`.
 */
export function toSourceRecords(recordSet: SourceRecordSet, layout: RecordLayout): Result<SourceRecord[], Error> {
  if (recordSet.rows.length > 0 && !recordSet.columns.includes(layout.entityColumn)) {
    return err(new Error(`Record set has no "${layout.entityColumn}" column`));
  }

  const records: SourceRecord[] = [];

  for (const [index, row] of recordSet.rows.entries()) {
    const entity = EntityIdSchema.safeParse(row[layout.entityColumn]);
    if (!entity.success) {
      const reason = entity.error.issues[0]?.message ?? 'invalid lender';
      return err(new Error(`Row ${index}: ${reason} in column "${layout.entityColumn}"`));
    }

    const fields: Record<string, CellValue> = {};
    for (const column of recordSet.columns) {
      if (column === layout.entityColumn || column === layout.timestampColumn) continue;
      fields[column] = toCellValue(row[column]);
    }

    const rawTimestamp = row[layout.timestampColumn];
    records.push({
      entityId: entity.data,
      timestamp: toTimestamp(rawTimestamp),
      rawTimestamp: toCellValue(rawTimestamp),
      fields,
    });
  }

  return ok(records);
}
