import type { CellValue, RankedRecord, RecordLayout, TableRow } from '@lender-rank/core';

export const TIER_COLUMN = 'Tier';
export const RANK_ONE_MONTH_COLUMN = 'rank_in_tier_one_month';
export const RANK_TWO_MONTHS_COLUMN = 'rank_in_tier_two_months';

const APPENDED_COLUMNS = [TIER_COLUMN, RANK_ONE_MONTH_COLUMN, RANK_TWO_MONTHS_COLUMN] as const;

export interface ExportTable {
  columns: string[];
  rows: TableRow[];
}

/**
 * Source columns in query order, then the tier and the two lagging ranks.
 * A source column sharing a name with an appended column is replaced by it.
 */
export function exportColumns(sourceColumns: readonly string[]): string[] {
  const appended = new Set<string>(APPENDED_COLUMNS);
  return [...sourceColumns.filter((column) => !appended.has(column)), ...APPENDED_COLUMNS];
}

/**
 * Lay ranked records out as export rows, one per record, in record order.
 */
export function toExportTable(
  sourceColumns: readonly string[],
  records: readonly RankedRecord[],
  layout: RecordLayout
): ExportTable {
  const columns = exportColumns(sourceColumns);

  const rows = records.map((record) => {
    const row: Record<string, CellValue> = {};
    for (const column of columns) {
      if (column === TIER_COLUMN) {
        row[column] = record.tier;
      } else if (column === RANK_ONE_MONTH_COLUMN) {
        row[column] = record.rankOneMonth;
      } else if (column === RANK_TWO_MONTHS_COLUMN) {
        row[column] = record.rankTwoMonths;
      } else if (column === layout.entityColumn) {
        row[column] = record.entityId;
      } else if (column === layout.timestampColumn) {
        // unparseable cells go out as read; the sanitizer renders the rest
        row[column] = record.timestamp ?? record.rawTimestamp;
      } else {
        row[column] = record.fields[column] ?? null;
      }
    }
    return row;
  });

  return { columns, rows };
}
