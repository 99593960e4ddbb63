import type { TableRow } from '../types/records.js';

/**
 * Count null or empty cells per column, in column order.
 */
export function countMissingValues(columns: readonly string[], rows: readonly TableRow[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const column of columns) {
    counts[column] = 0;
  }

  for (const row of rows) {
    for (const column of columns) {
      const value = row[column];
      if (value === null || value === undefined || value === '') {
        counts[column] = (counts[column] ?? 0) + 1;
      }
    }
  }

  return counts;
}
