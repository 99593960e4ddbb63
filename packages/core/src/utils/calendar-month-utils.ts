import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { parseTimestamp } from './timestamp-utils.js';

/**
 * A calendar month in the reference zone (UTC). `month` is 1-based.
 */
export interface CalendarMonth {
  readonly year: number;
  readonly month: number;
}

/**
 * Truncate an instant to its calendar month in UTC.
 */
export function calendarMonthOf(date: Date): CalendarMonth {
  return { year: date.getUTCFullYear(), month: date.getUTCMonth() + 1 };
}

/**
 * Move a month by whole calendar months; negative deltas go back in time and
 * cross year boundaries (2025-01 shifted by -1 is 2024-12).
 */
export function shiftCalendarMonth(month: CalendarMonth, delta: number): CalendarMonth {
  const index = month.year * 12 + (month.month - 1) + delta;
  const year = Math.floor(index / 12);
  return { year, month: index - year * 12 + 1 };
}

export function formatCalendarMonth(month: CalendarMonth): string {
  return `${String(month.year).padStart(4, '0')}-${String(month.month).padStart(2, '0')}`;
}

export function isSameCalendarMonth(a: CalendarMonth, b: CalendarMonth): boolean {
  return a.year === b.year && a.month === b.month;
}

export function compareCalendarMonths(a: CalendarMonth, b: CalendarMonth): number {
  return a.year !== b.year ? a.year - b.year : a.month - b.month;
}

/**
 * Parse `YYYY-MM`, a date, or a full timestamp into its calendar month.
 */
export function parseCalendarMonth(text: string): Result<CalendarMonth, Error> {
  const trimmed = text.trim();
  const monthOnly = /^(\d{4})-(\d{2})$/.exec(trimmed);
  if (monthOnly) {
    const year = Number(monthOnly[1]);
    const month = Number(monthOnly[2]);
    if (month < 1 || month > 12) {
      return err(new Error(`Invalid month in "${text}"`));
    }
    return ok({ year, month });
  }

  const timestamp = parseTimestamp(trimmed);
  if (!timestamp) {
    return err(new Error(`Invalid date "${text}". Use YYYY-MM, YYYY-MM-DD or an ISO timestamp`));
  }
  return ok(calendarMonthOf(timestamp));
}
