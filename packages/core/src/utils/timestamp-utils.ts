const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

function parseOffsetMinutes(offset: string | undefined): number {
  if (!offset || offset.toUpperCase() === 'Z') return 0;

  const sign = offset.startsWith('-') ? -1 : 1;
  const digits = offset.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
  return sign * (hours * 60 + minutes);
}

/**
 * Parse an ISO-8601 or export-format timestamp (`YYYY-MM-DD HH:MM:SS±HHMM`).
 * Values without an offset are read in the reference zone (UTC).
 *
 * @returns the instant, or undefined when the text is not a valid timestamp
 */
export function parseTimestamp(text: string): Date | undefined {
  const match = TIMESTAMP_PATTERN.exec(text.trim());
  if (!match) return undefined;

  const [, yearText, monthText, dayText, hourText, minuteText, secondText, fractionText, offsetText] = match;
  const year = Number(yearText);
  const month = Number(monthText);
  const day = Number(dayText);
  const hour = Number(hourText ?? '0');
  const minute = Number(minuteText ?? '0');
  const second = Number(secondText ?? '0');
  const millisecond = Number((fractionText ?? '').padEnd(3, '0').slice(0, 3));

  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) {
    return undefined;
  }

  const calendarDay = new Date(Date.UTC(year, month - 1, day));
  if (calendarDay.getUTCMonth() !== month - 1 || calendarDay.getUTCDate() !== day) {
    return undefined;
  }

  const offsetMinutes = parseOffsetMinutes(offsetText);
  const instant = Date.UTC(year, month - 1, day, hour, minute, second, millisecond) - offsetMinutes * 60_000;
  return new Date(instant);
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Render an instant as `YYYY-MM-DD HH:MM:SS+0000`. Timestamps are normalized
 * to UTC, so the offset is always +0000.
 */
export function formatExportTimestamp(date: Date): string {
  const datePart = `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
  const timePart = `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
  return `${datePart} ${timePart}+0000`;
}

/**
 * Accepts the shapes upstream drivers hand back for an instant: Date objects,
 * epoch milliseconds and timestamp strings. Anything else is treated as missing.
 */
export function toTimestamp(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return new Date(value);
  }
  if (typeof value === 'string' && value.trim() !== '') {
    return parseTimestamp(value) ?? null;
  }
  return null;
}
