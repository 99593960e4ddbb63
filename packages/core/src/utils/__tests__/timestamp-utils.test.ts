import { describe, expect, it } from 'vitest';

import { formatExportTimestamp, parseTimestamp, toTimestamp } from '../timestamp-utils.js';

describe('timestamp-utils', () => {
  describe('parseTimestamp', () => {
    it('should parse ISO timestamps in UTC', () => {
      expect(parseTimestamp('2025-06-15T10:30:00Z')?.toISOString()).toBe('2025-06-15T10:30:00.000Z');
    });

    it('should apply compact and colon offsets', () => {
      expect(parseTimestamp('2025-06-15 10:30:00+1000')?.toISOString()).toBe('2025-06-15T00:30:00.000Z');
      expect(parseTimestamp('2025-06-15 10:30:00-05:30')?.toISOString()).toBe('2025-06-15T16:00:00.000Z');
    });

    it('should read values without an offset as UTC', () => {
      expect(parseTimestamp('2025-02-28')?.toISOString()).toBe('2025-02-28T00:00:00.000Z');
      expect(parseTimestamp('2025-02-28 08:15')?.toISOString()).toBe('2025-02-28T08:15:00.000Z');
    });

    it('should keep fractional seconds to the millisecond', () => {
      expect(parseTimestamp('2025-06-15T10:30:00.5Z')?.toISOString()).toBe('2025-06-15T10:30:00.500Z');
    });

    it('should reject impossible dates and free text', () => {
      expect(parseTimestamp('2025-02-30')).toBeUndefined();
      expect(parseTimestamp('2025-13-01')).toBeUndefined();
      expect(parseTimestamp('2025-06-15 24:00:00')).toBeUndefined();
      expect(parseTimestamp('not a date')).toBeUndefined();
    });
  });

  describe('formatExportTimestamp', () => {
    it('should render with seconds precision and a +0000 offset', () => {
      expect(formatExportTimestamp(new Date('2025-01-05T03:04:05.678Z'))).toBe('2025-01-05 03:04:05+0000');
    });

    it('should be readable by parseTimestamp', () => {
      const instant = new Date('2024-11-30T22:45:10Z');
      expect(parseTimestamp(formatExportTimestamp(instant))?.getTime()).toBe(instant.getTime());
    });
  });

  describe('toTimestamp', () => {
    it('should accept dates, epoch milliseconds and strings', () => {
      expect(toTimestamp(new Date('2025-06-01T00:00:00Z'))?.toISOString()).toBe('2025-06-01T00:00:00.000Z');
      expect(toTimestamp(0)?.toISOString()).toBe('1970-01-01T00:00:00.000Z');
      expect(toTimestamp('2025-06-01T12:00:00+02:00')?.toISOString()).toBe('2025-06-01T10:00:00.000Z');
    });

    it('should treat missing and unparseable values as null', () => {
      expect(toTimestamp(null)).toBeNull();
      expect(toTimestamp(undefined)).toBeNull();
      expect(toTimestamp('')).toBeNull();
      expect(toTimestamp('soon')).toBeNull();
      expect(toTimestamp(new Date('invalid'))).toBeNull();
      expect(toTimestamp({ at: 1 })).toBeNull();
    });
  });
});
