import type { CalendarMonth, RankedRecord, TieredRecord } from '@lender-rank/core';
import {
  calendarMonthOf,
  compareCalendarMonths,
  formatCalendarMonth,
  isSameCalendarMonth,
  shiftCalendarMonth,
} from '@lender-rank/core';
import { getLogger } from '@lender-rank/logger';

const logger = getLogger('RankEngine');

/**
 * The report month and the two calendar months before it.
 */
export interface RankingWindow {
  current: CalendarMonth;
  oneMonthBefore: CalendarMonth;
  twoMonthsBefore: CalendarMonth;
}

/** Record count for one lender in one tier and month. */
export interface MonthlyAggregate {
  tier: string;
  entityId: string;
  month: CalendarMonth;
  count: number;
}

export interface RankedAggregate extends MonthlyAggregate {
  /** 1 + number of lenders in the same tier and month with a strictly greater count. */
  rank: number;
}

/**
 * One row per (tier, lender). Counts are 0 for months without records; ranks
 * stay null for those months because the lender was not ranked.
 */
export interface RankPivotRow {
  tier: string;
  entityId: string;
  countCurrent: number;
  countOneMonth: number;
  countTwoMonths: number;
  rankOneMonth: number | null;
  rankTwoMonths: number | null;
}

export interface RankingResult {
  records: RankedRecord[];
  aggregates: RankedAggregate[];
  pivot: RankPivotRow[];
}

const KEY_SEPARATOR = '\u0000';

function entityKey(tier: string, entityId: string): string {
  return `${tier}${KEY_SEPARATOR}${entityId}`;
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function resolveRankingWindow(reference: CalendarMonth): RankingWindow {
  return {
    current: reference,
    oneMonthBefore: shiftCalendarMonth(reference, -1),
    twoMonthsBefore: shiftCalendarMonth(reference, -2),
  };
}

function isInWindow(month: CalendarMonth, window: RankingWindow): boolean {
  return (
    isSameCalendarMonth(month, window.current) ||
    isSameCalendarMonth(month, window.oneMonthBefore) ||
    isSameCalendarMonth(month, window.twoMonthsBefore)
  );
}

/**
 * Count records per (tier, lender, month) for the three window months.
 * Records without a tier or timestamp, or outside the window, are not counted.
 * Sorted by tier, lender, then month.
 */
export function aggregateMonthlyCounts(records: readonly TieredRecord[], window: RankingWindow): MonthlyAggregate[] {
  const aggregates = new Map<string, MonthlyAggregate>();

  for (const record of records) {
    if (record.tier === null || record.timestamp === null) continue;

    const month = calendarMonthOf(record.timestamp);
    if (!isInWindow(month, window)) continue;

    const key = `${entityKey(record.tier, record.entityId)}${KEY_SEPARATOR}${formatCalendarMonth(month)}`;
    const existing = aggregates.get(key);
    if (existing) {
      existing.count++;
    } else {
      aggregates.set(key, { tier: record.tier, entityId: record.entityId, month, count: 1 });
    }
  }

  return [...aggregates.values()].sort(
    (a, b) =>
      compareText(a.tier, b.tier) || compareText(a.entityId, b.entityId) || compareCalendarMonths(a.month, b.month)
  );
}

/**
 * Minimum (competition) ranking by count, descending, within each
 * (tier, month) group: counts [10, 10, 7] rank [1, 1, 3]. Input order is kept.
 */
export function rankWithinTier(aggregates: readonly MonthlyAggregate[]): RankedAggregate[] {
  const groups = new Map<string, number[]>();
  for (const aggregate of aggregates) {
    const key = `${aggregate.tier}${KEY_SEPARATOR}${formatCalendarMonth(aggregate.month)}`;
    const counts = groups.get(key);
    if (counts) {
      counts.push(aggregate.count);
    } else {
      groups.set(key, [aggregate.count]);
    }
  }

  for (const counts of groups.values()) {
    counts.sort((a, b) => b - a);
  }

  return aggregates.map((aggregate) => {
    const counts = groups.get(`${aggregate.tier}${KEY_SEPARATOR}${formatCalendarMonth(aggregate.month)}`) ?? [];
    // index of the first equal count is the number of strictly greater counts
    return { ...aggregate, rank: counts.indexOf(aggregate.count) + 1 };
  });
}

/**
 * Reshape ranked aggregates into one row per (tier, lender) with a column per
 * window month. Rows follow first appearance in the input.
 */
export function pivotRankings(ranked: readonly RankedAggregate[], window: RankingWindow): RankPivotRow[] {
  const rows = new Map<string, RankPivotRow>();

  for (const aggregate of ranked) {
    const key = entityKey(aggregate.tier, aggregate.entityId);
    let row = rows.get(key);
    if (!row) {
      row = {
        tier: aggregate.tier,
        entityId: aggregate.entityId,
        countCurrent: 0,
        countOneMonth: 0,
        countTwoMonths: 0,
        rankOneMonth: null,
        rankTwoMonths: null,
      };
      rows.set(key, row);
    }

    if (isSameCalendarMonth(aggregate.month, window.current)) {
      row.countCurrent = aggregate.count;
    } else if (isSameCalendarMonth(aggregate.month, window.oneMonthBefore)) {
      row.countOneMonth = aggregate.count;
      row.rankOneMonth = aggregate.rank;
    } else if (isSameCalendarMonth(aggregate.month, window.twoMonthsBefore)) {
      row.countTwoMonths = aggregate.count;
      row.rankTwoMonths = aggregate.rank;
    }
  }

  return [...rows.values()];
}

/**
 * Left join of the lagging-month ranks onto every record by (tier, lender).
 * Records keep their order; untiered or unranked lenders get null ranks.
 */
export function mergeRankings(records: readonly TieredRecord[], pivot: readonly RankPivotRow[]): RankedRecord[] {
  const byEntity = new Map(pivot.map((row) => [entityKey(row.tier, row.entityId), row]));

  return records.map((record) => {
    const row = record.tier === null ? undefined : byEntity.get(entityKey(record.tier, record.entityId));
    return {
      ...record,
      rankOneMonth: row?.rankOneMonth ?? null,
      rankTwoMonths: row?.rankTwoMonths ?? null,
    };
  });
}

/**
 * Aggregate, rank, pivot and merge ranks back onto the records.
 * Every input record appears exactly once in the output, in order.
 */
export function rankRecords(records: readonly TieredRecord[], window: RankingWindow): RankingResult {
  const aggregates = rankWithinTier(aggregateMonthlyCounts(records, window));
  const pivot = pivotRankings(aggregates, window);
  const ranked = mergeRankings(records, pivot);

  logger.debug(
    {
      records: records.length,
      aggregates: aggregates.length,
      rankedLenders: pivot.length,
      window: {
        current: formatCalendarMonth(window.current),
        oneMonthBefore: formatCalendarMonth(window.oneMonthBefore),
        twoMonthsBefore: formatCalendarMonth(window.twoMonthsBefore),
      },
    },
    'Ranked records'
  );

  return { records: ranked, aggregates, pivot };
}
