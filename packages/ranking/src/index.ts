export {
  TierLookup,
  joinTiers,
  loadTierLookup,
  type TierEntry,
  type TierListOptions,
} from './tier-lookup.js';
export {
  aggregateMonthlyCounts,
  mergeRankings,
  pivotRankings,
  rankRecords,
  rankWithinTier,
  resolveRankingWindow,
  type MonthlyAggregate,
  type RankedAggregate,
  type RankingResult,
  type RankingWindow,
  type RankPivotRow,
} from './rank-engine.js';
export {
  DEFAULT_NUMERIC_COLUMNS,
  DEFAULT_SANITIZER_OPTIONS,
  DEFAULT_STRING_COLUMNS,
  coerceNumeric,
  sanitizeRows,
  sanitizeText,
  type SanitizedTable,
  type SanitizedText,
  type SanitizerOptions,
} from './record-sanitizer.js';
export {
  RANK_ONE_MONTH_COLUMN,
  RANK_TWO_MONTHS_COLUMN,
  TIER_COLUMN,
  exportColumns,
  toExportTable,
  type ExportTable,
} from './export-columns.js';
