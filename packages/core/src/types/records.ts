/**
 * A single cell as it travels through the pipeline. Dates only appear before
 * sanitization; the exporter renders them with an explicit offset.
 */
export type CellValue = string | number | Date | null;

export type TableRow = Readonly<Record<string, CellValue>>;

/**
 * Record set as returned by the query source: column order plus raw rows.
 */
export interface SourceRecordSet {
  columns: readonly string[];
  rows: readonly Readonly<Record<string, unknown>>[];
}

/**
 * Names the columns the pipeline treats specially.
 */
export interface RecordLayout {
  /** Column holding the lender a record is ranked under */
  entityColumn: string;

  /** Column holding the observation instant */
  timestampColumn: string;
}

export const DEFAULT_RECORD_LAYOUT: RecordLayout = {
  entityColumn: 'exportedLender',
  timestampColumn: 'time',
};

/**
 * One observation for one lender. `fields` holds every column except the
 * entity and timestamp columns.
 */
export interface SourceRecord {
  entityId: string;

  /** Parsed instant; null when the cell is empty or not a recognized timestamp */
  timestamp: Date | null;

  /** Timestamp cell as read, exported when it could not be parsed */
  rawTimestamp: CellValue;

  fields: Readonly<Record<string, CellValue>>;
}

export interface TieredRecord extends SourceRecord {
  /** null when the lender is missing from the tier list */
  tier: string | null;
}

export interface RankedRecord extends TieredRecord {
  rankOneMonth: number | null;
  rankTwoMonths: number | null;
}
