import type { CellValue, Diagnostic, DiagnosticCode, TableRow } from '@lender-rank/core';
import { formatExportTimestamp, parseTimestamp } from '@lender-rank/core';
import { getLogger } from '@lender-rank/logger';

const logger = getLogger('RecordSanitizer');

const DISALLOWED_CHARACTERS = /[[\]{}",\\]/g;
const LIST_LIKE_PATTERN = /[[{].*[\]}]/s;
const DELIMITER_LIKE_PATTERN = /[\t\r\n]/;

export const DEFAULT_STRING_COLUMNS = [
  'associated_lender',
  'exportedLender',
  'primaryIncome',
  'rateType',
  'loanPurpose',
  'lvrBucket',
  'transactionType',
  'performance',
  'scenarioId',
] as const;

export const DEFAULT_NUMERIC_COLUMNS = [
  'totalProposedLoanAmount',
  'lvr',
  'paygIncome',
  'weeklyRentalIncome',
  'selfEmployedIncome',
  'count_all_loan_purpose',
  'count_all_unique_scenario_id',
  'sum_all_total_proposed_loan_amount',
] as const;

export interface SanitizerOptions {
  /** Free-text columns stripped of format-breaking characters */
  stringColumns: readonly string[];
  /** Columns coerced to finite numbers */
  numericColumns: readonly string[];
  /** Column rendered as `YYYY-MM-DD HH:MM:SS+0000` */
  timestampColumn: string;
}

export const DEFAULT_SANITIZER_OPTIONS: SanitizerOptions = {
  stringColumns: DEFAULT_STRING_COLUMNS,
  numericColumns: DEFAULT_NUMERIC_COLUMNS,
  timestampColumn: 'time',
};

export interface SanitizedText {
  text: string;
  removedCharacters: boolean;
  listLike: boolean;
  hasDelimiter: boolean;
}

export interface SanitizedTable {
  rows: TableRow[];
  diagnostics: Diagnostic[];
}

/**
 * Delete `, [ ] { } " \` from a value. List shape is judged on the input,
 * delimiter-like characters on the output.
 */
export function sanitizeText(value: string): SanitizedText {
  const text = value.replace(DISALLOWED_CHARACTERS, '');
  return {
    text,
    removedCharacters: text.length !== value.length,
    listLike: LIST_LIKE_PATTERN.test(value),
    hasDelimiter: DELIMITER_LIKE_PATTERN.test(text),
  };
}

/**
 * Coerce a cell to a finite number. Empty input is missing, not a failure.
 */
export function coerceNumeric(value: CellValue): { value: number | null; failed: boolean } {
  if (value === null) return { value: null, failed: false };
  if (typeof value === 'number') {
    return Number.isFinite(value) ? { value, failed: false } : { value: null, failed: true };
  }
  if (value instanceof Date) return { value: null, failed: true };

  const trimmed = value.trim();
  if (trimmed === '') return { value: null, failed: false };

  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? { value: parsed, failed: false } : { value: null, failed: true };
}

function renderTimestamp(value: CellValue): CellValue {
  if (value === null) return null;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : formatExportTimestamp(value);
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? formatExportTimestamp(new Date(value)) : null;
  }
  const parsed = parseTimestamp(value);
  return parsed ? formatExportTimestamp(parsed) : value;
}

function textOf(value: string | number | Date): string {
  if (value instanceof Date) return formatExportTimestamp(value);
  return String(value);
}

type SanitizeDiagnosticCode = Extract<
  DiagnosticCode,
  'DISALLOWED_CHARACTERS' | 'LIST_LIKE_VALUE' | 'DELIMITER_IN_VALUE' | 'NUMERIC_COERCION'
>;

const DIAGNOSTIC_MESSAGES: Record<SanitizeDiagnosticCode, string> = {
  DISALLOWED_CHARACTERS: 'removed disallowed characters',
  LIST_LIKE_VALUE: 'value looks list- or object-shaped',
  DELIMITER_IN_VALUE: 'value contains a tab or line break',
  NUMERIC_COERCION: 'value is not numeric; left empty',
};

/**
 * Make rows safe for the delimited export format. Never rejects a row:
 * anomalies become `sanitize` diagnostics. Running it on its own output
 * changes nothing.
 */
export function sanitizeRows(
  rows: readonly TableRow[],
  options: SanitizerOptions = DEFAULT_SANITIZER_OPTIONS
): SanitizedTable {
  const stringColumns = new Set(options.stringColumns);
  const numericColumns = new Set(options.numericColumns);
  const diagnostics: Diagnostic[] = [];

  const flag = (code: SanitizeDiagnosticCode, column: string, rowIndex: number, value: string) => {
    diagnostics.push({
      stage: 'sanitize',
      code,
      column,
      rowIndex,
      value,
      message: `${column}: ${DIAGNOSTIC_MESSAGES[code]}`,
    });
  };

  const sanitized = rows.map((row, rowIndex) => {
    const output: Record<string, CellValue> = {};

    for (const [column, value] of Object.entries(row)) {
      if (column === options.timestampColumn) {
        output[column] = renderTimestamp(value);
      } else if (stringColumns.has(column) && value !== null) {
        const original = textOf(value);
        const result = sanitizeText(original);
        if (result.removedCharacters) flag('DISALLOWED_CHARACTERS', column, rowIndex, original);
        if (result.listLike) flag('LIST_LIKE_VALUE', column, rowIndex, original);
        if (result.hasDelimiter) flag('DELIMITER_IN_VALUE', column, rowIndex, original);
        output[column] = result.text;
      } else if (numericColumns.has(column)) {
        const result = coerceNumeric(value);
        if (result.failed && value !== null) flag('NUMERIC_COERCION', column, rowIndex, textOf(value));
        output[column] = result.value;
      } else {
        output[column] = value;
      }
    }

    return output;
  });

  const summary = new Map<string, { code: DiagnosticCode; column: string | undefined; count: number }>();
  for (const diagnostic of diagnostics) {
    const key = `${diagnostic.code}\u0000${diagnostic.column ?? ''}`;
    const entry = summary.get(key);
    if (entry) {
      entry.count++;
    } else {
      summary.set(key, { code: diagnostic.code, column: diagnostic.column, count: 1 });
    }
  }
  for (const entry of summary.values()) {
    logger.warn(entry, 'Sanitized values need review');
  }

  return { rows: sanitized, diagnostics };
}
