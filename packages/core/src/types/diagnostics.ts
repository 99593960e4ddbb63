export type DiagnosticStage = 'ingest' | 'sanitize' | 'export' | 'merge';

export type DiagnosticCode =
  | 'DISALLOWED_CHARACTERS'
  | 'LIST_LIKE_VALUE'
  | 'DELIMITER_IN_VALUE'
  | 'NUMERIC_COERCION'
  | 'HEADER_MISMATCH'
  | 'ROW_WIDTH_MISMATCH'
  | 'VALIDATION_FAILED'
  | 'UNREADABLE_FILE'
  | 'EMPTY_RESULT';

/**
 * Advisory finding attached to a pipeline result. Diagnostics never abort
 * processing; callers decide what to do with them.
 */
export interface Diagnostic {
  stage: DiagnosticStage;
  code: DiagnosticCode;
  message: string;
  column?: string | undefined;
  rowIndex?: number | undefined;
  value?: string | undefined;
}
