import type { SourceRecordSet } from '@lender-rank/core';
import type { Result } from 'neverthrow';

/**
 * Parameters substituted into the query template for one lender.
 * `endDate` is exclusive.
 */
export interface QueryParams {
  startDate: Date;
  endDate: Date;
  lenderName: string;
}

/**
 * Upstream analytical store the pipeline reads lender records from.
 */
export interface QuerySource {
  /** Distinct, non-empty lender identifiers, sorted. */
  listEntities(): Promise<Result<string[], Error>>;

  executeQuery(params: QueryParams): Promise<Result<SourceRecordSet, Error>>;

  close(): Promise<void>;
}
