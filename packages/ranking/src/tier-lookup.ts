import * as fs from 'node:fs/promises';

import type { SourceRecord, TieredRecord } from '@lender-rank/core';
import { getErrorMessage, hasErrorCode, wrapError } from '@lender-rank/core';
import { getLogger } from '@lender-rank/logger';
import { parse } from 'csv-parse/sync';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { z } from 'zod';

const logger = getLogger('TierLookup');

const TierListRecordsSchema = z.array(z.array(z.string()));

export interface TierEntry {
  lender: string;
  tier: string;
}

export interface TierListOptions {
  /** Header of the lender name column. Defaults to `Lender`. */
  lenderColumn?: string | undefined;
  /** Header of the tier label column. Defaults to `Tier`. */
  tierColumn?: string | undefined;
}

/**
 * Immutable lender → tier mapping. Keys are case-sensitive.
 */
export class TierLookup {
  private constructor(private readonly tiers: ReadonlyMap<string, string>) {}

  /**
   * Build a lookup from entries. Repeating a lender with the same tier is
   * allowed; repeating it with a different tier is an error.
   */
  static fromEntries(entries: Iterable<TierEntry>): Result<TierLookup, Error> {
    const tiers = new Map<string, string>();

    for (const { lender, tier } of entries) {
      if (lender === '') {
        return err(new Error('Tier entry has an empty lender name'));
      }
      if (tier === '') {
        return err(new Error(`Tier entry for "${lender}" has an empty tier`));
      }

      const existing = tiers.get(lender);
      if (existing !== undefined && existing !== tier) {
        return err(new Error(`Conflicting tiers for lender "${lender}": "${existing}" and "${tier}"`));
      }
      tiers.set(lender, tier);
    }

    return ok(new TierLookup(tiers));
  }

  tierOf(entityId: string): string | null {
    return this.tiers.get(entityId) ?? null;
  }

  has(entityId: string): boolean {
    return this.tiers.has(entityId);
  }

  get size(): number {
    return this.tiers.size;
  }
}

function parseTierRecords(content: string): Result<string[][], Error> {
  let parsed: unknown;
  try {
    parsed = parse(content.replace(/^\uFEFF/, ''), {
      skip_empty_lines: true,
      trim: true,
      relax_column_count: true,
    });
  } catch (error) {
    return err(new Error(getErrorMessage(error)));
  }

  const records = TierListRecordsSchema.safeParse(parsed);
  if (!records.success) {
    return err(new Error(records.error.message));
  }
  return ok(records.data);
}

/**
 * Load the tier list, a comma-separated file with a header row.
 *
 * Rows with an empty tier are skipped. A missing file, a missing header
 * column, a row without a lender name or conflicting duplicates fail the load.
 */
export async function loadTierLookup(filePath: string, options?: TierListOptions): Promise<Result<TierLookup, Error>> {
  const lenderColumn = options?.lenderColumn ?? 'Lender';
  const tierColumn = options?.tierColumn ?? 'Tier';

  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return err(new Error(`Tier list not found: ${filePath}`));
    }
    return wrapError(error, `Failed to read tier list ${filePath}`);
  }

  const recordsResult = parseTierRecords(content);
  if (recordsResult.isErr()) {
    return err(new Error(`Malformed tier list ${filePath}: ${recordsResult.error.message}`));
  }

  const [header = [], ...rows] = recordsResult.value;
  const lenderIndex = header.indexOf(lenderColumn);
  const tierIndex = header.indexOf(tierColumn);
  const missing = [lenderIndex === -1 ? lenderColumn : undefined, tierIndex === -1 ? tierColumn : undefined].filter(
    (column): column is string => column !== undefined
  );
  if (missing.length > 0) {
    return err(new Error(`Tier list ${filePath} is missing column(s): ${missing.join(', ')}`));
  }

  const entries: TierEntry[] = [];
  let skipped = 0;
  for (const [index, row] of rows.entries()) {
    const lender = row[lenderIndex] ?? '';
    const tier = row[tierIndex] ?? '';
    if (tier === '') {
      skipped++;
      continue;
    }
    if (lender === '') {
      return err(new Error(`Tier list ${filePath} row ${index + 2}: empty lender name`));
    }
    entries.push({ lender, tier });
  }

  const lookupResult = TierLookup.fromEntries(entries);
  if (lookupResult.isErr()) {
    return err(new Error(`Malformed tier list ${filePath}: ${lookupResult.error.message}`));
  }

  logger.info({ filePath, lenders: lookupResult.value.size, skipped }, 'Loaded tier list');
  return lookupResult;
}

/**
 * Left join of records against the lookup. Output length and order equal the
 * input; unmatched lenders get a null tier.
 */
export function joinTiers(records: readonly SourceRecord[], lookup: TierLookup): TieredRecord[] {
  return records.map((record) => ({ ...record, tier: lookup.tierOf(record.entityId) }));
}
