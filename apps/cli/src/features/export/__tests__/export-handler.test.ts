import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import type { SourceRecordSet } from '@lender-rank/core';
import type { QuerySource } from '@lender-rank/data';
import { TierLookup } from '@lender-rank/ranking';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { CliError } from '../../shared/cli-error.js';
import { ExitCodes } from '../../shared/exit-codes.js';
import { ExportHandler } from '../export-handler.js';
import type { ExportHandlerParams } from '../export-utils.js';

const COLUMNS = ['associated_lender', 'scenarioId', 'exportedLender', 'time', 'totalProposedLoanAmount', 'performance'];

const HARBOUR_ROWS: SourceRecordSet = {
  columns: COLUMNS,
  rows: [
    {
      associated_lender: 'Harbour Bank',
      scenarioId: 'sc-1',
      exportedLender: 'Harbour Bank',
      time: '2025-05-03T10:00:00Z',
      totalProposedLoanAmount: 500000,
      performance: 'Export Winner Deals',
    },
    {
      associated_lender: 'Harbour Bank',
      scenarioId: 'sc-2',
      exportedLender: 'Harbour Bank',
      time: '2025-05-20T08:30:00Z',
      totalProposedLoanAmount: 250000,
      performance: 'Export Winner Deals',
    },
    {
      associated_lender: 'Harbour Bank',
      scenarioId: 'sc-3',
      exportedLender: 'Coastal Credit',
      time: '2025-05-11T12:00:00Z',
      totalProposedLoanAmount: 300000,
      performance: 'Failed In Scope Deals',
    },
    {
      associated_lender: 'Harbour Bank',
      scenarioId: 'sc-4',
      exportedLender: 'Coastal Credit',
      time: '2025-04-02T00:00:00Z',
      totalProposedLoanAmount: 'n/a',
      performance: 'Failed In Scope Deals',
    },
    {
      associated_lender: 'Harbour Bank',
      scenarioId: 'sc-5',
      exportedLender: 'Summit Mutual',
      time: '2025-05-09T00:00:00Z',
      totalProposedLoanAmount: 100000,
      performance: 'Not Available Scenarios',
    },
  ],
};

function line(fields: string[]): string {
  return fields.map((field) => `"${field}"`).join('\t');
}

function createQuerySource(lenders: string[], recordSets: Record<string, Result<SourceRecordSet, Error>>) {
  return {
    listEntities: vi.fn<QuerySource['listEntities']>().mockResolvedValue(ok(lenders)),
    executeQuery: vi.fn<QuerySource['executeQuery']>((params) =>
      Promise.resolve(recordSets[params.lenderName] ?? ok({ columns: [], rows: [] }))
    ),
    close: vi.fn<QuerySource['close']>().mockResolvedValue(undefined),
  } satisfies QuerySource;
}

describe('ExportHandler', () => {
  let tmpDir: string;
  let params: ExportHandlerParams;
  let tierLookup: TierLookup;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'lender-rank-export-'));
    params = {
      startDate: new Date('2025-01-01T00:00:00Z'),
      endDate: new Date('2025-07-01T00:00:00Z'),
      reportMonth: { year: 2025, month: 6 },
      outputDir: tmpDir,
    };
    tierLookup = TierLookup.fromEntries([
      { lender: 'Harbour Bank', tier: '1' },
      { lender: 'Coastal Credit', tier: '1' },
    ])._unsafeUnwrap();
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('should write a ranked, sanitized file per lender', async () => {
    const querySource = createQuerySource(['Harbour Bank'], { 'Harbour Bank': ok(HARBOUR_ROWS) });
    const handler = new ExportHandler(querySource, tierLookup);

    const result = (await handler.execute(params))._unsafeUnwrap();

    const outputPath = path.join(tmpDir, 'results_Harbour Bank.csv');
    expect(result.reportMonth).toBe('2025-06');
    expect(result.failures).toEqual([]);
    expect(result.exports).toHaveLength(1);
    expect(result.exports[0]?.path).toBe(outputPath);
    expect(result.exports[0]?.rowCount).toBe(5);

    const content = await fs.readFile(outputPath, 'utf8');
    expect(content.startsWith('\uFEFF')).toBe(true);
    expect(content.slice(1).split('\n')).toEqual([
      line([...COLUMNS, 'Tier', 'rank_in_tier_one_month', 'rank_in_tier_two_months']),
      line(['Harbour Bank', 'sc-1', 'Harbour Bank', '2025-05-03 10:00:00+0000', '500000', 'Export Winner Deals', '1', '1', '']),
      line(['Harbour Bank', 'sc-2', 'Harbour Bank', '2025-05-20 08:30:00+0000', '250000', 'Export Winner Deals', '1', '1', '']),
      line(['Harbour Bank', 'sc-3', 'Coastal Credit', '2025-05-11 12:00:00+0000', '300000', 'Failed In Scope Deals', '1', '2', '1']),
      line(['Harbour Bank', 'sc-4', 'Coastal Credit', '2025-04-02 00:00:00+0000', '', 'Failed In Scope Deals', '1', '2', '1']),
      line(['Harbour Bank', 'sc-5', 'Summit Mutual', '2025-05-09 00:00:00+0000', '100000', 'Not Available Scenarios', '', '', '']),
      '',
    ]);
  });

  it('should report sanitizer findings on the lender export', async () => {
    const querySource = createQuerySource(['Harbour Bank'], { 'Harbour Bank': ok(HARBOUR_ROWS) });
    const handler = new ExportHandler(querySource, tierLookup);

    const result = (await handler.execute(params))._unsafeUnwrap();

    expect(result.exports[0]?.diagnostics).toEqual([
      {
        stage: 'sanitize',
        code: 'NUMERIC_COERCION',
        column: 'totalProposedLoanAmount',
        rowIndex: 3,
        value: 'n/a',
        message: 'totalProposedLoanAmount: value is not numeric; left empty',
      },
    ]);
  });

  it('should pass the query window and lender to the query source', async () => {
    const querySource = createQuerySource(['Harbour Bank'], { 'Harbour Bank': ok(HARBOUR_ROWS) });
    const handler = new ExportHandler(querySource, tierLookup);

    await handler.execute(params);

    expect(querySource.executeQuery).toHaveBeenCalledWith({
      startDate: new Date('2025-01-01T00:00:00Z'),
      endDate: new Date('2025-07-01T00:00:00Z'),
      lenderName: 'Harbour Bank',
    });
  });

  it('should skip the file and record EMPTY_RESULT when a query returns no rows', async () => {
    const querySource = createQuerySource(['Coastal Credit'], {
      'Coastal Credit': ok({ columns: [], rows: [] }),
    });
    const handler = new ExportHandler(querySource, tierLookup);

    const result = (await handler.execute(params))._unsafeUnwrap();

    expect(result.exports).toEqual([
      {
        lender: 'Coastal Credit',
        path: undefined,
        rowCount: 0,
        diagnostics: [{ stage: 'export', code: 'EMPTY_RESULT', message: 'No rows for Coastal Credit' }],
      },
    ]);
    await expect(fs.readdir(tmpDir)).resolves.toEqual([]);
  });

  it('should keep a time value that is not a recognized timestamp', async () => {
    const querySource = createQuerySource(['Harbour Bank'], {
      'Harbour Bank': ok({
        columns: ['scenarioId', 'exportedLender', 'time'],
        rows: [{ scenarioId: 'sc-9', exportedLender: 'Harbour Bank', time: '01/06/2025 10:00' }],
      }),
    });
    const handler = new ExportHandler(querySource, tierLookup);

    const result = (await handler.execute(params))._unsafeUnwrap();

    expect(result.failures).toEqual([]);
    const content = await fs.readFile(path.join(tmpDir, 'results_Harbour Bank.csv'), 'utf8');
    expect(content.slice(1).split('\n')).toEqual([
      line(['scenarioId', 'exportedLender', 'time', 'Tier', 'rank_in_tier_one_month', 'rank_in_tier_two_months']),
      line(['sc-9', 'Harbour Bank', '01/06/2025 10:00', '1', '', '']),
      '',
    ]);
  });

  it('should not let a lender overwrite another lender with the same file name', async () => {
    const acmeRows = (lender: string): SourceRecordSet => ({
      columns: ['exportedLender', 'time'],
      rows: [{ exportedLender: lender, time: '2025-05-03T10:00:00Z' }],
    });
    const querySource = createQuerySource(['Acme/Home', 'Acme:Home'], {
      'Acme/Home': ok(acmeRows('Acme/Home')),
      'Acme:Home': ok(acmeRows('Acme:Home')),
    });
    const handler = new ExportHandler(querySource, tierLookup);

    const result = (await handler.execute(params))._unsafeUnwrap();

    expect(result.exports.map((entry) => entry.lender)).toEqual(['Acme/Home']);
    expect(result.failures).toEqual([
      { lender: 'Acme:Home', error: 'Export file name results_Acme_Home.csv is already used by Acme/Home' },
    ]);
    expect(querySource.executeQuery).toHaveBeenCalledTimes(1);
    await expect(fs.readdir(tmpDir)).resolves.toEqual(['results_Acme_Home.csv']);
  });

  it('should record a failing lender and continue with the rest', async () => {
    const querySource = createQuerySource(['Broken Lender', 'Harbour Bank'], {
      'Broken Lender': err(new Error('Query failed for Broken Lender: no such table: lender_results')),
      'Harbour Bank': ok(HARBOUR_ROWS),
    });
    const handler = new ExportHandler(querySource, tierLookup);

    const result = (await handler.execute(params))._unsafeUnwrap();

    expect(result.failures).toEqual([
      { lender: 'Broken Lender', error: 'Query failed for Broken Lender: no such table: lender_results' },
    ]);
    expect(result.exports.map((entry) => entry.lender)).toEqual(['Harbour Bank']);
  });

  it('should record ingest errors against the lender', async () => {
    const querySource = createQuerySource(['Harbour Bank'], {
      'Harbour Bank': ok({ columns: ['exportedLender', 'time'], rows: [{ exportedLender: '  ', time: null }] }),
    });
    const handler = new ExportHandler(querySource, tierLookup);

    const result = (await handler.execute(params))._unsafeUnwrap();

    expect(result.failures).toEqual([
      { lender: 'Harbour Bank', error: 'Row 0: lender is empty in column "exportedLender"' },
    ]);
  });

  it('should wrap unexpected errors thrown by the query source', async () => {
    const querySource = createQuerySource(['Harbour Bank'], {});
    querySource.executeQuery.mockRejectedValue(new Error('connection reset'));
    const handler = new ExportHandler(querySource, tierLookup);

    const result = (await handler.execute(params))._unsafeUnwrap();

    expect(result.failures).toEqual([{ lender: 'Harbour Bank', error: 'Export failed for Harbour Bank: connection reset' }]);
  });

  it('should restrict the run to requested lenders and flag unknown ones', async () => {
    const querySource = createQuerySource(['Coastal Credit', 'Harbour Bank'], { 'Harbour Bank': ok(HARBOUR_ROWS) });
    const handler = new ExportHandler(querySource, tierLookup);

    const result = (await handler.execute({ ...params, lenders: ['Harbour Bank', 'Ghost Lender'] }))._unsafeUnwrap();

    expect(querySource.executeQuery).toHaveBeenCalledTimes(1);
    expect(result.exports.map((entry) => entry.lender)).toEqual(['Harbour Bank']);
    expect(result.failures).toEqual([{ lender: 'Ghost Lender', error: 'Lender not found in source: Ghost Lender' }]);
  });

  it('should fail the run when lenders cannot be listed', async () => {
    const querySource = createQuerySource([], {});
    querySource.listEntities.mockResolvedValue(err(new Error('Failed to list lenders from lender_results: locked')));
    const handler = new ExportHandler(querySource, tierLookup);

    const result = await handler.execute(params);

    expect(result.isErr()).toBe(true);
    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(CliError);
    expect(error.message).toBe('Failed to list lenders from lender_results: locked');
    expect(error instanceof CliError && error.exitCode).toBe(ExitCodes.DATABASE_ERROR);
    expect(querySource.executeQuery).not.toHaveBeenCalled();
  });

  it('should close the query source on destroy', async () => {
    const querySource = createQuerySource([], {});
    const handler = new ExportHandler(querySource, tierLookup);

    await handler.destroy();

    expect(querySource.close).toHaveBeenCalledTimes(1);
  });
});
