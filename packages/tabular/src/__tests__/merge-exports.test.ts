import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { readDelimitedFile } from '../delimited-format.js';
import { mergeExportFiles } from '../merge-exports.js';
import { writeDelimitedFile } from '../tabular-exporter.js';

describe('mergeExportFiles', () => {
  let inputDir: string;
  let outputDir: string;

  beforeEach(async () => {
    inputDir = await fs.mkdtemp(path.join(os.tmpdir(), 'merge-exports-input-'));
    outputDir = await fs.mkdtemp(path.join(os.tmpdir(), 'merge-exports-output-'));
  });

  afterEach(async () => {
    await fs.rm(inputDir, { recursive: true, force: true });
    await fs.rm(outputDir, { recursive: true, force: true });
  });

  it('unions headers in order of first appearance and fills gaps with null', async () => {
    await writeDelimitedFile(path.join(inputDir, 'results_Coastal Credit.csv'), {
      columns: ['exportedLender', 'time', 'lvr'],
      rows: [{ exportedLender: 'Coastal Credit', time: '2025-06-15T10:30:00+10:00', lvr: '0.6' }],
    });
    await writeDelimitedFile(path.join(inputDir, 'results_Anchor Loans.csv'), {
      columns: ['exportedLender', 'time', 'Tier'],
      rows: [
        { exportedLender: 'Anchor Loans', time: '2025-06-01 08:00:00+0000', Tier: '1' },
        { exportedLender: 'Anchor Loans', time: 'n/a', Tier: null },
      ],
    });
    const outputPath = path.join(outputDir, 'all-lenders-exports.csv');

    const result = (await mergeExportFiles({ inputDir, outputPath }))._unsafeUnwrap();

    expect(result.columns).toEqual(['exportedLender', 'time', 'Tier', 'lvr']);
    expect(result.rowCount).toBe(3);
    expect(result.inputFiles.map((file) => path.basename(file))).toEqual([
      'results_Anchor Loans.csv',
      'results_Coastal Credit.csv',
    ]);
    expect(result.diagnostics).toEqual([]);

    const content = await fs.readFile(outputPath, 'utf8');
    expect(content).toBe(
      '\uFEFF"exportedLender"\t"time"\t"Tier"\t"lvr"\n' +
        '"Anchor Loans"\t"2025-06-01 08:00:00+0000"\t"1"\t""\n' +
        '"Anchor Loans"\t""\t""\t""\n' +
        '"Coastal Credit"\t"2025-06-15 00:30:00+0000"\t""\t"0.6"\n'
    );
  });

  it('ignores non-export files and the output file itself', async () => {
    await writeDelimitedFile(path.join(inputDir, 'results_a.csv'), { columns: ['x'], rows: [{ x: '1' }] });
    await fs.writeFile(path.join(inputDir, 'notes.txt'), 'ignore me');
    const outputPath = path.join(inputDir, 'all-lenders-exports.csv');
    await writeDelimitedFile(outputPath, { columns: ['x'], rows: [{ x: 'stale' }] });

    const result = (await mergeExportFiles({ inputDir, outputPath }))._unsafeUnwrap();

    expect(result.inputFiles.map((file) => path.basename(file))).toEqual(['results_a.csv']);
    const merged = (await readDelimitedFile(outputPath))._unsafeUnwrap();
    expect(merged.rows).toEqual([{ x: '1' }]);
  });

  it('skips unreadable files with a diagnostic', async () => {
    await writeDelimitedFile(path.join(inputDir, 'results_a.csv'), { columns: ['x'], rows: [{ x: '1' }] });
    await fs.writeFile(path.join(inputDir, 'results_b.csv'), '', 'utf8');

    const result = (
      await mergeExportFiles({ inputDir, outputPath: path.join(outputDir, 'merged.csv') })
    )._unsafeUnwrap();

    expect(result.skippedFiles.map((file) => path.basename(file))).toEqual(['results_b.csv']);
    expect(result.diagnostics).toEqual([
      { stage: 'merge', code: 'UNREADABLE_FILE', message: 'results_b.csv: Delimited content has no header row' },
    ]);
    expect(result.rowCount).toBe(1);
  });

  it('fails when no file can be read', async () => {
    await fs.writeFile(path.join(inputDir, 'results_b.csv'), '', 'utf8');

    const result = await mergeExportFiles({ inputDir, outputPath: path.join(outputDir, 'merged.csv') });

    expect(result._unsafeUnwrapErr().message).toBe(`None of the 1 file(s) in ${inputDir} could be read`);
  });

  it('fails when the directory has no export files', async () => {
    const result = await mergeExportFiles({ inputDir, outputPath: path.join(outputDir, 'merged.csv') });

    expect(result._unsafeUnwrapErr().message).toBe(`No .csv files found in ${inputDir}`);
  });

  it('fails when the input directory is missing', async () => {
    const missing = path.join(inputDir, 'does-not-exist');

    const result = await mergeExportFiles({ inputDir: missing, outputPath: path.join(outputDir, 'merged.csv') });

    expect(result._unsafeUnwrapErr().message).toBe(`Input directory not found: ${missing}`);
  });
});
