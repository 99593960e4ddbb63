import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import type { QueryParams } from '../query-source.js';
import { compileQueryTemplate, loadQueryTemplate } from '../query-template.js';

const params: QueryParams = {
  startDate: new Date('2025-06-01T00:00:00Z'),
  endDate: new Date('2025-09-01T00:00:00Z'),
  lenderName: 'Harbour Bank',
};

describe('compileQueryTemplate', () => {
  it('replaces placeholders with positional parameters in order', () => {
    const template = "select * from t where time >= '{start_date}' and time < {end_date} and lender = {lender_name}";

    const compiled = compileQueryTemplate(template, params)._unsafeUnwrap();

    expect(compiled.sql).toBe('select * from t where time >= ? and time < ? and lender = ?');
    expect(compiled.parameters).toEqual(['2025-06-01T00:00:00.000Z', '2025-09-01T00:00:00.000Z', 'Harbour Bank']);
  });

  it('binds repeated placeholders once per occurrence', () => {
    const compiled = compileQueryTemplate('select {lender_name} as a, {lender_name} as b', params)._unsafeUnwrap();

    expect(compiled.sql).toBe('select ? as a, ? as b');
    expect(compiled.parameters).toEqual(['Harbour Bank', 'Harbour Bank']);
  });

  it('never splices lender names into the SQL text', () => {
    const compiled = compileQueryTemplate("where lender = '{lender_name}'", {
      ...params,
      lenderName: "O'Brien Lending",
    })._unsafeUnwrap();

    expect(compiled.sql).toBe('where lender = ?');
    expect(compiled.parameters).toEqual(["O'Brien Lending"]);
  });

  it('rejects unknown placeholders', () => {
    const result = compileQueryTemplate('where region = {region} and lender = {lender_name} or {region}', params);

    expect(result._unsafeUnwrapErr().message).toBe('Unknown query template placeholder(s): {region}');
  });
});

describe('loadQueryTemplate', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'query-template-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('reads the template text', async () => {
    const filePath = path.join(tempDir, 'query.sql');
    await fs.writeFile(filePath, 'select 1;\n');

    const result = await loadQueryTemplate(filePath);

    expect(result._unsafeUnwrap()).toBe('select 1;\n');
  });

  it('reports a missing template', async () => {
    const filePath = path.join(tempDir, 'missing.sql');

    const result = await loadQueryTemplate(filePath);

    expect(result._unsafeUnwrapErr().message).toBe(`Query template not found: ${filePath}`);
  });

  it('rejects an empty template', async () => {
    const filePath = path.join(tempDir, 'empty.sql');
    await fs.writeFile(filePath, '  \n');

    const result = await loadQueryTemplate(filePath);

    expect(result._unsafeUnwrapErr().message).toBe(`Query template is empty: ${filePath}`);
  });
});
