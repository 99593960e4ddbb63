import * as fs from 'node:fs/promises';

import { hasErrorCode, wrapError } from '@lender-rank/core';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import type { QueryParams } from './query-source.js';

// Matches `{name}` and the quoted form `'{name}'`; both compile to one positional parameter
const PLACEHOLDER_PATTERN = /'\{([A-Za-z_]\w*)\}'|\{([A-Za-z_]\w*)\}/g;

export interface CompiledTemplate {
  sql: string;
  parameters: readonly (string | number)[];
}

function placeholderValues(params: QueryParams): ReadonlyMap<string, string> {
  return new Map([
    ['start_date', params.startDate.toISOString()],
    ['end_date', params.endDate.toISOString()],
    ['lender_name', params.lenderName],
  ]);
}

/**
 * Read a SQL template from disk.
 */
export async function loadQueryTemplate(filePath: string): Promise<Result<string, Error>> {
  try {
    const template = await fs.readFile(filePath, 'utf8');
    if (template.trim() === '') {
      return err(new Error(`Query template is empty: ${filePath}`));
    }
    return ok(template);
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return err(new Error(`Query template not found: ${filePath}`));
    }
    return wrapError(error, `Failed to read query template ${filePath}`);
  }
}

/**
 * Replace `{start_date}`, `{end_date}` and `{lender_name}` with positional
 * `?` parameters, in order of appearance. Values are bound by the driver and
 * never spliced into the SQL text.
 */
export function compileQueryTemplate(template: string, params: QueryParams): Result<CompiledTemplate, Error> {
  const values = placeholderValues(params);
  const parameters: string[] = [];
  const unknown = new Set<string>();

  const compiled = template.replace(PLACEHOLDER_PATTERN, (match, quoted?: string, bare?: string) => {
    const name = quoted ?? bare ?? '';
    const value = values.get(name);
    if (value === undefined) {
      unknown.add(name);
      return match;
    }
    parameters.push(value);
    return '?';
  });

  if (unknown.size > 0) {
    return err(new Error(`Unknown query template placeholder(s): ${[...unknown].map((n) => `{${n}}`).join(', ')}`));
  }

  return ok({ sql: compiled, parameters });
}
