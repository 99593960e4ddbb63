import type { SourceRecordSet } from '@lender-rank/core';
import { wrapError } from '@lender-rank/core';
import { getLogger } from '@lender-rank/logger';
import { closeSqliteDatabase, CompiledQuery, createSqliteDatabase, type Kysely, sql } from '@lender-rank/sqlite';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import type { QueryParams, QuerySource } from './query-source.js';
import { compileQueryTemplate } from './query-template.js';

// Source tables are only read through raw SQL, so the schema carries no tables
type SourceDatabase = Record<string, never>;

export interface SqliteQuerySourceOptions {
  /** SQL text with `{start_date}`, `{end_date}` and `{lender_name}` placeholders. */
  template: string;
  /** Table listing every lender. */
  sourceTable: string;
  /** Column holding the lender identifier in `sourceTable`. */
  entityColumn: string;
}

export interface OpenSqliteQuerySourceOptions extends SqliteQuerySourceOptions {
  databasePath: string;
}

/**
 * Query source over a SQLite database. The database is opened read-only.
 */
export class SqliteQuerySource implements QuerySource {
  private readonly logger = getLogger('SqliteQuerySource');

  constructor(
    private readonly db: Kysely<SourceDatabase>,
    private readonly options: SqliteQuerySourceOptions
  ) {}

  static open(options: OpenSqliteQuerySourceOptions): Result<SqliteQuerySource, Error> {
    const { databasePath, ...sourceOptions } = options;
    const dbResult = createSqliteDatabase<SourceDatabase>(databasePath, { readonly: true });
    if (dbResult.isErr()) {
      return err(dbResult.error);
    }
    return ok(new SqliteQuerySource(dbResult.value, sourceOptions));
  }

  async listEntities(): Promise<Result<string[], Error>> {
    const { sourceTable, entityColumn } = this.options;
    const column = sql.ref(entityColumn);

    try {
      const { rows } = await sql<{ entity: unknown }>`
        select distinct ${column} as entity
        from ${sql.table(sourceTable)}
        where ${column} is not null and trim(${column}) != ''
        order by entity
      `.execute(this.db);

      const entities = rows.map((row) => String(row.entity));
      this.logger.debug({ count: entities.length, sourceTable }, 'Listed lenders');
      return ok(entities);
    } catch (error) {
      this.logger.error({ error, sourceTable }, 'Failed to list lenders');
      return wrapError(error, `Failed to list lenders from ${sourceTable}`);
    }
  }

  async executeQuery(params: QueryParams): Promise<Result<SourceRecordSet, Error>> {
    const compiled = compileQueryTemplate(this.options.template, params);
    if (compiled.isErr()) {
      return err(compiled.error);
    }

    const startedAt = Date.now();
    try {
      const result = await this.db.executeQuery<Record<string, unknown>>(
        CompiledQuery.raw(compiled.value.sql, [...compiled.value.parameters])
      );
      const columns = Object.keys(result.rows[0] ?? {});

      this.logger.debug(
        { lender: params.lenderName, rows: result.rows.length, durationMs: Date.now() - startedAt },
        'Query completed'
      );
      return ok({ columns, rows: result.rows });
    } catch (error) {
      this.logger.error({ error, lender: params.lenderName }, 'Query failed');
      return wrapError(error, `Query failed for ${params.lenderName}`);
    }
  }

  async close(): Promise<void> {
    const result = await closeSqliteDatabase(this.db);
    if (result.isErr()) {
      this.logger.warn({ error: result.error }, 'Failed to close query source');
    }
  }
}
