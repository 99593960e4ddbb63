import * as fs from 'node:fs';
import * as path from 'node:path';

import { getErrorMessage, wrapError } from '@lender-rank/core';
import { getLogger } from '@lender-rank/logger';
import Database from 'better-sqlite3';
import { Kysely, SqliteDialect } from 'kysely';
import type { Result } from 'neverthrow';
import { err, ok, ResultAsync } from 'neverthrow';

const logger = getLogger('SqliteDatabase');

export interface CreateSqliteDatabaseOptions {
  /** Open an existing file without write access. Ignored for ':memory:'. */
  readonly?: boolean | undefined;
}

/**
 * Create and configure a SQLite-backed Kysely database instance.
 *
 * Read-only connections require the file to exist and skip the write pragmas.
 */
export function createSqliteDatabase<T>(
  dbPath: string,
  options?: CreateSqliteDatabaseOptions
): Result<Kysely<T>, Error> {
  const inMemory = dbPath === ':memory:';
  const readonly = !inMemory && options?.readonly === true;

  try {
    if (readonly && !fs.existsSync(dbPath)) {
      return err(new Error(`SQLite database not found: ${dbPath}`));
    }

    const dataDir = path.dirname(dbPath);
    if (!inMemory && !readonly && !fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }

    const sqliteDb = new Database(dbPath, { readonly, fileMustExist: readonly });

    if (!readonly) {
      sqliteDb.pragma('journal_mode = WAL');
      sqliteDb.pragma('synchronous = NORMAL');
    }
    sqliteDb.pragma('cache_size = 10000');
    sqliteDb.pragma('temp_store = memory');

    logger.debug({ readonly }, `Connected to SQLite database: ${dbPath}`);

    return ok(
      new Kysely<T>({
        dialect: new SqliteDialect({ database: sqliteDb }),
      })
    );
  } catch (error) {
    logger.error({ error }, `Error creating SQLite database: ${dbPath}`);
    return wrapError(error, `Failed to create SQLite database: ${dbPath}`);
  }
}

/**
 * Release the better-sqlite3 handle behind a Kysely instance. A failure is
 * reported, never thrown, so callers can finish their own cleanup first.
 */
export async function closeSqliteDatabase<T>(db: Kysely<T>): Promise<Result<void, Error>> {
  const closed = await ResultAsync.fromPromise(
    db.destroy(),
    (error) => new Error(`Failed to close SQLite database: ${getErrorMessage(error)}`, { cause: error })
  );
  if (closed.isErr()) {
    logger.warn({ error: closed.error.message }, 'SQLite connection did not close cleanly');
    return closed;
  }

  logger.debug('SQLite connection closed');
  return ok();
}
