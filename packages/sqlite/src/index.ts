export { closeSqliteDatabase, createSqliteDatabase, type CreateSqliteDatabaseOptions } from './database.js';

// Re-export the Kysely pieces the query source needs so consumers don't need kysely as a direct dependency
export { CompiledQuery, Kysely, sql } from 'kysely';
