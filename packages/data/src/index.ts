export type { QueryParams, QuerySource } from './query-source.js';
export { compileQueryTemplate, loadQueryTemplate, type CompiledTemplate } from './query-template.js';
export {
  SqliteQuerySource,
  type OpenSqliteQuerySourceOptions,
  type SqliteQuerySourceOptions,
} from './sqlite-query-source.js';
