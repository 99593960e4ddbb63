export * from './types/records.js';
export * from './types/diagnostics.js';
export * from './utils/type-guard-utils.js';
export * from './utils/calendar-month-utils.js';
export * from './utils/timestamp-utils.js';
export * from './utils/table-utils.js';
export * from './records/source-records.js';
