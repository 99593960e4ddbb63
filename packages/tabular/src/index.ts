export {
  BYTE_ORDER_MARK,
  FIELD_DELIMITER,
  RECORD_SEPARATOR,
  formatDelimitedField,
  parseDelimited,
  parseDelimitedRecords,
  readDelimitedFile,
  serializeDelimited,
  type DelimitedTable,
} from './delimited-format.js';
export {
  validateDelimitedFile,
  writeDelimitedFile,
  type WriteDelimitedFileOptions,
  type WrittenFile,
} from './tabular-exporter.js';
export { mergeExportFiles, type MergeExportsOptions, type MergeExportsResult } from './merge-exports.js';
