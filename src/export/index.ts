/**
 * Export Module
 *
 * Writes the finished table as CSV and columnar JSON, and reads either
 * format back.
 *
 * @module export
 */

// ============================================================================
// CSV Encoding
// ============================================================================

export { encodeCsv, encodeCsvField, parseCsv, CsvParseError } from './csv.js';

// ============================================================================
// Table Files
// ============================================================================

export {
  COLUMNAR_SCHEMA_VERSION,
  TableFormatError,
  toCsv,
  fromCsv,
  toColumnar,
  fromColumnar,
  writeCsvTable,
  readCsvTable,
  writeColumnarTable,
  readColumnarTable,
  readTable,
  writeTable,
  type ColumnarTable,
} from './table.js';
