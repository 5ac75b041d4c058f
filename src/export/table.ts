/**
 * Output Table
 *
 * Writes finished records as a CSV table and, optionally, a columnar
 * JSON table; reads either back into validated records. Both writers
 * replace the target atomically.
 *
 * Columnar layout:
 * ```
 * {
 *   "schemaVersion": 1,
 *   "columns": ["videoId", "title", ...],
 *   "rowCount": 2,
 *   "data": { "videoId": ["a", "b"], "title": ["...", "..."], ... }
 * }
 * ```
 *
 * @module export/table
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { VIDEO_RECORD_COLUMNS, VideoRecordSchema, type VideoRecord } from '../schemas/video-record.js';
import { atomicWriteFile, atomicWriteJson, readJson } from '../storage/atomic.js';
import { encodeCsv, parseCsv } from './csv.js';

// ============================================================================
// Types
// ============================================================================

export const COLUMNAR_SCHEMA_VERSION = 1;

const ColumnarTableSchema = z.object({
  schemaVersion: z.literal(COLUMNAR_SCHEMA_VERSION),
  columns: z.array(z.string()),
  rowCount: z.number().int().nonnegative(),
  data: z.record(z.array(z.union([z.string(), z.number()]))),
});

export type ColumnarTable = z.infer<typeof ColumnarTableSchema>;

/**
 * Raised when a table cannot be turned back into records.
 */
export class TableFormatError extends Error {
  constructor(message: string, public readonly source: string) {
    super(`${source}: ${message}`);
    this.name = 'TableFormatError';
  }
}

// ============================================================================
// CSV
// ============================================================================

/**
 * Render records as CSV with a header row in column order.
 */
export function toCsv(records: readonly VideoRecord[]): string {
  return encodeCsv([
    [...VIDEO_RECORD_COLUMNS],
    ...records.map((record) => VIDEO_RECORD_COLUMNS.map((column) => record[column])),
  ]);
}

/**
 * Parse CSV produced by {@link toCsv}. Columns are matched by header
 * name, so their order may differ.
 *
 * @throws TableFormatError on a missing column or an invalid row
 */
export function fromCsv(text: string, source: string = 'csv'): VideoRecord[] {
  const [header, ...rows] = parseCsv(text);
  if (!header) {
    return [];
  }

  const indexes = new Map(header.map((name, index) => [name.trim(), index]));
  const missing = VIDEO_RECORD_COLUMNS.filter((column) => !indexes.has(column));
  if (missing.length > 0) {
    throw new TableFormatError(`missing columns: ${missing.join(', ')}`, source);
  }

  return rows.map((row, rowIndex) => {
    const raw: Record<string, string> = {};
    for (const column of VIDEO_RECORD_COLUMNS) {
      raw[column] = row[indexes.get(column) ?? -1] ?? '';
    }
    return parseRow(raw, `${source} row ${rowIndex + 1}`);
  });
}

export async function writeCsvTable(filePath: string, records: readonly VideoRecord[]): Promise<void> {
  await atomicWriteFile(filePath, toCsv(records));
}

export async function readCsvTable(filePath: string): Promise<VideoRecord[]> {
  return fromCsv(await fs.readFile(filePath, 'utf-8'), filePath);
}

// ============================================================================
// Columnar JSON
// ============================================================================

/**
 * Pivot records into one array per column.
 */
export function toColumnar(records: readonly VideoRecord[]): ColumnarTable {
  const data: Record<string, Array<string | number>> = {};
  for (const column of VIDEO_RECORD_COLUMNS) {
    data[column] = records.map((record) => record[column]);
  }
  return {
    schemaVersion: COLUMNAR_SCHEMA_VERSION,
    columns: [...VIDEO_RECORD_COLUMNS],
    rowCount: records.length,
    data,
  };
}

/**
 * Rebuild records from a columnar table.
 *
 * @throws TableFormatError on a missing column, ragged columns or an invalid row
 */
export function fromColumnar(value: unknown, source: string = 'columnar'): VideoRecord[] {
  const parsed = ColumnarTableSchema.safeParse(value);
  if (!parsed.success) {
    throw new TableFormatError(`not a columnar table: ${parsed.error.issues[0]?.message ?? 'invalid'}`, source);
  }
  const table = parsed.data;

  const columns: Array<Array<string | number>> = [];
  for (const column of VIDEO_RECORD_COLUMNS) {
    const values = table.data[column];
    if (!values) {
      throw new TableFormatError(`missing column: ${column}`, source);
    }
    if (values.length !== table.rowCount) {
      throw new TableFormatError(
        `column ${column} has ${values.length} values, expected ${table.rowCount}`,
        source
      );
    }
    columns.push(values);
  }

  return Array.from({ length: table.rowCount }, (_, rowIndex) => {
    const raw: Record<string, string | number | undefined> = {};
    VIDEO_RECORD_COLUMNS.forEach((column, columnIndex) => {
      raw[column] = columns[columnIndex]?.[rowIndex];
    });
    return parseRow(raw, `${source} row ${rowIndex + 1}`);
  });
}

export async function writeColumnarTable(filePath: string, records: readonly VideoRecord[]): Promise<void> {
  await atomicWriteJson(filePath, toColumnar(records));
}

export async function readColumnarTable(filePath: string): Promise<VideoRecord[]> {
  return fromColumnar(await readJson(filePath), filePath);
}

// ============================================================================
// Dispatch
// ============================================================================

/**
 * Read a table, choosing the format by extension (`.json` is columnar).
 */
export async function readTable(filePath: string): Promise<VideoRecord[]> {
  return path.extname(filePath).toLowerCase() === '.json'
    ? readColumnarTable(filePath)
    : readCsvTable(filePath);
}

/**
 * Write a table, choosing the format by extension (`.json` is columnar).
 */
export async function writeTable(filePath: string, records: readonly VideoRecord[]): Promise<void> {
  if (path.extname(filePath).toLowerCase() === '.json') {
    await writeColumnarTable(filePath, records);
  } else {
    await writeCsvTable(filePath, records);
  }
}

// ============================================================================
// Helpers
// ============================================================================

function parseRow(raw: Record<string, unknown>, location: string): VideoRecord {
  const result = VideoRecordSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join('.') ?? 'row';
    throw new TableFormatError(`${field}: ${issue?.message ?? 'invalid'}`, location);
  }
  return result.data;
}
