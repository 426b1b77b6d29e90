/**
 * Tabular codec: rows <-> parquet or csv bytes
 *
 * A schema names each column and its type. Parquet keeps native types;
 * csv writes lists as JSON, timestamps as ISO-8601 and null as an empty cell.
 */

import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import parquet from '@dsnp/parquetjs';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { ParseError, errorMessage } from '@question-pool/core';

export type TableFormat = 'parquet' | 'csv';

export const TABLE_FORMATS: readonly TableFormat[] = ['parquet', 'csv'];

export type ColumnType =
  | 'string'
  | 'number'
  | 'boolean'
  | 'timestamp'
  | 'string[]'
  | 'number[]'
  | 'nullable-number[]';

export interface ColumnSpec {
  type: ColumnType;
  /** Nullable column; list columns are never null (empty list instead) */
  optional?: boolean;
}

export type TableSchema = Record<string, ColumnSpec>;

export type CellValue = string | number | boolean | Date | null | string[] | Array<number | null>;

export type TableRow = Record<string, CellValue>;

export function isTableFormat(value: string): value is TableFormat {
  return (TABLE_FORMATS as readonly string[]).includes(value);
}

type ParquetSchemaDefinition = ConstructorParameters<typeof parquet.ParquetSchema>[0];
type ParquetFieldDefinition = ParquetSchemaDefinition[string];

function parquetField(spec: ColumnSpec): ParquetFieldDefinition {
  const optional = spec.optional ?? false;
  switch (spec.type) {
    case 'string':
      return { type: 'UTF8', optional };
    case 'number':
      return { type: 'DOUBLE', optional };
    case 'boolean':
      return { type: 'BOOLEAN', optional };
    case 'timestamp':
      return { type: 'TIMESTAMP_MILLIS', optional };
    case 'string[]':
      return { type: 'UTF8', repeated: true };
    case 'number[]':
      return { type: 'DOUBLE', repeated: true };
    case 'nullable-number[]':
      return { repeated: true, fields: { value: { type: 'DOUBLE', optional: true } } };
  }
}

function parquetSchema(schema: TableSchema): InstanceType<typeof parquet.ParquetSchema> {
  const fields: ParquetSchemaDefinition = {};
  for (const [name, spec] of Object.entries(schema)) {
    fields[name] = parquetField(spec);
  }
  return new parquet.ParquetSchema(fields);
}

// ============================================================
// Cell validation (shared by both formats)
// ============================================================

const numberList = z.array(z.number());
const nullableNumberList = z.array(z.number().nullable());
const stringList = z.array(z.string());

function cellError(column: string, expected: string, value: unknown): ParseError {
  return new ParseError(`Column "${column}": expected ${expected}, got ${JSON.stringify(value) ?? typeof value}`);
}

function checkCell(column: string, spec: ColumnSpec, value: unknown): CellValue {
  if (value === null || value === undefined) {
    if (spec.type.endsWith('[]')) return [];
    if (spec.optional) return null;
    throw cellError(column, spec.type, value);
  }

  switch (spec.type) {
    case 'string':
      if (typeof value === 'string') return value;
      break;
    case 'number':
      if (typeof value === 'number' && Number.isFinite(value)) return value;
      break;
    case 'boolean':
      if (typeof value === 'boolean') return value;
      break;
    case 'timestamp':
      if (value instanceof Date && !Number.isNaN(value.getTime())) return value;
      break;
    case 'string[]': {
      const parsed = stringList.safeParse(value);
      if (parsed.success) return parsed.data;
      break;
    }
    case 'number[]': {
      const parsed = numberList.safeParse(value);
      if (parsed.success) return parsed.data;
      break;
    }
    case 'nullable-number[]': {
      const parsed = nullableNumberList.safeParse(value);
      if (parsed.success) return parsed.data;
      break;
    }
  }
  throw cellError(column, spec.type, value);
}

function checkRow(schema: TableSchema, row: Record<string, unknown>): TableRow {
  const checked: TableRow = {};
  for (const [name, spec] of Object.entries(schema)) {
    checked[name] = checkCell(name, spec, row[name]);
  }
  return checked;
}

// ============================================================
// Parquet
// ============================================================

function toParquetRecord(schema: TableSchema, row: TableRow): Record<string, unknown> {
  const record: Record<string, unknown> = {};
  for (const [name, spec] of Object.entries(schema)) {
    const value = checkCell(name, spec, row[name]);
    if (value === null) continue; // optional columns are written as missing
    if (spec.type === 'nullable-number[]' && Array.isArray(value)) {
      record[name] = value.map((v) => (v === null ? {} : { value: v }));
    } else {
      record[name] = value;
    }
  }
  return record;
}

const nullableListRecord = z.array(z.object({ value: z.number().nullish() }));

function fromParquetRecord(schema: TableSchema, record: unknown): TableRow {
  const fields = z.record(z.unknown()).safeParse(record);
  if (!fields.success) {
    throw new ParseError('Parquet row is not an object');
  }
  const row: Record<string, unknown> = { ...fields.data };
  for (const [name, spec] of Object.entries(schema)) {
    // empty repeated groups come back as null or missing
    if (spec.type !== 'nullable-number[]' || row[name] === undefined || row[name] === null) continue;
    const items = nullableListRecord.safeParse(row[name]);
    if (!items.success) throw cellError(name, spec.type, row[name]);
    row[name] = items.data.map((item) => item.value ?? null);
  }
  return checkRow(schema, row);
}

async function withTempFile<T>(fn: (file: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(path.join(tmpdir(), 'question-pool-'));
  try {
    return await fn(path.join(dir, 'table.parquet'));
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

async function writeParquet(rows: readonly TableRow[], schema: TableSchema): Promise<Buffer> {
  return withTempFile(async (file) => {
    const writer = await parquet.ParquetWriter.openFile(parquetSchema(schema), file);
    try {
      for (const row of rows) {
        await writer.appendRow(toParquetRecord(schema, row));
      }
    } finally {
      await writer.close();
    }
    return readFile(file);
  });
}

async function readParquet(bytes: Uint8Array, schema: TableSchema): Promise<TableRow[]> {
  return withTempFile(async (file) => {
    await writeFile(file, bytes);
    const reader = await parquet.ParquetReader.openFile(file);
    try {
      const cursor = reader.getCursor();
      const rows: TableRow[] = [];
      let record: unknown = await cursor.next();
      while (record) {
        rows.push(fromParquetRecord(schema, record));
        record = await cursor.next();
      }
      return rows;
    } finally {
      await reader.close();
    }
  });
}

// ============================================================
// CSV
// ============================================================

function toCsvCell(value: CellValue): string {
  if (value === null) return '';
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return JSON.stringify(value);
  return String(value);
}

function fromCsvCell(column: string, spec: ColumnSpec, cell: string | undefined): unknown {
  if (cell === undefined) return null;
  if (cell === '' && spec.type !== 'string') return null;
  if (cell === '' && spec.optional) return null;

  switch (spec.type) {
    case 'string':
      return cell;
    case 'number':
      return Number(cell);
    case 'boolean':
      if (cell === 'true') return true;
      if (cell === 'false') return false;
      throw cellError(column, spec.type, cell);
    case 'timestamp':
      return new Date(cell);
    case 'string[]':
    case 'number[]':
    case 'nullable-number[]':
      try {
        return JSON.parse(cell);
      } catch (err) {
        throw new ParseError(`Column "${column}": invalid JSON list (${errorMessage(err)})`, { cause: err });
      }
  }
}

const csvRecords = z.array(z.record(z.string()));

function writeCsv(rows: readonly TableRow[], schema: TableSchema): Buffer {
  const specs = Object.entries(schema);
  const columns = specs.map(([name]) => name);
  const records = rows.map((row) => specs.map(([name, spec]) => toCsvCell(checkCell(name, spec, row[name]))));
  return Buffer.from(stringify(records, { header: true, columns }), 'utf8');
}

function readCsv(bytes: Uint8Array, schema: TableSchema): TableRow[] {
  const parsed: unknown = parse(Buffer.from(bytes).toString('utf8'), {
    columns: true,
    skip_empty_lines: true,
  });
  const records = csvRecords.safeParse(parsed);
  if (!records.success) {
    throw new ParseError('CSV table has an unexpected shape');
  }

  return records.data.map((record) => {
    const row: Record<string, unknown> = {};
    for (const [name, spec] of Object.entries(schema)) {
      row[name] = fromCsvCell(name, spec, record[name]);
    }
    return checkRow(schema, row);
  });
}

// ============================================================
// Public API
// ============================================================

/**
 * Serialize rows; throws ParseError when a row does not fit the schema
 */
export async function serializeTable(
  rows: readonly TableRow[],
  schema: TableSchema,
  format: TableFormat
): Promise<Buffer> {
  return format === 'parquet' ? writeParquet(rows, schema) : writeCsv(rows, schema);
}

/**
 * Deserialize rows; every row is checked against the schema
 */
export async function deserializeTable(
  bytes: Uint8Array,
  schema: TableSchema,
  format: TableFormat
): Promise<TableRow[]> {
  return format === 'parquet' ? readParquet(bytes, schema) : readCsv(bytes, schema);
}

/**
 * Table format implied by a plain file name (`cache.parquet`, `markets.csv`)
 */
export function tableFormatFromPath(filePath: string): TableFormat {
  return path.extname(filePath).toLowerCase() === '.csv' ? 'csv' : 'parquet';
}
