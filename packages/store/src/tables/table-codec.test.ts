/**
 * Unit tests for table-codec.ts
 * Run with: npx tsx --test packages/store/src/tables/table-codec.test.ts
 */
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ParseError } from '@question-pool/core';
import { deserializeTable, serializeTable, tableFormatFromPath, type TableSchema } from './table-codec.js';

const SCHEMA: TableSchema = {
  name: { type: 'string' },
  score: { type: 'number', optional: true },
  tags: { type: 'string[]' },
  at: { type: 'timestamp', optional: true },
};

const ROWS = [
  { name: 'a,b', score: 1.5, tags: ['x', 'y'], at: new Date('2024-01-02T03:04:05Z') },
  { name: 'c', score: null, tags: [], at: null },
];

describe('table codec', () => {
  describe('csv', () => {
    it('should write lists as JSON, dates as ISO and null as empty', async () => {
      const bytes = await serializeTable(ROWS, SCHEMA, 'csv');
      assert.equal(
        bytes.toString('utf8'),
        'name,score,tags,at\n"a,b",1.5,"[""x"",""y""]",2024-01-02T03:04:05.000Z\nc,,[],\n'
      );
    });

    it('should read back typed values', async () => {
      const bytes = await serializeTable(ROWS, SCHEMA, 'csv');
      assert.deepEqual(await deserializeTable(bytes, SCHEMA, 'csv'), ROWS);
    });

    it('should reject cells of the wrong type', async () => {
      const bytes = Buffer.from('name,score,tags,at\nz,lots,[],\n');
      await assert.rejects(deserializeTable(bytes, SCHEMA, 'csv'), ParseError);
    });

    it('should reject rows missing a required value', async () => {
      await assert.rejects(serializeTable([{ name: null, score: 1, tags: [], at: null }], SCHEMA, 'csv'), ParseError);
    });
  });

  describe('parquet', () => {
    it('should round trip rows', async () => {
      const bytes = await serializeTable(ROWS, SCHEMA, 'parquet');
      assert.equal(bytes.subarray(0, 4).toString('ascii'), 'PAR1');
      assert.deepEqual(await deserializeTable(bytes, SCHEMA, 'parquet'), ROWS);
    });

    it('should keep unknown entries of nullable number lists', async () => {
      const schema: TableSchema = { probabilities: { type: 'nullable-number[]' } };
      const rows = [{ probabilities: [0.25, null, 0.75] }];
      const bytes = await serializeTable(rows, schema, 'parquet');
      assert.deepEqual(await deserializeTable(bytes, schema, 'parquet'), rows);
    });

    it('should read empty nullable number lists back as empty', async () => {
      const schema: TableSchema = { probabilities: { type: 'nullable-number[]' } };
      const rows = [{ probabilities: [] }, { probabilities: [null, null] }, { probabilities: [0.5] }];
      const bytes = await serializeTable(rows, schema, 'parquet');
      assert.deepEqual(await deserializeTable(bytes, schema, 'parquet'), rows);
    });

    it('should reject bytes that are not parquet', async () => {
      await assert.rejects(deserializeTable(Buffer.from('not parquet'), SCHEMA, 'parquet'));
    });
  });

  describe('tableFormatFromPath', () => {
    it('should pick csv by extension and parquet otherwise', () => {
      assert.equal(tableFormatFromPath('cache/embeddings.csv'), 'csv');
      assert.equal(tableFormatFromPath('cache/embeddings.parquet'), 'parquet');
    });
  });
});
