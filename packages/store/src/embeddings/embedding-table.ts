import type { CacheEntry } from '@question-pool/core';
import type { TableRow, TableSchema } from '../tables/table-codec.js';

export const EMBEDDINGS_ARTIFACT_NAME = 'embeddings';

export const EMBEDDING_TABLE_SCHEMA: TableSchema = {
  text_hash: { type: 'string' },
  text: { type: 'string' },
  embedding: { type: 'number[]' },
};

export function entriesToRows(entries: Iterable<CacheEntry>): TableRow[] {
  const rows: TableRow[] = [];
  for (const entry of entries) {
    rows.push({ text_hash: entry.textHash, text: entry.text, embedding: [...entry.embedding] });
  }
  return rows;
}

export function rowsToEntries(rows: readonly TableRow[]): CacheEntry[] {
  return rows.map((row) => {
    const { text_hash: textHash, text, embedding } = row;
    return {
      textHash: typeof textHash === 'string' ? textHash : '',
      text: typeof text === 'string' ? text : '',
      embedding: Array.isArray(embedding)
        ? embedding.filter((v): v is number => typeof v === 'number')
        : [],
    };
  });
}
