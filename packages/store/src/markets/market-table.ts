/**
 * Market snapshot table
 *
 * Persisted column layout of the aggregated markets. The `raw` back-reference
 * is never written; `formatted_outcomes` is stored for readers but recomputed
 * on load.
 */

import { access } from 'node:fs/promises';
import * as path from 'node:path';
import { CryptoError, errorMessage, formatOutcomes, withoutRaw, type PooledMarket } from '@question-pool/core';
import { artifactFileName, parseArtifactName, type EncryptedStore } from '../crypto/encrypted-store.js';
import type { TableRow, TableSchema } from '../tables/table-codec.js';

export const MARKETS_ARTIFACT_NAME = 'markets';

export const MARKET_TABLE_SCHEMA: TableSchema = {
  id: { type: 'string' },
  question: { type: 'string' },
  outcomes: { type: 'string[]' },
  outcome_probabilities: { type: 'nullable-number[]' },
  formatted_outcomes: { type: 'string' },
  url: { type: 'string' },
  published_at: { type: 'timestamp', optional: true },
  source_platform: { type: 'string' },
  volume: { type: 'number', optional: true },
  n_forecasters: { type: 'number', optional: true },
  comments_count: { type: 'number', optional: true },
  original_market_type: { type: 'string', optional: true },
  is_resolved: { type: 'boolean', optional: true },
};

export function marketToRow(market: Omit<PooledMarket, 'raw'>): TableRow {
  return {
    id: market.id,
    question: market.question,
    outcomes: [...market.outcomes],
    outcome_probabilities: [...market.outcomeProbabilities],
    formatted_outcomes: market.formattedOutcomes,
    url: market.url,
    published_at: market.publishedAt,
    source_platform: market.sourcePlatform,
    volume: market.volume ?? null,
    n_forecasters: market.nForecasters ?? null,
    comments_count: market.commentsCount ?? null,
    original_market_type: market.originalMarketType ?? null,
    is_resolved: market.isResolved ?? null,
  };
}

export function marketsToRows(markets: readonly PooledMarket[]): TableRow[] {
  return markets.map((market) => marketToRow(withoutRaw(market)));
}

// Row cells are already checked against MARKET_TABLE_SCHEMA by the codec
function stringCell(row: TableRow, column: string): string {
  const value = row[column];
  return typeof value === 'string' ? value : '';
}

function optionalString(row: TableRow, column: string): string | null {
  const value = row[column];
  return typeof value === 'string' ? value : null;
}

function optionalNumber(row: TableRow, column: string): number | null {
  const value = row[column];
  return typeof value === 'number' ? value : null;
}

function stringList(row: TableRow, column: string): string[] {
  const value = row[column];
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === 'string');
}

function probabilityList(row: TableRow, column: string): Array<number | null> {
  const value = row[column];
  if (!Array.isArray(value)) return [];
  return value.map((item) => (typeof item === 'number' ? item : null));
}

export function rowToMarket(row: TableRow): PooledMarket {
  const outcomes = stringList(row, 'outcomes');
  const outcomeProbabilities = probabilityList(row, 'outcome_probabilities');
  const publishedAt = row.published_at;
  const isResolved = row.is_resolved;

  return {
    id: stringCell(row, 'id'),
    question: stringCell(row, 'question'),
    outcomes,
    outcomeProbabilities,
    formattedOutcomes: formatOutcomes(outcomes, outcomeProbabilities),
    url: stringCell(row, 'url'),
    publishedAt: publishedAt instanceof Date ? publishedAt : null,
    sourcePlatform: stringCell(row, 'source_platform'),
    volume: optionalNumber(row, 'volume'),
    nForecasters: optionalNumber(row, 'n_forecasters'),
    commentsCount: optionalNumber(row, 'comments_count'),
    originalMarketType: optionalString(row, 'original_market_type'),
    isResolved: typeof isResolved === 'boolean' ? isResolved : null,
  };
}

export function rowsToMarkets(rows: readonly TableRow[]): PooledMarket[] {
  return rows.map(rowToMarket);
}

/**
 * Encrypt and write the snapshot; format comes from the file name
 */
export async function writeMarketsSnapshot(
  store: EncryptedStore,
  filePath: string,
  markets: readonly PooledMarket[]
): Promise<void> {
  await store.writeEncryptedTable(filePath, marketsToRows(markets), MARKET_TABLE_SCHEMA);
  console.log(`[store] Wrote ${markets.length} markets to ${filePath}`);
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Load a snapshot. When the parquet artifact is missing or unreadable the
 * sibling `<name>.csv.encrypted` is tried before giving up. A token that
 * fails authentication is never replaced by the csv copy.
 */
export async function readMarketsSnapshot(store: EncryptedStore, filePath: string): Promise<PooledMarket[]> {
  const { name, format } = parseArtifactName(filePath);

  try {
    return rowsToMarkets(await store.readEncryptedTable(filePath, MARKET_TABLE_SCHEMA));
  } catch (err) {
    if (err instanceof CryptoError) throw err;
    const fallback = path.join(path.dirname(filePath), artifactFileName(name, 'csv'));
    if (format === 'csv' || !(await exists(fallback))) {
      throw err;
    }
    console.warn(`[store] Could not read ${filePath} (${errorMessage(err)}), using ${fallback}`);
    return rowsToMarkets(await store.readEncryptedTable(fallback, MARKET_TABLE_SCHEMA));
  }
}
