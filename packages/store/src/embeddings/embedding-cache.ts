/**
 * Content-addressed embedding cache
 *
 * Vectors are keyed by sha256 of the trimmed text. Entries are never
 * replaced or evicted. Every change rewrites the whole local artifact;
 * the write is not crash-atomic and expects a single writer.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import {
  CacheIOError,
  ProviderContractError,
  batch,
  errorMessage,
  hashText,
  type CacheEntry,
} from '@question-pool/core';
import type { EncryptedStore } from '../crypto/encrypted-store.js';
import { deserializeTable, serializeTable, tableFormatFromPath } from '../tables/table-codec.js';
import { EMBEDDING_TABLE_SCHEMA, entriesToRows, rowsToEntries } from './embedding-table.js';
import type { EmbeddingProvider } from './provider.js';
import { downloadRemoteCache, type RemoteCacheOptions } from './remote-cache.js';

export const DEFAULT_CHUNK_SIZE = 1024;

export interface EmbeddingCacheOptions {
  /** Local artifact (`.parquet` or `.csv`) */
  cachePath: string;
  provider: EmbeddingProvider;
  /** Maximum texts per provider call */
  chunkSize?: number;
  /** Bootstrap source used when no local artifact exists */
  remote?: RemoteCacheOptions;
}

export type CacheSource = 'local' | 'remote' | 'empty';

export class EmbeddingCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly provider: EmbeddingProvider;
  private readonly cachePath: string;
  private readonly chunkSize: number;
  private loadedFrom: CacheSource = 'empty';

  private constructor(options: EmbeddingCacheOptions) {
    this.provider = options.provider;
    this.cachePath = options.cachePath;
    this.chunkSize = Math.max(1, options.chunkSize ?? DEFAULT_CHUNK_SIZE);
  }

  /**
   * Open the cache: local artifact, else remote bootstrap, else empty.
   * A remote bootstrap is persisted locally right away.
   */
  static async open(options: EmbeddingCacheOptions): Promise<EmbeddingCache> {
    const cache = new EmbeddingCache(options);

    const local = await cache.readLocal();
    if (local) {
      cache.insertAll(local);
      cache.loadedFrom = 'local';
      console.log(`[embeddings] Loaded ${cache.size} entries from ${cache.cachePath}`);
      return cache;
    }

    if (options.remote) {
      const remote = await downloadRemoteCache(options.remote);
      if (remote) {
        cache.insertAll(remote);
        cache.loadedFrom = 'remote';
        await cache.save();
        return cache;
      }
    }

    console.log('[embeddings] Starting with an empty cache');
    return cache;
  }

  get size(): number {
    return this.entries.size;
  }

  get source(): CacheSource {
    return this.loadedFrom;
  }

  has(text: string): boolean {
    return this.entries.has(hashText(text));
  }

  values(): CacheEntry[] {
    return [...this.entries.values()];
  }

  /**
   * Vectors for `texts`, in input order. Misses are embedded in chunks of
   * `chunkSize`, one provider call per chunk; a text repeated within the
   * batch is embedded once.
   */
  async get(texts: readonly string[]): Promise<number[][]> {
    const hashes = texts.map((text) => hashText(text));

    const misses = new Map<string, string>();
    texts.forEach((text, i) => {
      const hash = hashes[i];
      if (!this.entries.has(hash) && !misses.has(hash)) {
        misses.set(hash, text.trim());
      }
    });

    if (misses.size > 0) {
      console.log(`[embeddings] ${texts.length - misses.size} cached, computing ${misses.size}`);
      await this.computeMisses([...misses.entries()]);
    }

    return hashes.map((hash) => {
      const entry = this.entries.get(hash);
      if (!entry) {
        throw new CacheIOError(`Cache entry ${hash} missing after update`);
      }
      return [...entry.embedding];
    });
  }

  /**
   * Rewrite the local artifact from memory
   */
  async save(): Promise<void> {
    try {
      const bytes = await serializeTable(
        entriesToRows(this.entries.values()),
        EMBEDDING_TABLE_SCHEMA,
        tableFormatFromPath(this.cachePath)
      );
      await mkdir(path.dirname(this.cachePath), { recursive: true });
      await writeFile(this.cachePath, bytes);
    } catch (err) {
      throw new CacheIOError(`Failed to write cache ${this.cachePath}: ${errorMessage(err)}`, { cause: err });
    }
  }

  /**
   * Write the encrypted artifact that remote bootstrap downloads
   */
  async exportEncrypted(store: EncryptedStore, filePath: string): Promise<void> {
    await store.writeEncryptedTable(filePath, entriesToRows(this.entries.values()), EMBEDDING_TABLE_SCHEMA);
    console.log(`[embeddings] Exported ${this.size} entries to ${filePath}`);
  }

  private async computeMisses(misses: Array<[string, string]>): Promise<void> {
    let inserted = 0;
    try {
      for (const chunk of batch(misses, this.chunkSize)) {
        const vectors = await this.provider.embed(chunk.map(([, text]) => text));
        this.checkVectors(chunk.length, vectors);
        chunk.forEach(([textHash, text], i) => {
          if (this.insert({ textHash, text, embedding: vectors[i] })) inserted++;
        });
      }
    } finally {
      // Keep what was paid for even when a later chunk fails
      if (inserted > 0) {
        await this.save();
      }
    }
  }

  private checkVectors(expected: number, vectors: number[][]): void {
    if (vectors.length !== expected) {
      throw new ProviderContractError(`Provider returned ${vectors.length} vectors for ${expected} texts`);
    }
    for (const vector of vectors) {
      if (vector.length !== this.provider.dimension) {
        throw new ProviderContractError(
          `Provider returned a ${vector.length}-dim vector, expected ${this.provider.dimension}`
        );
      }
    }
  }

  private insert(entry: CacheEntry): boolean {
    if (this.entries.has(entry.textHash)) return false; // first write wins
    this.entries.set(entry.textHash, entry);
    return true;
  }

  private insertAll(entries: readonly CacheEntry[]): void {
    for (const entry of entries) {
      if (entry.textHash) this.insert(entry);
    }
  }

  private async readLocal(): Promise<CacheEntry[] | null> {
    let bytes: Buffer;
    try {
      bytes = await readFile(this.cachePath);
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return null;
      }
      console.warn(`[embeddings] Cannot read ${this.cachePath}: ${errorMessage(err)}, falling back`);
      return null;
    }

    try {
      const rows = await deserializeTable(bytes, EMBEDDING_TABLE_SCHEMA, tableFormatFromPath(this.cachePath));
      return rowsToEntries(rows);
    } catch (err) {
      console.warn(`[embeddings] Corrupt cache ${this.cachePath}: ${errorMessage(err)}, falling back`);
      return null;
    }
  }
}
