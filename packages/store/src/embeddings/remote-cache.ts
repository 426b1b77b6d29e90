import { errorMessage, type CacheEntry } from '@question-pool/core';
import { parseArtifactName, type EncryptedStore } from '../crypto/encrypted-store.js';
import { EMBEDDING_TABLE_SCHEMA, rowsToEntries } from './embedding-table.js';

export interface RemoteCacheOptions {
  /** Release download URL of `<name>.<format>.encrypted` */
  url: string;
  store: EncryptedStore;
  timeoutMs?: number;
  fetchFn?: typeof fetch;
}

/**
 * Download and decrypt a published cache artifact.
 * Any failure is logged and reported as null (start with an empty cache).
 */
export async function downloadRemoteCache(options: RemoteCacheOptions): Promise<CacheEntry[] | null> {
  const { url, store, timeoutMs = 60000, fetchFn = fetch } = options;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const { format } = parseArtifactName(new URL(url).pathname);
    console.log(`[embeddings] Downloading remote cache from ${url}`);

    const response = await fetchFn(url, { signal: controller.signal });
    if (!response.ok) {
      console.warn(`[embeddings] Remote cache unavailable: ${response.status} ${response.statusText}`);
      return null;
    }

    const ciphertext = Buffer.from(await response.arrayBuffer());
    const entries = rowsToEntries(await store.decryptTable(ciphertext, EMBEDDING_TABLE_SCHEMA, format));
    console.log(`[embeddings] Loaded ${entries.length} entries from remote cache`);
    return entries;
  } catch (err) {
    console.warn(`[embeddings] Remote cache bootstrap failed: ${errorMessage(err)}`);
    return null;
  } finally {
    clearTimeout(timeout);
  }
}
