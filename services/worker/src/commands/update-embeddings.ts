import { loadEmbeddingConfig, loadReleaseConfig, releaseFileUrl } from '@question-pool/core';
import {
  EMBEDDINGS_ARTIFACT_NAME,
  EmbeddingCache,
  EncryptedStore,
  OpenAICompatibleEmbeddingProvider,
  artifactFileName,
  readMarketsSnapshot,
  tableFormatFromPath,
  type CacheSource,
  type EmbeddingProvider,
} from '@question-pool/store';
import { DEFAULT_MARKETS_OUTPUT } from './fetch-markets.js';

export interface UpdateEmbeddingsOptions {
  snapshot?: string;
  /** Local cache artifact; defaults to EMBEDDING_CACHE_PATH */
  cachePath?: string;
  /** Bootstrap from the release artifact when no local cache exists */
  useRemote?: boolean;
  /** Also write the encrypted cache artifact for publishing */
  exportPath?: string;
  env?: Record<string, string | undefined>;
  provider?: EmbeddingProvider;
  fetchFn?: typeof fetch;
}

export interface UpdateEmbeddingsResult {
  questions: number;
  computed: number;
  cacheSize: number;
  source: CacheSource;
}

/**
 * Make sure every question of the snapshot has a cached embedding
 */
export async function runUpdateEmbeddings(options: UpdateEmbeddingsOptions = {}): Promise<UpdateEmbeddingsResult> {
  const env = options.env ?? process.env;
  const config = loadEmbeddingConfig(env);

  // Credentials first: nothing is read or downloaded without them
  const store = EncryptedStore.fromEnv(env);
  const provider = options.provider ?? OpenAICompatibleEmbeddingProvider.fromConfig(config, options.fetchFn);

  const markets = await readMarketsSnapshot(store, options.snapshot ?? DEFAULT_MARKETS_OUTPUT);
  const cachePath = options.cachePath ?? config.cachePath;
  const useRemote = options.useRemote ?? config.useRemote;

  const cache = await EmbeddingCache.open({
    cachePath,
    provider,
    chunkSize: config.chunkSize,
    remote: useRemote
      ? {
          url: releaseFileUrl(
            artifactFileName(EMBEDDINGS_ARTIFACT_NAME, tableFormatFromPath(cachePath)),
            loadReleaseConfig(env)
          ),
          store,
          fetchFn: options.fetchFn,
        }
      : undefined,
  });

  const before = cache.size;
  await cache.get(markets.map((m) => m.question));
  const computed = cache.size - before;
  console.log(`[embed] ${markets.length} questions, ${computed} new embeddings, ${cache.size} cached`);

  if (options.exportPath) {
    await cache.exportEncrypted(store, options.exportPath);
  }

  return { questions: markets.length, computed, cacheSize: cache.size, source: cache.source };
}
