import {
  PLATFORMS,
  formatDuration,
  loadAdapterEnv,
  type MarketFilter,
  type Platform,
} from '@question-pool/core';
import { EncryptedStore, MARKETS_ARTIFACT_NAME, artifactFileName, writeMarketsSnapshot } from '@question-pool/store';
import { createAdapter, type AdapterConfig, type MetaculusClient } from '../adapters/index.js';
import { aggregateMarkets, type AggregateResult } from '../pipeline/aggregate.js';

export const DEFAULT_MARKETS_OUTPUT = `data/${artifactFileName(MARKETS_ARTIFACT_NAME, 'parquet')}`;

export interface FetchMarketsOptions {
  platforms?: readonly Platform[];
  /** Encrypted snapshot path, `<name>.<parquet|csv>.encrypted` */
  output?: string;
  includeClosed?: boolean;
  env?: Record<string, string | undefined>;
  adapterConfig?: AdapterConfig;
  metaculusClient?: MetaculusClient;
}

export interface FetchMarketsResult {
  /** False when every source failed */
  ok: boolean;
  output: string;
  aggregate: AggregateResult;
}

/**
 * Fetch all sources, merge, and write the encrypted market snapshot.
 * The encryption key is checked before any network request.
 */
export async function runFetchMarkets(options: FetchMarketsOptions = {}): Promise<FetchMarketsResult> {
  const startTime = Date.now();
  const env = options.env ?? process.env;
  const output = options.output ?? DEFAULT_MARKETS_OUTPUT;
  const platforms = options.platforms ?? PLATFORMS;

  const store = EncryptedStore.fromEnv(env);
  const adapterEnv = loadAdapterEnv(env);
  const adapters = platforms.map((platform) =>
    createAdapter(platform, {
      env: adapterEnv,
      config: options.adapterConfig,
      metaculusClient: options.metaculusClient,
    })
  );

  console.log(`[fetch] Fetching from ${platforms.join(', ')}...`);
  const filter: Partial<MarketFilter> = options.includeClosed ? { onlyOpen: false } : {};
  const aggregate = await aggregateMarkets(adapters, { filter });

  await writeMarketsSnapshot(store, output, aggregate.markets);

  const ok = aggregate.reports.length === 0 || aggregate.reports.some((r) => r.ok);
  console.log(`[fetch] Done in ${formatDuration(Date.now() - startTime)}`);
  return { ok, output, aggregate };
}
