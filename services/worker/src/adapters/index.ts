import { loadAdapterEnv, type AdapterEnv, type Platform } from '@question-pool/core';
import { type SourceAdapter, type AdapterConfig } from './types.js';
import { GJOpenAdapter } from './gjopen.adapter.js';
import { ManifoldAdapter } from './manifold.adapter.js';
import { PolymarketAdapter } from './polymarket.adapter.js';
import { PredictItAdapter } from './predictit.adapter.js';
import { MetaculusAdapter } from './metaculus.adapter.js';
import { MetaculusApiClient, type MetaculusClient } from './metaculus.client.js';

export {
  type SourceAdapter,
  type AdapterConfig,
  type ResolvedAdapterConfig,
  DEFAULT_ADAPTER_CONFIG,
  resolveAdapterConfig,
  withAdapterSession,
} from './types.js';
export { BaseAdapter, type TextResponse } from './base.adapter.js';
export { HttpSession, DEFAULT_USER_AGENT } from './http-session.js';
export { GJOpenAdapter, parseQuestionPage, type GJOpenQuestion } from './gjopen.adapter.js';
export { ManifoldAdapter, type ManifoldMarket } from './manifold.adapter.js';
export { PolymarketAdapter, type GammaMarket } from './polymarket.adapter.js';
export { PredictItAdapter, contractOutcomes, type PredictItMarket } from './predictit.adapter.js';
export { MetaculusAdapter, isEligibleQuestion } from './metaculus.adapter.js';
export {
  MetaculusApiClient,
  postToQuestion,
  type MetaculusClient,
  type MetaculusQuestion,
} from './metaculus.client.js';

export interface CreateAdapterOptions {
  config?: AdapterConfig;
  env?: AdapterEnv;
  metaculusClient?: MetaculusClient;
}

/**
 * Create adapter for a platform. Credentials come from `env`; a missing
 * credential surfaces when the adapter session opens.
 */
export function createAdapter(platform: Platform, options: CreateAdapterOptions = {}): SourceAdapter {
  const env = options.env ?? loadAdapterEnv();
  const config: AdapterConfig = {
    timeoutMs: env.timeoutMs,
    maxAttempts: env.maxAttempts,
    ...options.config,
  };

  switch (platform) {
    case 'gjopen':
      return new GJOpenAdapter(env.gjopen, config);
    case 'manifold':
      return new ManifoldAdapter(env.manifoldApiKey, config);
    case 'polymarket':
      return new PolymarketAdapter(config);
    case 'predictit':
      return new PredictItAdapter(config);
    case 'metaculus':
      return new MetaculusAdapter(
        options.metaculusClient ??
          new MetaculusApiClient({
            token: env.metaculusToken,
            timeoutMs: config.timeoutMs,
            maxAttempts: config.maxAttempts,
            fetchFn: config.fetchFn,
          })
      );
  }
}

/**
 * Get all supported platforms
 */
export function getSupportedPlatforms(): Platform[] {
  return ['gjopen', 'manifold', 'polymarket', 'predictit', 'metaculus'];
}
