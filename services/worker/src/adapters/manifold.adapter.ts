import { z } from 'zod';
import {
  DEFAULT_MARKET_FILTER,
  TransientFetchError,
  batch,
  createPooledMarket,
  errorMessage,
  mergeFilter,
  parseFlexibleTimestamp,
  type MarketFilter,
  type Platform,
  type PooledMarket,
} from '@question-pool/core';
import { BaseAdapter } from './base.adapter.js';
import type { AdapterConfig } from './types.js';

const MANIFOLD_API_BASE = 'https://api.manifold.markets';
const MANIFOLD_SITE = 'https://manifold.markets';
const DETAIL_CONCURRENCY = 5;
const SUPPORTED_TYPES = new Set(['BINARY', 'MULTIPLE_CHOICE']);

const manifoldAnswerSchema = z.object({
  text: z.string(),
  probability: z.number().nullish(),
});

const manifoldMarketSchema = z.object({
  id: z.string(),
  question: z.string(),
  slug: z.string(),
  creatorUsername: z.string(),
  createdTime: z.number(),
  outcomeType: z.string(),
  probability: z.number().nullish(),
  volume: z.number().nullish(),
  uniqueBettorCount: z.number().nullish(),
  isResolved: z.boolean().nullish(),
  resolution: z.string().nullish(),
  answers: z.array(manifoldAnswerSchema).nullish(),
});

export type ManifoldMarket = z.infer<typeof manifoldMarketSchema>;

/**
 * "MKT" resolutions are cancellations at market price, not a result
 */
function isResolvedMarket(market: ManifoldMarket): boolean {
  return Boolean(market.resolution) && market.resolution !== 'MKT';
}

function passesFilter(market: ManifoldMarket, filter: MarketFilter): boolean {
  if (filter.onlyOpen && market.isResolved) return false;
  if ((market.uniqueBettorCount ?? 0) < filter.minForecasters) return false;
  if ((market.volume ?? 0) < filter.minVolume) return false;
  return SUPPORTED_TYPES.has(market.outcomeType);
}

/**
 * Manifold adapter: public v0 API. The list endpoint is paged by
 * `before=<last id>`; answers come from the per-market endpoint.
 */
export class ManifoldAdapter extends BaseAdapter<ManifoldMarket> {
  readonly platform: Platform = 'manifold';
  readonly defaultFilter: MarketFilter = mergeFilter(DEFAULT_MARKET_FILTER, { minForecasters: 50 });

  constructor(
    private readonly apiKey?: string,
    config: AdapterConfig = {}
  ) {
    super(config, { baseUrl: MANIFOLD_API_BASE, pageSize: 1000, maxPages: 200, pageDelayMs: 500, itemDelayMs: 200 });
  }

  protected sessionHeaders(): Record<string, string> {
    return this.apiKey ? { Authorization: `Key ${this.apiKey}` } : {};
  }

  private async fetchListPage(before: string | undefined, page: number): Promise<unknown[]> {
    const url = new URL('/v0/markets', this.config.baseUrl);
    url.searchParams.set('limit', String(this.config.pageSize));
    url.searchParams.set('sort', 'created-time');
    url.searchParams.set('order', 'desc');
    if (before) {
      url.searchParams.set('before', before);
    }

    try {
      const data = await this.fetchJson(url.toString());
      return Array.isArray(data) ? data : [];
    } catch (err) {
      if (page === 1) {
        throw new TransientFetchError(`[manifold] Could not load market list: ${errorMessage(err)}`, { cause: err });
      }
      console.warn(`[manifold] Page ${page} unavailable, stopping: ${errorMessage(err)}`);
      return [];
    }
  }

  private async listMarkets(filter: MarketFilter): Promise<ManifoldMarket[]> {
    const candidates: ManifoldMarket[] = [];
    let before: string | undefined;

    for (let page = 1; page <= this.config.maxPages; page++) {
      const items = await this.fetchListPage(before, page);
      if (items.length === 0) break;

      const markets = this.parseRecords(manifoldMarketSchema, items, 'market');
      candidates.push(...markets.filter((m) => passesFilter(m, filter)));
      console.log(`[manifold] Page ${page}: ${items.length} markets, ${candidates.length} candidates`);

      const last = markets[markets.length - 1];
      if (!last || last.id === before) break;
      before = last.id;
      await this.delay(this.config.pageDelayMs);
    }

    return candidates;
  }

  private async fetchDetail(market: ManifoldMarket): Promise<ManifoldMarket | null> {
    try {
      const data = await this.fetchJson(`${this.config.baseUrl}/v0/market/${encodeURIComponent(market.id)}`);
      const [detail] = this.parseRecords(manifoldMarketSchema, [data], 'market detail');
      return detail ?? null;
    } catch (err) {
      console.warn(`[manifold] Skipping ${market.id}: ${errorMessage(err)}`);
      return null;
    }
  }

  async fetchMarkets(filter: MarketFilter): Promise<ManifoldMarket[]> {
    const candidates = await this.listMarkets(filter);
    const detailed: ManifoldMarket[] = [];

    for (const group of batch(candidates, DETAIL_CONCURRENCY)) {
      const results = await Promise.all(group.map((m) => this.fetchDetail(m)));
      for (const market of results) {
        if (market && !(filter.onlyOpen && isResolvedMarket(market))) {
          detailed.push(market);
        }
      }
      await this.delay(this.config.itemDelayMs);
    }

    console.log(`[manifold] ${detailed.length} markets after detail fetch`);
    return detailed;
  }

  toPooledMarket(raw: ManifoldMarket): PooledMarket {
    let outcomes: string[] = [];
    let outcomeProbabilities: Array<number | null> = [];

    if (raw.outcomeType === 'BINARY') {
      const p = raw.probability ?? null;
      outcomes = ['Yes', 'No'];
      outcomeProbabilities = p === null ? [null, null] : [p, 1 - p];
    } else if (raw.outcomeType === 'MULTIPLE_CHOICE') {
      const answers = raw.answers ?? [];
      outcomes = answers.map((a) => a.text);
      outcomeProbabilities = answers.map((a) => a.probability ?? null);
    }

    return createPooledMarket({
      platform: this.platform,
      nativeId: raw.id,
      question: raw.question,
      outcomes,
      outcomeProbabilities,
      url: `${MANIFOLD_SITE}/${raw.creatorUsername}/${raw.slug}`,
      publishedAt: parseFlexibleTimestamp(raw.createdTime),
      volume: raw.volume ?? null,
      nForecasters: raw.uniqueBettorCount ?? null,
      commentsCount: null,
      originalMarketType: raw.outcomeType,
      isResolved: isResolvedMarket(raw),
      raw,
    });
  }
}
