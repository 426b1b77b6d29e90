import { z } from 'zod';
import {
  DEFAULT_MARKET_FILTER,
  TransientFetchError,
  createPooledMarket,
  errorMessage,
  mergeFilter,
  parseFlexibleTimestamp,
  toFiniteNumber,
  type MarketFilter,
  type Platform,
  type PooledMarket,
} from '@question-pool/core';
import { BaseAdapter } from './base.adapter.js';
import type { AdapterConfig } from './types.js';

const GAMMA_API_BASE = 'https://gamma-api.polymarket.com';
const EVENT_URL_BASE = 'https://polymarket.com/event';

// Gamma sends outcomes and prices either as arrays or as JSON-encoded strings
const jsonListSchema = z.union([z.array(z.unknown()), z.string()]).nullish();

const gammaMarketSchema = z.object({
  id: z.union([z.string(), z.number()]),
  question: z.string(),
  slug: z.string().nullish(),
  outcomes: jsonListSchema,
  outcomePrices: jsonListSchema,
  volume: z.union([z.string(), z.number()]).nullish(),
  volumeNum: z.number().nullish(),
  category: z.string().nullish(),
  createdAt: z.string().nullish(),
  closed: z.boolean().nullish(),
});

export type GammaMarket = z.infer<typeof gammaMarketSchema>;

/**
 * Decode an outcomes / prices field into a plain list
 */
export function decodeJsonList(value: GammaMarket['outcomes']): unknown[] {
  if (value === null || value === undefined) return [];
  if (Array.isArray(value)) return value;
  try {
    const parsed: unknown = JSON.parse(value);
    return Array.isArray(parsed) ? parsed : [];
  } catch {
    return [];
  }
}

/**
 * Prices aligned with outcomes: extra prices are dropped, missing ones are null
 */
export function alignPrices(outcomeCount: number, prices: readonly unknown[]): Array<number | null> {
  return Array.from({ length: outcomeCount }, (_, i) => toFiniteNumber(prices[i]));
}

export function classifyMarketType(outcomes: readonly string[], category: string | null | undefined): string {
  if (category) return category;
  const labels = outcomes.map((o) => o.toLowerCase()).sort();
  if (labels.length === 2 && ((labels[0] === 'no' && labels[1] === 'yes') || (labels[0] === 'false' && labels[1] === 'true'))) {
    return 'BINARY';
  }
  if (labels.length >= 2) return 'CATEGORICAL';
  return 'UNKNOWN';
}

// `volume` can be missing or "0" while `volumeNum` carries the figure
function marketVolume(market: GammaMarket): number | null {
  const volume = toFiniteNumber(market.volume);
  if (volume === null || volume === 0) {
    return market.volumeNum ?? volume;
  }
  return volume;
}

/**
 * Polymarket adapter using the Gamma API, paged by offset
 */
export class PolymarketAdapter extends BaseAdapter<GammaMarket> {
  readonly platform: Platform = 'polymarket';
  readonly defaultFilter: MarketFilter = mergeFilter(DEFAULT_MARKET_FILTER, { minVolume: 10000 });

  constructor(config: AdapterConfig = {}) {
    super(config, { baseUrl: GAMMA_API_BASE, pageSize: 500, maxPages: 200, pageDelayMs: 500 });
  }

  private async fetchPage(offset: number, filter: MarketFilter, page: number): Promise<unknown[]> {
    const url = new URL('/markets', this.config.baseUrl);
    url.searchParams.set('limit', String(this.config.pageSize));
    url.searchParams.set('offset', String(offset));
    if (filter.onlyOpen) {
      url.searchParams.set('closed', 'false');
    }

    try {
      const data = await this.fetchJson(url.toString());
      return Array.isArray(data) ? data : [];
    } catch (err) {
      if (page === 1) {
        throw new TransientFetchError(`[polymarket] Could not load markets: ${errorMessage(err)}`, { cause: err });
      }
      console.warn(`[polymarket] Offset ${offset} unavailable, stopping: ${errorMessage(err)}`);
      return [];
    }
  }

  async fetchMarkets(filter: MarketFilter): Promise<GammaMarket[]> {
    const markets: GammaMarket[] = [];
    let offset = 0;

    for (let page = 1; page <= this.config.maxPages; page++) {
      const items = await this.fetchPage(offset, filter, page);
      if (items.length === 0) break;

      for (const market of this.parseRecords(gammaMarketSchema, items, 'market')) {
        if (filter.onlyOpen && market.closed) continue;
        if ((marketVolume(market) ?? 0) < filter.minVolume) continue;
        markets.push(market);
      }

      // A short page is the last one
      if (items.length < this.config.pageSize) break;
      offset += this.config.pageSize;
      await this.delay(this.config.pageDelayMs);
    }

    console.log(`[polymarket] ${markets.length} markets kept`);
    return markets;
  }

  toPooledMarket(raw: GammaMarket): PooledMarket {
    const outcomes = decodeJsonList(raw.outcomes).map(String);
    const outcomeProbabilities = alignPrices(outcomes.length, decodeJsonList(raw.outcomePrices));

    return createPooledMarket({
      platform: this.platform,
      nativeId: raw.id,
      question: raw.question,
      outcomes,
      outcomeProbabilities,
      url: raw.slug ? `${EVENT_URL_BASE}/${raw.slug}` : '',
      publishedAt: parseFlexibleTimestamp(raw.createdAt),
      volume: marketVolume(raw),
      nForecasters: null,
      commentsCount: null,
      originalMarketType: classifyMarketType(outcomes, raw.category),
      isResolved: raw.closed ?? null,
      raw,
    });
  }
}
