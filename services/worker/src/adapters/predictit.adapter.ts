import { z } from 'zod';
import {
  DEFAULT_MARKET_FILTER,
  TransientFetchError,
  createPooledMarket,
  errorMessage,
  parseFlexibleTimestamp,
  toFiniteNumber,
  type MarketFilter,
  type Platform,
  type PooledMarket,
} from '@question-pool/core';
import { BaseAdapter } from './base.adapter.js';
import type { AdapterConfig } from './types.js';

const PREDICTIT_API_BASE = 'https://www.predictit.org/api';

const predictItContractSchema = z.object({
  id: z.union([z.number(), z.string()]).nullish(),
  name: z.string(),
  lastTradePrice: z.union([z.number(), z.string()]).nullish(),
});

const predictItMarketSchema = z.object({
  id: z.union([z.number(), z.string()]),
  name: z.string(),
  url: z.string().nullish(),
  timeStamp: z.string().nullish(),
  status: z.string().nullish(),
  contracts: z.array(predictItContractSchema).default([]),
});

const marketDataSchema = z.object({ markets: z.array(z.unknown()) });

export type PredictItMarket = z.infer<typeof predictItMarketSchema>;
export type PredictItContract = z.infer<typeof predictItContractSchema>;

interface ContractOutcomes {
  outcomes: string[];
  probabilities: Array<number | null>;
}

/**
 * Single contract: Yes/No from its last trade. Several contracts: names
 * with last-trade prices normalized to sum to 1.
 */
export function contractOutcomes(contracts: readonly PredictItContract[]): ContractOutcomes {
  if (contracts.length === 0) {
    return { outcomes: [], probabilities: [] };
  }

  if (contracts.length === 1) {
    const p = toFiniteNumber(contracts[0].lastTradePrice);
    return {
      outcomes: ['Yes', 'No'],
      probabilities: p === null ? [null, null] : [p, p <= 1 ? 1 - p : 0],
    };
  }

  const prices = contracts.map((c) => toFiniteNumber(c.lastTradePrice));
  const total = prices.reduce<number>((sum, p) => sum + (p ?? 0), 0);
  return {
    outcomes: contracts.map((c) => c.name),
    probabilities: prices.map((p) => {
      if (p === null) return null;
      return total > 0 ? p / total : 0;
    }),
  };
}

function marketType(contractCount: number): string {
  if (contractCount === 1) return 'BINARY';
  if (contractCount > 1) return 'CATEGORICAL';
  return 'UNKNOWN';
}

function isClosed(market: PredictItMarket): boolean {
  return market.status?.toLowerCase() === 'closed';
}

/**
 * PredictIt adapter: one request returns every listed market
 */
export class PredictItAdapter extends BaseAdapter<PredictItMarket> {
  readonly platform: Platform = 'predictit';
  readonly defaultFilter: MarketFilter = DEFAULT_MARKET_FILTER;

  constructor(config: AdapterConfig = {}) {
    super(config, { baseUrl: PREDICTIT_API_BASE });
  }

  async fetchMarkets(filter: MarketFilter): Promise<PredictItMarket[]> {
    let data: unknown;
    try {
      data = await this.fetchJson(`${this.config.baseUrl}/marketdata/all/`);
    } catch (err) {
      throw new TransientFetchError(`[predictit] Could not load market data: ${errorMessage(err)}`, { cause: err });
    }

    const envelope = marketDataSchema.safeParse(data);
    if (!envelope.success) {
      console.warn('[predictit] Response has no markets list');
      return [];
    }

    const markets = this.parseRecords(predictItMarketSchema, envelope.data.markets, 'market').filter(
      (m) => !filter.onlyOpen || (Boolean(m.status) && !isClosed(m))
    );
    console.log(`[predictit] ${markets.length} markets kept`);
    return markets;
  }

  toPooledMarket(raw: PredictItMarket): PooledMarket {
    const { outcomes, probabilities } = contractOutcomes(raw.contracts);

    return createPooledMarket({
      platform: this.platform,
      nativeId: raw.id,
      question: raw.name,
      outcomes,
      outcomeProbabilities: probabilities,
      url: raw.url ?? '',
      publishedAt: parseFlexibleTimestamp(raw.timeStamp),
      volume: null,
      nForecasters: null,
      commentsCount: null,
      originalMarketType: marketType(raw.contracts.length),
      isResolved: raw.status ? isClosed(raw) : null,
      raw,
    });
  }
}
