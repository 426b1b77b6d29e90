import {
  DEFAULT_MARKET_FILTER,
  TransientFetchError,
  createPooledMarket,
  errorMessage,
  mergeFilter,
  parseFlexibleTimestamp,
  type MarketFilter,
  type Platform,
  type PooledMarket,
} from '@question-pool/core';
import type { MetaculusClient, MetaculusQuestion } from './metaculus.client.js';
import type { SourceAdapter } from './types.js';

const ONE_YEAR_MS = 365 * 24 * 60 * 60 * 1000;

export interface MetaculusAdapterOptions {
  /** Clock used for the resolution horizon */
  now?: () => Date;
}

/**
 * Open binary questions with a community prediction, resolving within a year
 */
export function isEligibleQuestion(question: MetaculusQuestion, filter: MarketFilter, now: Date): boolean {
  if (question.type !== 'binary') return false;
  if (filter.onlyOpen && question.status !== 'open') return false;
  if ((question.nForecasters ?? 0) < filter.minForecasters) return false;
  if (question.communityPrediction === null) return false;

  const resolveAt = parseFlexibleTimestamp(question.scheduledResolveTime);
  if (!resolveAt) return false;
  return resolveAt.getTime() - now.getTime() < ONE_YEAR_MS;
}

/**
 * Metaculus adapter backed by a MetaculusClient
 */
export class MetaculusAdapter implements SourceAdapter<MetaculusQuestion> {
  readonly platform: Platform = 'metaculus';
  readonly defaultFilter: MarketFilter = mergeFilter(DEFAULT_MARKET_FILTER, { minForecasters: 40 });

  private readonly now: () => Date;

  constructor(
    private readonly client: MetaculusClient,
    options: MetaculusAdapterOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  // The client holds no session state
  async open(): Promise<void> {}

  async close(): Promise<void> {}

  async fetchMarkets(filter: MarketFilter): Promise<MetaculusQuestion[]> {
    let questions: MetaculusQuestion[];
    try {
      questions = await this.client.listQuestions();
    } catch (err) {
      throw new TransientFetchError(`[metaculus] Could not list questions: ${errorMessage(err)}`, { cause: err });
    }

    const now = this.now();
    const eligible = questions.filter((q) => isEligibleQuestion(q, filter, now));
    console.log(`[metaculus] ${eligible.length} of ${questions.length} questions eligible`);
    return eligible;
  }

  toPooledMarket(raw: MetaculusQuestion): PooledMarket {
    const p = raw.communityPrediction;

    return createPooledMarket({
      platform: this.platform,
      nativeId: raw.id,
      question: raw.title,
      outcomes: ['Yes', 'No'],
      outcomeProbabilities: p === null ? [null, null] : [p, 1 - p],
      url: raw.url,
      publishedAt: parseFlexibleTimestamp(raw.publishedAt),
      volume: null,
      nForecasters: raw.nForecasters,
      commentsCount: null,
      originalMarketType: 'BINARY',
      isResolved: raw.status === 'resolved',
      raw,
    });
  }
}
