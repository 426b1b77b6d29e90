/**
 * Platform enum - supported forecasting / prediction market sources
 */
export type Platform = 'gjopen' | 'manifold' | 'polymarket' | 'predictit' | 'metaculus';

export const PLATFORMS: readonly Platform[] = ['gjopen', 'manifold', 'polymarket', 'predictit', 'metaculus'];

/**
 * Display names written to `sourcePlatform`
 */
export const PLATFORM_LABELS: Record<Platform, string> = {
  gjopen: 'GJOpen',
  manifold: 'Manifold',
  polymarket: 'Polymarket',
  predictit: 'PredictIt',
  metaculus: 'Metaculus',
};

export function isPlatform(value: string): value is Platform {
  return (PLATFORMS as readonly string[]).includes(value);
}

/**
 * Canonical market record produced by every source adapter
 */
export interface PooledMarket {
  /** Platform-prefixed id, e.g. "gjopen_123", "polymarket_abc" */
  id: string;
  question: string;
  outcomes: string[];
  /** Parallel to `outcomes`; null when the source has no probability */
  outcomeProbabilities: Array<number | null>;
  /** Derived from outcomes + probabilities by `formatOutcomes` */
  formattedOutcomes: string;
  url: string;
  publishedAt: Date | null;
  /** Display name, e.g. "GJOpen" */
  sourcePlatform: string;
  volume?: number | null;
  nForecasters?: number | null;
  commentsCount?: number | null;
  /** e.g. "BINARY", "MULTIPLE_CHOICE" */
  originalMarketType?: string | null;
  isResolved?: boolean | null;
  /**
   * Source-specific object kept for traceability only.
   * Dropped before persistence and ignored by comparisons.
   */
  raw?: unknown;
}

/**
 * Fields accepted by `createPooledMarket`; `formattedOutcomes` is always derived
 */
export interface PooledMarketInput {
  platform: Platform;
  nativeId: string | number;
  question: string;
  outcomes: string[];
  outcomeProbabilities: Array<number | null>;
  url: string;
  publishedAt: Date | null;
  volume?: number | null;
  nForecasters?: number | null;
  commentsCount?: number | null;
  originalMarketType?: string | null;
  isResolved?: boolean | null;
  raw?: unknown;
}

/**
 * Thresholds an adapter applies while fetching
 */
export interface MarketFilter {
  minForecasters: number;
  minComments: number;
  minVolume: number;
  onlyOpen: boolean;
}

export const DEFAULT_MARKET_FILTER: MarketFilter = {
  minForecasters: 0,
  minComments: 0,
  minVolume: 0,
  onlyOpen: true,
};

/**
 * Merge partial filter overrides over a base filter
 */
export function mergeFilter(base: MarketFilter, overrides: Partial<MarketFilter> = {}): MarketFilter {
  return {
    minForecasters: overrides.minForecasters ?? base.minForecasters,
    minComments: overrides.minComments ?? base.minComments,
    minVolume: overrides.minVolume ?? base.minVolume,
    onlyOpen: overrides.onlyOpen ?? base.onlyOpen,
  };
}

/**
 * One entry of the content-addressed embedding cache
 */
export interface CacheEntry {
  /** sha256 hex of the trimmed text */
  textHash: string;
  text: string;
  embedding: number[];
}
