import type { MarketFilter, Platform, PooledMarket } from '@question-pool/core';

/**
 * Interface for source adapters
 * Each forecasting / prediction market platform must implement this interface
 */
export interface SourceAdapter<TRaw = unknown> {
  /**
   * Platform identifier
   */
  readonly platform: Platform;

  /**
   * Thresholds used when the caller does not override them
   */
  readonly defaultFilter: MarketFilter;

  /**
   * Acquire the session (cookies, login). Use withAdapterSession instead of
   * calling open/close directly.
   */
  open(): Promise<void>;

  /**
   * Release the session. Safe to call more than once.
   */
  close(): Promise<void>;

  /**
   * Fetch raw records from the platform, applying the filter
   */
  fetchMarkets(filter: MarketFilter): Promise<TRaw[]>;

  /**
   * Convert one raw record. Pure; throws ParseError for a bad record.
   */
  toPooledMarket(raw: TRaw): PooledMarket;
}

/**
 * Adapter configuration
 */
export interface AdapterConfig {
  /**
   * Request timeout in milliseconds
   */
  timeoutMs?: number;

  /**
   * Attempts per request (1 = no retry)
   */
  maxAttempts?: number;

  /**
   * Base URL override for testing
   */
  baseUrl?: string;

  /**
   * Maximum number of list pages to walk
   */
  maxPages?: number;

  /**
   * Items requested per page
   */
  pageSize?: number;

  /**
   * Cool-down after each list page
   */
  pageDelayMs?: number;

  /**
   * Cool-down after each detail request
   */
  itemDelayMs?: number;

  /**
   * fetch implementation, replaced in tests
   */
  fetchFn?: typeof fetch;
}

export type ResolvedAdapterConfig = Required<AdapterConfig>;

/**
 * Default adapter configuration
 */
export const DEFAULT_ADAPTER_CONFIG: Omit<ResolvedAdapterConfig, 'fetchFn'> = {
  timeoutMs: 30000,
  maxAttempts: 3,
  baseUrl: '',
  maxPages: 20,
  pageSize: 100,
  pageDelayMs: 0,
  itemDelayMs: 0,
};

/**
 * Merge caller config over adapter defaults; undefined fields keep the default
 */
export function resolveAdapterConfig(
  config: AdapterConfig,
  defaults: Partial<Omit<ResolvedAdapterConfig, 'fetchFn'>> = {}
): ResolvedAdapterConfig {
  const base = { ...DEFAULT_ADAPTER_CONFIG, ...defaults };
  return {
    timeoutMs: config.timeoutMs ?? base.timeoutMs,
    maxAttempts: Math.max(1, config.maxAttempts ?? base.maxAttempts),
    baseUrl: (config.baseUrl || base.baseUrl).replace(/\/+$/, ''),
    maxPages: config.maxPages ?? base.maxPages,
    pageSize: config.pageSize ?? base.pageSize,
    pageDelayMs: config.pageDelayMs ?? base.pageDelayMs,
    itemDelayMs: config.itemDelayMs ?? base.itemDelayMs,
    fetchFn: config.fetchFn ?? fetch,
  };
}

/**
 * Run `fn` inside an open session; the session is closed on success,
 * failure, or a failed open.
 */
export async function withAdapterSession<TRaw, T>(
  adapter: SourceAdapter<TRaw>,
  fn: (adapter: SourceAdapter<TRaw>) => Promise<T>
): Promise<T> {
  try {
    await adapter.open();
    return await fn(adapter);
  } finally {
    await adapter.close();
  }
}
