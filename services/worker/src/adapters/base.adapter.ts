/**
 * Base Adapter - Common functionality for all source adapters
 * Session lifecycle, timeouts, retries, redirects and per-record parsing
 */

import {
  HttpError,
  ParseError,
  TransientFetchError,
  errorMessage,
  parseRetryAfter,
  sleep,
  withRetry,
  type MarketFilter,
  type Platform,
  type PooledMarket,
} from '@question-pool/core';
import type { z } from 'zod';
import { HttpSession } from './http-session.js';
import type { AdapterConfig, ResolvedAdapterConfig, SourceAdapter } from './types.js';
import { resolveAdapterConfig } from './types.js';

const MAX_REDIRECTS = 5;

export interface TextResponse {
  text: string;
  /** URL after redirects */
  url: string;
}

/**
 * Abstract base class for source adapters
 * Provides HTTP fetch with retry logic, timeout handling and a cookie session
 */
export abstract class BaseAdapter<TRaw> implements SourceAdapter<TRaw> {
  abstract readonly platform: Platform;
  abstract readonly defaultFilter: MarketFilter;

  protected readonly config: ResolvedAdapterConfig;
  private session: HttpSession | null = null;

  constructor(config: AdapterConfig, defaults: Partial<Omit<ResolvedAdapterConfig, 'fetchFn'>> = {}) {
    this.config = resolveAdapterConfig(config, defaults);
  }

  abstract fetchMarkets(filter: MarketFilter): Promise<TRaw[]>;
  abstract toPooledMarket(raw: TRaw): PooledMarket;

  async open(): Promise<void> {
    this.session = new HttpSession(this.sessionHeaders());
  }

  async close(): Promise<void> {
    this.session?.close();
    this.session = null;
  }

  /**
   * Headers sent with every request of the session (auth keys etc.)
   */
  protected sessionHeaders(): Record<string, string> {
    return {};
  }

  protected get http(): HttpSession {
    if (!this.session || this.session.isClosed) {
      throw new TransientFetchError(`[${this.platform}] No open session`);
    }
    return this.session;
  }

  /**
   * Fetch JSON with retry logic and exponential backoff
   * Handles Retry-After headers from rate limiting
   */
  protected async fetchJson(url: string, options: RequestInit = {}): Promise<unknown> {
    return this.withRetry(async () => {
      const { response } = await this.request(url, options);
      try {
        const json: unknown = await response.json();
        return json;
      } catch (err) {
        throw new ParseError(`[${this.platform}] Invalid JSON from ${url}: ${errorMessage(err)}`, { cause: err });
      }
    });
  }

  /**
   * Fetch text with retry, reporting the final URL after redirects
   */
  protected async fetchText(url: string, options: RequestInit = {}): Promise<TextResponse> {
    return this.withRetry(async () => {
      const { response, url: finalUrl } = await this.request(url, options);
      return { text: await response.text(), url: finalUrl };
    });
  }

  protected async delay(ms: number): Promise<void> {
    await sleep(ms);
  }

  /**
   * Parse each record with `schema`; malformed records are logged and skipped
   */
  protected parseRecords<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, items: readonly unknown[], what = 'record'): T[] {
    const parsed: T[] = [];
    for (const item of items) {
      const result = schema.safeParse(item);
      if (result.success) {
        parsed.push(result.data);
      } else {
        const issue = result.error.issues[0];
        console.warn(`[${this.platform}] Skipping malformed ${what}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid'}`);
      }
    }
    return parsed;
  }

  private async withRetry<T>(fn: () => Promise<T>): Promise<T> {
    return withRetry(fn, {
      maxAttempts: this.config.maxAttempts,
      baseDelayMs: 1000,
      maxDelayMs: 30000,
      onRetry: (err, attempt, delayMs) => {
        console.warn(`[${this.platform}] Retry ${attempt} in ${delayMs}ms: ${err.message}`);
      },
    });
  }

  /**
   * One request with redirects followed by hand so cookies set on a
   * redirect response land in the session. Non-2xx -> HttpError.
   */
  private async request(url: string, options: RequestInit): Promise<{ response: Response; url: string }> {
    const session = this.http;
    let currentUrl = url;
    let init: RequestInit = options;

    for (let hop = 0; hop <= MAX_REDIRECTS; hop++) {
      const response = await this.fetchWithTimeout(currentUrl, {
        ...init,
        headers: session.buildHeaders(init.headers),
        redirect: 'manual',
      });
      session.storeCookies(response);

      const location = response.headers.get('Location');
      if (response.status >= 300 && response.status < 400 && location) {
        currentUrl = new URL(location, currentUrl).toString();
        // 303 and POST redirects continue as GET
        if (response.status === 303 || ((response.status === 301 || response.status === 302) && init.method === 'POST')) {
          init = { method: 'GET' };
        }
        continue;
      }

      if (!response.ok) {
        throw new HttpError(
          `[${this.platform}] ${response.status} ${response.statusText} from ${currentUrl}`,
          response.status,
          parseRetryAfter(response.headers.get('Retry-After'))
        );
      }
      return { response, url: currentUrl };
    }

    throw new TransientFetchError(`[${this.platform}] Too many redirects from ${url}`);
  }

  /**
   * Fetch with timeout using AbortController
   */
  private async fetchWithTimeout(url: string, options: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      return await this.config.fetchFn(url, {
        ...options,
        signal: controller.signal,
      });
    } catch (err) {
      if (err instanceof HttpError) throw err;
      throw new TransientFetchError(`[${this.platform}] Request to ${url} failed: ${errorMessage(err)}`, {
        cause: err,
      });
    } finally {
      clearTimeout(timeout);
    }
  }
}
