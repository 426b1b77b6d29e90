/**
 * Metaculus API client
 *
 * The adapter only talks to the `MetaculusClient` interface; tests pass an
 * in-process implementation.
 */

import { z } from 'zod';
import {
  HttpError,
  ParseError,
  TransientFetchError,
  errorMessage,
  parseRetryAfter,
  sleep,
  withRetry,
} from '@question-pool/core';

const METACULUS_API_BASE = 'https://www.metaculus.com/api';
const METACULUS_SITE = 'https://www.metaculus.com';

/**
 * Question fields the pool reads, flattened out of a post
 */
export interface MetaculusQuestion {
  id: number;
  title: string;
  url: string;
  type: string;
  status: string;
  publishedAt: string | null;
  scheduledResolveTime: string | null;
  nForecasters: number | null;
  /** Latest recency-weighted community median; null before the first forecasts */
  communityPrediction: number | null;
}

export interface MetaculusClient {
  listQuestions(): Promise<MetaculusQuestion[]>;
}

const postSchema = z.object({
  id: z.number(),
  title: z.string(),
  published_at: z.string().nullish(),
  nr_forecasters: z.number().nullish(),
  question: z
    .object({
      type: z.string(),
      status: z.string().nullish(),
      scheduled_resolve_time: z.string().nullish(),
      aggregations: z
        .object({
          recency_weighted: z
            .object({
              latest: z.object({ centers: z.array(z.number()).nullish() }).nullish(),
            })
            .nullish(),
        })
        .nullish(),
    })
    .nullish(),
});

const postsPageSchema = z.object({
  results: z.array(z.unknown()),
  next: z.string().nullish(),
});

type MetaculusPost = z.infer<typeof postSchema>;

/**
 * Flatten a post; group and conditional posts carry no single question
 */
export function postToQuestion(post: MetaculusPost): MetaculusQuestion | null {
  const question = post.question;
  if (!question) return null;

  return {
    id: post.id,
    title: post.title,
    url: `${METACULUS_SITE}/questions/${post.id}/`,
    type: question.type,
    status: question.status ?? 'unknown',
    publishedAt: post.published_at ?? null,
    scheduledResolveTime: question.scheduled_resolve_time ?? null,
    nForecasters: post.nr_forecasters ?? null,
    communityPrediction: question.aggregations?.recency_weighted?.latest?.centers?.[0] ?? null,
  };
}

export interface MetaculusApiClientOptions {
  token?: string;
  baseUrl?: string;
  pageSize?: number;
  maxPages?: number;
  pageDelayMs?: number;
  timeoutMs?: number;
  maxAttempts?: number;
  fetchFn?: typeof fetch;
}

/**
 * REST client for `/api/posts/`, open binary questions, offset paged
 */
export class MetaculusApiClient implements MetaculusClient {
  private readonly baseUrl: string;
  private readonly pageSize: number;
  private readonly maxPages: number;
  private readonly pageDelayMs: number;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly fetchFn: typeof fetch;

  constructor(private readonly options: MetaculusApiClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? METACULUS_API_BASE).replace(/\/+$/, '');
    this.pageSize = options.pageSize ?? 100;
    this.maxPages = options.maxPages ?? 50;
    this.pageDelayMs = options.pageDelayMs ?? 100;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async listQuestions(): Promise<MetaculusQuestion[]> {
    const questions: MetaculusQuestion[] = [];

    for (let page = 1; page <= this.maxPages; page++) {
      const offset = (page - 1) * this.pageSize;
      let body: z.infer<typeof postsPageSchema>;
      try {
        body = await this.fetchPage(offset);
      } catch (err) {
        if (page === 1) throw err;
        console.warn(`[metaculus] Offset ${offset} unavailable, stopping: ${errorMessage(err)}`);
        break;
      }

      for (const item of body.results) {
        const post = postSchema.safeParse(item);
        if (!post.success) {
          console.warn(`[metaculus] Skipping malformed post: ${post.error.issues[0]?.message ?? 'invalid'}`);
          continue;
        }
        const question = postToQuestion(post.data);
        if (question) questions.push(question);
      }

      if (!body.next || body.results.length === 0) break;
      await sleep(this.pageDelayMs);
    }

    return questions;
  }

  private async fetchPage(offset: number): Promise<z.infer<typeof postsPageSchema>> {
    const url = new URL(`${this.baseUrl}/posts/`);
    url.searchParams.set('statuses', 'open');
    url.searchParams.set('forecast_type', 'binary');
    url.searchParams.set('order_by', '-published_at');
    url.searchParams.set('limit', String(this.pageSize));
    url.searchParams.set('offset', String(offset));

    const data = await withRetry(() => this.getJson(url.toString()), {
      maxAttempts: this.maxAttempts,
      baseDelayMs: 1000,
      onRetry: (err, attempt) => {
        console.warn(`[metaculus] Retry ${attempt}: ${err.message}`);
      },
    });

    const parsed = postsPageSchema.safeParse(data);
    if (!parsed.success) {
      throw new ParseError(`[metaculus] Unexpected posts page at offset ${offset}`);
    }
    return parsed.data;
  }

  private async getJson(url: string): Promise<unknown> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.options.token) {
      headers.Authorization = `Token ${this.options.token}`;
    }

    let response: Response;
    try {
      response = await this.fetchFn(url, { headers, signal: controller.signal });
    } catch (err) {
      throw new TransientFetchError(`[metaculus] Request to ${url} failed: ${errorMessage(err)}`, { cause: err });
    } finally {
      clearTimeout(timeout);
    }

    if (!response.ok) {
      throw new HttpError(
        `[metaculus] ${response.status} ${response.statusText} from ${url}`,
        response.status,
        parseRetryAfter(response.headers.get('Retry-After'))
      );
    }

    try {
      const json: unknown = await response.json();
      return json;
    } catch (err) {
      throw new ParseError(`[metaculus] Invalid JSON from ${url}: ${errorMessage(err)}`, { cause: err });
    }
  }
}
