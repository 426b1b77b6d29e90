/**
 * Embedding provider client
 *
 * Speaks the OpenAI-compatible embeddings API:
 *   POST {baseUrl}/embeddings { model, input: string[], encoding_format: "float" }
 *   -> { data: [{ index, embedding: number[] }] }
 */

import { z } from 'zod';
import {
  HttpError,
  ProviderContractError,
  parseRetryAfter,
  requireEmbeddingToken,
  withRetry,
  type EmbeddingConfig,
} from '@question-pool/core';

export interface EmbeddingProvider {
  readonly model: string;
  readonly dimension: number;
  /** One vector per input text, in input order */
  embed(texts: readonly string[]): Promise<number[][]>;
}

export interface OpenAICompatibleProviderOptions {
  apiToken: string;
  baseUrl: string;
  model: string;
  dimension: number;
  timeoutMs?: number;
  maxAttempts?: number;
  /** Injected for tests */
  fetchFn?: typeof fetch;
}

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      embedding: z.array(z.number()),
    })
  ),
});

export class OpenAICompatibleEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  readonly dimension: number;
  private readonly endpoint: string;
  private readonly apiToken: string;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly fetchFn: typeof fetch;

  constructor(options: OpenAICompatibleProviderOptions) {
    this.model = options.model;
    this.dimension = options.dimension;
    this.endpoint = `${options.baseUrl.replace(/\/+$/, '')}/embeddings`;
    this.apiToken = options.apiToken;
    this.timeoutMs = options.timeoutMs ?? 60000;
    this.maxAttempts = options.maxAttempts ?? 3;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  /**
   * Throws ConfigurationError when the provider token is not configured
   */
  static fromConfig(config: EmbeddingConfig, fetchFn?: typeof fetch): OpenAICompatibleEmbeddingProvider {
    return new OpenAICompatibleEmbeddingProvider({
      apiToken: requireEmbeddingToken(config),
      baseUrl: config.baseUrl,
      model: config.model,
      dimension: config.dimension,
      timeoutMs: config.timeoutMs,
      fetchFn,
    });
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    const body = await withRetry(() => this.request(texts), {
      maxAttempts: this.maxAttempts,
      baseDelayMs: 1000,
      maxDelayMs: 30000,
      onRetry: (err, attempt, delayMs) => {
        console.warn(`[embeddings] Retry ${attempt} in ${delayMs}ms: ${err.message}`);
      },
    });

    const parsed = embeddingResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderContractError(`Unexpected embeddings response: ${parsed.error.message}`);
    }

    const items = [...parsed.data.data].sort((a, b) => a.index - b.index);
    if (items.length !== texts.length) {
      throw new ProviderContractError(`Requested ${texts.length} embeddings, received ${items.length}`);
    }
    items.forEach((item, i) => {
      if (item.index !== i) {
        throw new ProviderContractError(`Embeddings response has index ${item.index} at position ${i}`);
      }
    });
    return items.map((item) => item.embedding);
  }

  private async request(texts: readonly string[]): Promise<unknown> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchFn(this.endpoint, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.apiToken}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ model: this.model, input: texts, encoding_format: 'float' }),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new HttpError(
          `Embeddings API error: ${response.status} ${response.statusText}`,
          response.status,
          parseRetryAfter(response.headers.get('Retry-After'))
        );
      }
      const json: unknown = await response.json();
      return json;
    } finally {
      clearTimeout(timeout);
    }
  }
}
