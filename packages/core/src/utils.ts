import { createHash } from 'node:crypto';
import { HttpError } from './errors.js';

/**
 * Content address of a text: sha256 hex of the trimmed string
 */
export function hashText(text: string): string {
  return createHash('sha256').update(text.trim(), 'utf8').digest('hex');
}

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Check if an error is retriable
 * Retriable: 429, 408, 5xx, network errors, timeouts
 */
export function isRetriableError(error: unknown): boolean {
  if (error instanceof HttpError) {
    const { statusCode } = error;
    // 429 Too Many Requests, 408 Request Timeout, 5xx Server Errors
    return statusCode === 429 || statusCode === 408 || statusCode >= 500;
  }

  if (error instanceof Error) {
    const msg = error.message.toLowerCase();
    // Network errors
    if (
      msg.includes('network') ||
      msg.includes('econnreset') ||
      msg.includes('econnrefused') ||
      msg.includes('etimedout') ||
      msg.includes('socket hang up') ||
      msg.includes('fetch failed') ||
      msg.includes('timeout') ||
      msg.includes('abort')
    ) {
      return true;
    }
  }

  return false;
}

/**
 * Parse Retry-After header value
 * Can be seconds (integer) or HTTP-date
 * Returns delay in seconds, or undefined if invalid
 */
export function parseRetryAfter(value: string | null | undefined): number | undefined {
  if (!value) return undefined;

  const seconds = parseInt(value, 10);
  if (!isNaN(seconds) && seconds > 0) {
    return seconds;
  }

  const date = Date.parse(value);
  if (!isNaN(date)) {
    const delayMs = date - Date.now();
    return delayMs > 0 ? Math.ceil(delayMs / 1000) : undefined;
  }

  return undefined;
}

/**
 * Calculate delay with exponential backoff + jitter
 */
export function calculateBackoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number
): number {
  // Exponential backoff: base * 2^(attempt-1)
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);
  // Add jitter: random 0-25% of delay
  const jitter = cappedDelay * Math.random() * 0.25;
  return Math.floor(cappedDelay + jitter);
}

export interface RetryOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
  shouldRetry?: (error: unknown) => boolean;
}

/**
 * Retry a function with exponential backoff + jitter
 * Respects Retry-After header if present
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxAttempts = 5,
    baseDelayMs = 1000,
    maxDelayMs = 60000,
    onRetry,
    shouldRetry = isRetriableError,
  } = options;

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt >= maxAttempts || !shouldRetry(error)) {
        break;
      }

      let delayMs: number;
      if (error instanceof HttpError && error.retryAfter) {
        delayMs = Math.min(error.retryAfter * 1000, maxDelayMs);
      } else {
        delayMs = calculateBackoffDelay(attempt, baseDelayMs, maxDelayMs);
      }

      if (onRetry) {
        onRetry(error instanceof Error ? error : new Error(String(error)), attempt, delayMs);
      }

      await sleep(delayMs);
    }
  }

  throw lastError;
}

/**
 * Batch array into chunks
 */
export function batch<T>(items: readonly T[], size: number): T[][] {
  if (size < 1) {
    throw new RangeError(`batch size must be >= 1, got ${size}`);
  }
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

/**
 * Format duration in human-readable format
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}

/**
 * Parse a number from loosely typed API values ("12.5", 12.5, null)
 * Returns null when the value is absent or not a finite number
 */
export function toFiniteNumber(value: unknown): number | null {
  let n: number;
  if (typeof value === 'number') {
    n = value;
  } else if (typeof value === 'string' && value.trim() !== '') {
    n = Number(value);
  } else {
    return null;
  }
  return Number.isFinite(n) ? n : null;
}
