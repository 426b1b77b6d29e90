/**
 * Error taxonomy
 *
 * Each class carries a `kind` discriminant so layers that isolate failures
 * (orchestrator, cache bootstrap) can report what happened without
 * `instanceof` chains.
 */

export type ErrorKind =
  | 'configuration'
  | 'adapter-auth'
  | 'transient-fetch'
  | 'parse'
  | 'cache-io'
  | 'crypto'
  | 'provider-contract'
  | 'unknown';

export abstract class PoolError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or malformed secret / credential. Raised before any I/O. */
export class ConfigurationError extends PoolError {
  readonly kind = 'configuration' as const;
}

/** Login handshake rejected by a source */
export class AdapterAuthError extends PoolError {
  readonly kind = 'adapter-auth' as const;
}

/** Network or HTTP failure */
export class TransientFetchError extends PoolError {
  readonly kind: ErrorKind = 'transient-fetch';
}

/**
 * HTTP error with status code and optional Retry-After
 */
export class HttpError extends TransientFetchError {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly retryAfter?: number // seconds
  ) {
    super(message);
  }
}

/** Malformed record or payload */
export class ParseError extends PoolError {
  readonly kind = 'parse' as const;
}

/** Local cache artifact missing, unreadable or corrupt */
export class CacheIOError extends PoolError {
  readonly kind = 'cache-io' as const;
}

/** Decryption failed: wrong key, tampered or truncated token */
export class CryptoError extends PoolError {
  readonly kind = 'crypto' as const;
}

/** Embedding provider returned the wrong number or shape of vectors */
export class ProviderContractError extends PoolError {
  readonly kind = 'provider-contract' as const;
}

export function errorKind(error: unknown): ErrorKind {
  return error instanceof PoolError ? error.kind : 'unknown';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Summarize any thrown value for run reports
 */
export function describeError(error: unknown): { kind: ErrorKind; message: string } {
  return { kind: errorKind(error), message: errorMessage(error) };
}
