import { ParseError } from './errors.js';
import { type PooledMarket, type PooledMarketInput, PLATFORM_LABELS } from './types.js';

/** Marker rendered in place of an unknown probability */
export const NOT_AVAILABLE = 'N/A';

function cleanLabel(label: string): string {
  return label.replace(/[\r\n]/g, '').trim();
}

/**
 * Render outcome labels with their probabilities.
 *
 * `["Yes", "No"], [0.6, 0.4]` -> `"Yes: 60.0%; No: 40.0%"`.
 * An unknown probability is rendered as `"<label>: N/A"`, never dropped.
 */
export function formatOutcomes(outcomes: readonly string[], probabilities: ReadonlyArray<number | null>): string {
  if (outcomes.length === 0) {
    return NOT_AVAILABLE;
  }

  return outcomes
    .map((label, i) => {
      const p = probabilities[i];
      const rendered = p === null || p === undefined ? NOT_AVAILABLE : `${(p * 100).toFixed(1)}%`;
      return `${cleanLabel(label)}: ${rendered}`;
    })
    .join('; ');
}

/**
 * Platform-prefixed market id
 */
export function pooledMarketId(platform: PooledMarketInput['platform'], nativeId: string | number): string {
  return `${platform}_${nativeId}`;
}

function optionalCount(field: string, value: number | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  if (!Number.isFinite(value) || value < 0) {
    throw new ParseError(`${field} must be a non-negative number, got ${value}`);
  }
  return value;
}

/**
 * Assemble a canonical record from already-parsed platform fields.
 * Throws ParseError when the record breaks a canonical invariant.
 */
export function createPooledMarket(input: PooledMarketInput): PooledMarket {
  const nativeId = String(input.nativeId).trim();
  if (nativeId.length === 0) {
    throw new ParseError(`[${input.platform}] market without native id`);
  }

  const question = input.question.trim();
  if (question.length === 0) {
    throw new ParseError(`[${input.platform}] market ${nativeId} has an empty question`);
  }

  if (input.outcomes.length !== input.outcomeProbabilities.length) {
    throw new ParseError(
      `[${input.platform}] market ${nativeId}: ${input.outcomes.length} outcomes but ${input.outcomeProbabilities.length} probabilities`
    );
  }

  const outcomeProbabilities = input.outcomeProbabilities.map((p) => {
    if (p === null) return null;
    if (!Number.isFinite(p)) {
      throw new ParseError(`[${input.platform}] market ${nativeId} has a non-finite probability`);
    }
    return p;
  });
  const outcomes = [...input.outcomes];

  return {
    id: pooledMarketId(input.platform, nativeId),
    question,
    outcomes,
    outcomeProbabilities,
    formattedOutcomes: formatOutcomes(outcomes, outcomeProbabilities),
    url: input.url,
    publishedAt: input.publishedAt,
    sourcePlatform: PLATFORM_LABELS[input.platform],
    volume: optionalCount('volume', input.volume),
    nForecasters: optionalCount('nForecasters', input.nForecasters),
    commentsCount: optionalCount('commentsCount', input.commentsCount),
    originalMarketType: input.originalMarketType ?? null,
    isResolved: input.isResolved ?? null,
    raw: input.raw,
  };
}

/**
 * Copy of a record without the source back-reference
 */
export function withoutRaw(market: PooledMarket): Omit<PooledMarket, 'raw'> {
  const { raw: _raw, ...rest } = market;
  return rest;
}
