/**
 * Unit tests for market.ts
 * Run with: npx tsx --test packages/core/src/market.test.ts
 */
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createPooledMarket, formatOutcomes, withoutRaw } from './market.js';
import { ParseError } from './errors.js';
import type { PooledMarketInput } from './types.js';

function input(overrides: Partial<PooledMarketInput> = {}): PooledMarketInput {
  return {
    platform: 'gjopen',
    nativeId: 123,
    question: 'Will it rain in Lisbon tomorrow?',
    outcomes: ['Yes', 'No'],
    outcomeProbabilities: [0.7, 0.3],
    url: 'https://example.com/questions/123',
    publishedAt: new Date('2024-01-01T00:00:00Z'),
    ...overrides,
  };
}

describe('formatOutcomes', () => {
  it('should render percentages with one decimal', () => {
    assert.equal(formatOutcomes(['Yes', 'No'], [0.7, 0.3]), 'Yes: 70.0%; No: 30.0%');
    assert.equal(formatOutcomes(['A', 'B', 'C'], [0.125, 0.5, 0.375]), 'A: 12.5%; B: 50.0%; C: 37.5%');
  });

  it('should render unknown probabilities as N/A instead of dropping them', () => {
    assert.equal(formatOutcomes(['Yes', 'No'], [null, 0.25]), 'Yes: N/A; No: 25.0%');
  });

  it('should strip line breaks and surrounding whitespace from labels', () => {
    assert.equal(formatOutcomes([' Before\r\n2025 '], [0.5]), 'Before2025: 50.0%');
  });

  it('should return N/A when there are no outcomes', () => {
    assert.equal(formatOutcomes([], []), 'N/A');
  });
});

describe('createPooledMarket', () => {
  it('should prefix the id with the platform and derive formatted outcomes', () => {
    const market = createPooledMarket(input());
    assert.equal(market.id, 'gjopen_123');
    assert.equal(market.sourcePlatform, 'GJOpen');
    assert.equal(market.formattedOutcomes, 'Yes: 70.0%; No: 30.0%');
    assert.equal(market.volume, null);
    assert.equal(market.isResolved, null);
  });

  it('should trim the question', () => {
    const market = createPooledMarket(input({ question: '  Will it rain?\n' }));
    assert.equal(market.question, 'Will it rain?');
  });

  it('should reject mismatched outcome and probability lengths', () => {
    assert.throws(() => createPooledMarket(input({ outcomeProbabilities: [0.5] })), ParseError);
  });

  it('should reject empty questions and ids', () => {
    assert.throws(() => createPooledMarket(input({ question: '   ' })), ParseError);
    assert.throws(() => createPooledMarket(input({ nativeId: '' })), ParseError);
  });

  it('should reject non-finite probabilities and negative counts', () => {
    assert.throws(() => createPooledMarket(input({ outcomeProbabilities: [Number.NaN, 0.5] })), ParseError);
    assert.throws(() => createPooledMarket(input({ nForecasters: -1 })), ParseError);
  });

  it('should not share the outcome arrays with the input', () => {
    const fields = input();
    const market = createPooledMarket(fields);
    fields.outcomes.push('Maybe');
    assert.deepEqual(market.outcomes, ['Yes', 'No']);
  });
});

describe('withoutRaw', () => {
  it('should drop the source back-reference', () => {
    const market = createPooledMarket(input({ raw: { secret: true } }));
    const stripped = withoutRaw(market);
    assert.equal('raw' in stripped, false);
    assert.equal(stripped.id, 'gjopen_123');
  });
});
