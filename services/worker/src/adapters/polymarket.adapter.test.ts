/**
 * Unit tests for polymarket.adapter.ts
 * Run with: npx tsx --test services/worker/src/adapters/polymarket.adapter.test.ts
 */
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { mergeFilter } from '@question-pool/core';
import {
  PolymarketAdapter,
  alignPrices,
  classifyMarketType,
  decodeJsonList,
  type GammaMarket,
} from './polymarket.adapter.js';
import { withAdapterSession } from './types.js';
import { createFakeFetch } from '../testing/fake-fetch.js';

const BASE = 'https://gamma.test';

const MARKET_A: GammaMarket = {
  id: '501',
  question: 'Will A win?',
  slug: 'will-a-win',
  outcomes: '["Yes", "No"]',
  outcomePrices: '["0.75", "0.25"]',
  volume: '20000',
  createdAt: '2024-05-01T00:00:00Z',
  closed: false,
};

const MARKET_C: GammaMarket = {
  id: 503,
  question: 'Who will win C?',
  outcomes: ['Trump', 'Harris', 'Other'],
  outcomePrices: ['0.5', '0.25'],
  volume: null,
  volumeNum: 15000,
  createdAt: '2024-05-03T12:00:00.123Z',
  closed: false,
};

const PAGES: Record<string, unknown[]> = {
  '0': [MARKET_A, { ...MARKET_A, id: '502', question: 'Will B win?', volume: '500' }],
  '2': [MARKET_C, { ...MARKET_A, id: '504', question: 'Did D win?', volume: '50000', closed: true }],
};

function adapterFor(fetchFn: typeof fetch): PolymarketAdapter {
  return new PolymarketAdapter({ baseUrl: BASE, fetchFn, maxAttempts: 1, pageSize: 2, pageDelayMs: 0 });
}

class PacedPolymarketAdapter extends PolymarketAdapter {
  readonly delays: number[] = [];

  protected override async delay(ms: number): Promise<void> {
    this.delays.push(ms);
  }
}

describe('PolymarketAdapter', () => {
  it('should walk offsets until an empty page and apply the filter', async () => {
    const fake = createFakeFetch((req) => Response.json(PAGES[req.url.searchParams.get('offset') ?? ''] ?? []));
    const adapter = adapterFor(fake.fetchFn);

    const raws = await withAdapterSession(adapter, (a) => a.fetchMarkets(adapter.defaultFilter));

    assert.deepEqual(
      raws.map((m) => m.id),
      ['501', 503]
    );
    assert.deepEqual(
      fake.requests.map((r) => r.url.searchParams.get('offset')),
      ['0', '2', '4']
    );
    assert.equal(fake.requests[0].url.searchParams.get('closed'), 'false');
    assert.equal(fake.requests[0].url.searchParams.get('limit'), '2');
  });

  it('should pause between list pages by default', async () => {
    const fake = createFakeFetch((req) => Response.json(PAGES[req.url.searchParams.get('offset') ?? ''] ?? []));
    const adapter = new PacedPolymarketAdapter({ baseUrl: BASE, fetchFn: fake.fetchFn, maxAttempts: 1, pageSize: 2 });

    await withAdapterSession(adapter, (a) => a.fetchMarkets(adapter.defaultFilter));

    assert.equal(fake.requests.length, 3);
    assert.deepEqual(adapter.delays, [500, 500]);
  });

  it('should use volumeNum when volume is zero', async () => {
    const market: GammaMarket = { ...MARKET_A, id: '505', volume: '0', volumeNum: 25000 };
    const fake = createFakeFetch(() => Response.json([market]));
    const adapter = adapterFor(fake.fetchFn);

    const raws = await withAdapterSession(adapter, (a) => a.fetchMarkets(adapter.defaultFilter));

    assert.deepEqual(
      raws.map((m) => m.id),
      ['505']
    );
    assert.equal(adapter.toPooledMarket(market).volume, 25000);
  });

  it('should stop after a short page', async () => {
    const fake = createFakeFetch(() => Response.json([MARKET_A]));
    const adapter = adapterFor(fake.fetchFn);

    await withAdapterSession(adapter, (a) => a.fetchMarkets(adapter.defaultFilter));
    assert.equal(fake.requests.length, 1);
  });

  it('should keep closed markets when asked to', async () => {
    const fake = createFakeFetch((req) => Response.json(PAGES[req.url.searchParams.get('offset') ?? ''] ?? []));
    const adapter = adapterFor(fake.fetchFn);

    const raws = await withAdapterSession(adapter, (a) =>
      a.fetchMarkets(mergeFilter(adapter.defaultFilter, { onlyOpen: false }))
    );

    assert.deepEqual(
      raws.map((m) => m.id),
      ['501', 503, '504']
    );
    assert.equal(fake.requests[0].url.searchParams.get('closed'), null);
  });

  it('should convert JSON-string outcomes', () => {
    const pooled = adapterFor(fetch).toPooledMarket(MARKET_A);

    assert.equal(pooled.id, 'polymarket_501');
    assert.deepEqual(pooled.outcomes, ['Yes', 'No']);
    assert.deepEqual(pooled.outcomeProbabilities, [0.75, 0.25]);
    assert.equal(pooled.url, 'https://polymarket.com/event/will-a-win');
    assert.equal(pooled.volume, 20000);
    assert.equal(pooled.originalMarketType, 'BINARY');
    assert.equal(pooled.isResolved, false);
    assert.equal(pooled.publishedAt?.toISOString(), '2024-05-01T00:00:00.000Z');
  });

  it('should pad missing prices and fall back for volume and url', () => {
    const pooled = adapterFor(fetch).toPooledMarket(MARKET_C);

    assert.deepEqual(pooled.outcomeProbabilities, [0.5, 0.25, null]);
    assert.equal(pooled.formattedOutcomes, 'Trump: 50.0%; Harris: 25.0%; Other: N/A');
    assert.equal(pooled.url, '');
    assert.equal(pooled.volume, 15000);
    assert.equal(pooled.originalMarketType, 'CATEGORICAL');
  });
});

describe('polymarket helpers', () => {
  it('decodeJsonList should accept arrays and JSON strings', () => {
    assert.deepEqual(decodeJsonList(['a']), ['a']);
    assert.deepEqual(decodeJsonList('["a","b"]'), ['a', 'b']);
    assert.deepEqual(decodeJsonList('not json'), []);
    assert.deepEqual(decodeJsonList('{"a":1}'), []);
    assert.deepEqual(decodeJsonList(null), []);
  });

  it('alignPrices should truncate and pad', () => {
    assert.deepEqual(alignPrices(2, ['0.1', '0.2', '0.3']), [0.1, 0.2]);
    assert.deepEqual(alignPrices(3, [0.5, 'x']), [0.5, null, null]);
  });

  it('classifyMarketType should prefer the category', () => {
    assert.equal(classifyMarketType(['Yes', 'No'], 'Sports'), 'Sports');
    assert.equal(classifyMarketType(['True', 'False'], null), 'BINARY');
    assert.equal(classifyMarketType(['Up', 'Down'], null), 'CATEGORICAL');
    assert.equal(classifyMarketType(['Yes'], undefined), 'UNKNOWN');
  });
});
