/**
 * Unit tests for aggregate.ts
 * Run with: npx tsx --test services/worker/src/pipeline/aggregate.test.ts
 */
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  AdapterAuthError,
  DEFAULT_MARKET_FILTER,
  TransientFetchError,
  createPooledMarket,
  sleep,
  type MarketFilter,
  type Platform,
  type PooledMarket,
} from '@question-pool/core';
import type { SourceAdapter } from '../adapters/index.js';
import { aggregateMarkets } from './aggregate.js';

interface FakeRecord {
  id: string;
  question: string;
  publishedAt: Date | null;
}

interface FakeAdapterOptions {
  records?: FakeRecord[];
  delayMs?: number;
  fetchError?: Error;
  openError?: Error;
  events?: string[];
}

class FakeAdapter implements SourceAdapter<FakeRecord> {
  readonly defaultFilter: MarketFilter = DEFAULT_MARKET_FILTER;
  receivedFilter: MarketFilter | null = null;
  closed = false;

  constructor(
    readonly platform: Platform,
    private readonly options: FakeAdapterOptions = {}
  ) {}

  async open(): Promise<void> {
    this.options.events?.push(`open:${this.platform}`);
    if (this.options.openError) throw this.options.openError;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  async fetchMarkets(filter: MarketFilter): Promise<FakeRecord[]> {
    this.receivedFilter = filter;
    await sleep(this.options.delayMs ?? 0);
    this.options.events?.push(`done:${this.platform}`);
    if (this.options.fetchError) throw this.options.fetchError;
    return this.options.records ?? [];
  }

  toPooledMarket(raw: FakeRecord): PooledMarket {
    return createPooledMarket({
      platform: this.platform,
      nativeId: raw.id,
      question: raw.question,
      outcomes: ['Yes', 'No'],
      outcomeProbabilities: [0.5, 0.5],
      url: '',
      publishedAt: raw.publishedAt,
    });
  }
}

function record(id: string, question: string, publishedAt: string | null): FakeRecord {
  return { id, question, publishedAt: publishedAt === null ? null : new Date(publishedAt) };
}

describe('aggregateMarkets', () => {
  it('should merge two sources into unique questions, newest first', async () => {
    const first = new FakeAdapter('manifold', {
      records: [record('1', 'Will X happen?', '2024-01-01T00:00:00Z'), record('2', 'Will Y happen?', '2024-02-01T00:00:00Z')],
    });
    const second = new FakeAdapter('polymarket', {
      delayMs: 20,
      records: [record('3', 'Will X happen?', '2024-03-01T00:00:00Z')],
    });

    const result = await aggregateMarkets([first, second]);

    assert.equal(result.markets.length, 2);
    assert.deepEqual(
      result.markets.map((m) => m.id),
      ['manifold_2', 'manifold_1']
    );
    assert.equal(result.markets.filter((m) => m.question === 'Will X happen?').length, 1);
    assert.equal(result.duplicatesDropped, 1);
  });

  it('should keep the first arrival when the later adapter finishes first', async () => {
    const slow = new FakeAdapter('manifold', {
      delayMs: 20,
      records: [record('1', 'Will X happen?', '2024-01-01T00:00:00Z')],
    });
    const fast = new FakeAdapter('polymarket', {
      records: [record('3', 'Will X happen?', '2024-03-01T00:00:00Z')],
    });

    const result = await aggregateMarkets([slow, fast]);

    assert.deepEqual(
      result.markets.map((m) => m.id),
      ['polymarket_3']
    );
    assert.deepEqual(
      result.reports.map((r) => r.platform),
      ['manifold', 'polymarket']
    );
  });

  it('should start every adapter before any finishes', async () => {
    const events: string[] = [];
    await aggregateMarkets([
      new FakeAdapter('manifold', { delayMs: 20, events }),
      new FakeAdapter('polymarket', { delayMs: 20, events }),
    ]);

    assert.deepEqual(events.slice(0, 2), ['open:manifold', 'open:polymarket']);
  });

  it('should isolate failing sources', async () => {
    const auth = new FakeAdapter('gjopen', { openError: new AdapterAuthError('[gjopen] Login failed') });
    const down = new FakeAdapter('predictit', { fetchError: new TransientFetchError('[predictit] 503') });
    const good = new FakeAdapter('metaculus', {
      records: [record('101', 'Will event 101 happen?', '2024-01-15T10:00:00Z')],
    });

    const result = await aggregateMarkets([auth, down, good]);

    assert.deepEqual(
      result.markets.map((m) => m.id),
      ['metaculus_101']
    );
    assert.deepEqual(
      result.reports.map(({ platform, ok, errorKind, message }) => ({ platform, ok, errorKind, message })),
      [
        { platform: 'gjopen', ok: false, errorKind: 'adapter-auth', message: '[gjopen] Login failed' },
        { platform: 'predictit', ok: false, errorKind: 'transient-fetch', message: '[predictit] 503' },
        { platform: 'metaculus', ok: true, errorKind: undefined, message: undefined },
      ]
    );
    assert.equal(auth.closed, true);
    assert.equal(down.closed, true);
  });

  it('should return an empty result when every source fails', async () => {
    const result = await aggregateMarkets([
      new FakeAdapter('gjopen', { fetchError: new Error('boom') }),
      new FakeAdapter('manifold', { fetchError: new TransientFetchError('down') }),
    ]);

    assert.deepEqual(result.markets, []);
    assert.deepEqual(
      result.reports.map((r) => [r.ok, r.errorKind]),
      [
        [false, 'unknown'],
        [false, 'transient-fetch'],
      ]
    );
  });

  it('should skip records that fail conversion', async () => {
    const adapter = new FakeAdapter('manifold', {
      records: [record('1', '   ', null), record('2', 'Will Y happen?', null)],
    });

    const result = await aggregateMarkets([adapter]);

    assert.deepEqual(
      result.markets.map((m) => m.id),
      ['manifold_2']
    );
    const [report] = result.reports;
    assert.equal(report.fetched, 2);
    assert.equal(report.converted, 1);
    assert.equal(report.skipped, 1);
    assert.equal(report.ok, true);
  });

  it('should put unknown and invalid timestamps last', async () => {
    const adapter = new FakeAdapter('polymarket', {
      records: [
        record('a', 'Unknown time?', null),
        { id: 'b', question: 'Broken time?', publishedAt: new Date('not a date') },
        record('c', 'Older?', '2023-05-01T00:00:00Z'),
        record('d', 'Newer?', '2024-05-01T00:00:00+02:00'),
      ],
    });

    const result = await aggregateMarkets([adapter]);

    assert.deepEqual(
      result.markets.map((m) => [m.id, m.publishedAt?.toISOString() ?? null]),
      [
        ['polymarket_d', '2024-04-30T22:00:00.000Z'],
        ['polymarket_c', '2023-05-01T00:00:00.000Z'],
        ['polymarket_a', null],
        ['polymarket_b', null],
      ]
    );
    assert.equal(result.invalidTimestamps, 1);
  });

  it('should merge global and per-platform filter overrides over the defaults', async () => {
    const adapter = new FakeAdapter('manifold');

    await aggregateMarkets([adapter], {
      filter: { onlyOpen: false, minForecasters: 1 },
      filters: { manifold: { minForecasters: 5 } },
    });

    assert.deepEqual(adapter.receivedFilter, {
      minForecasters: 5,
      minComments: 0,
      minVolume: 0,
      onlyOpen: false,
    });
  });

  it('should handle no adapters', async () => {
    const result = await aggregateMarkets([]);
    assert.deepEqual(result, { markets: [], reports: [], duplicatesDropped: 0, invalidTimestamps: 0 });
  });
});
