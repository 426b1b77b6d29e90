import {
  compareNewestFirst,
  describeError,
  errorMessage,
  formatDuration,
  mergeFilter,
  normalizeToUtc,
  type ErrorKind,
  type MarketFilter,
  type Platform,
  type PooledMarket,
} from '@question-pool/core';
import { withAdapterSession, type SourceAdapter } from '../adapters/index.js';

export interface AggregateOptions {
  /** Per-platform overrides merged over each adapter's default filter */
  filters?: Partial<Record<Platform, Partial<MarketFilter>>>;
  /** Overrides applied to every adapter, below the per-platform ones */
  filter?: Partial<MarketFilter>;
}

export interface SourceReport {
  platform: Platform;
  ok: boolean;
  /** Raw records returned by the adapter */
  fetched: number;
  converted: number;
  /** Records whose conversion failed */
  skipped: number;
  errorKind?: ErrorKind;
  message?: string;
  durationMs: number;
}

export interface AggregateResult {
  /** Newest first, unknown publication time last */
  markets: PooledMarket[];
  /** One report per adapter, in adapter order */
  reports: SourceReport[];
  duplicatesDropped: number;
  /** Records whose timestamp could not be normalized and became unknown */
  invalidTimestamps: number;
}

interface SourceOutcome {
  markets: PooledMarket[];
  report: SourceReport;
}

/**
 * Session, fetch and convert for one adapter. Never throws: any failure
 * becomes an empty result with the error in the report.
 */
async function collectFromSource(adapter: SourceAdapter, filter: MarketFilter): Promise<SourceOutcome> {
  const start = Date.now();
  const report: SourceReport = {
    platform: adapter.platform,
    ok: true,
    fetched: 0,
    converted: 0,
    skipped: 0,
    durationMs: 0,
  };

  try {
    const markets = await withAdapterSession(adapter, async (session) => {
      const raws = await session.fetchMarkets(filter);
      report.fetched = raws.length;

      const converted: PooledMarket[] = [];
      for (const raw of raws) {
        try {
          converted.push(session.toPooledMarket(raw));
        } catch (err) {
          report.skipped++;
          console.warn(`[${adapter.platform}] Skipping record: ${errorMessage(err)}`);
        }
      }
      return converted;
    });

    report.converted = markets.length;
    report.durationMs = Date.now() - start;
    console.log(`[${adapter.platform}] ${markets.length} markets in ${formatDuration(report.durationMs)}`);
    return { markets, report };
  } catch (err) {
    const { kind, message } = describeError(err);
    report.ok = false;
    report.errorKind = kind;
    report.message = message;
    report.durationMs = Date.now() - start;
    console.error(`[${adapter.platform}] Failed (${kind}): ${message}`);
    return { markets: [], report };
  }
}

/**
 * Fetch every source concurrently and merge the results: duplicates by
 * question text dropped (first arrival wins), timestamps normalized to UTC,
 * newest first.
 */
export async function aggregateMarkets(
  adapters: readonly SourceAdapter[],
  options: AggregateOptions = {}
): Promise<AggregateResult> {
  const reports: SourceReport[] = [];
  const arrived: PooledMarket[][] = [];

  // Start every task before awaiting any; lists are appended as tasks finish
  const tasks = adapters.map((adapter, i) => {
    const filter = mergeFilter(
      mergeFilter(adapter.defaultFilter, options.filter),
      options.filters?.[adapter.platform]
    );
    return collectFromSource(adapter, filter).then((outcome) => {
      reports[i] = outcome.report;
      arrived.push(outcome.markets);
    });
  });
  await Promise.all(tasks);

  const seenQuestions = new Set<string>();
  const markets: PooledMarket[] = [];
  let duplicatesDropped = 0;
  let invalidTimestamps = 0;

  for (const market of arrived.flat()) {
    if (seenQuestions.has(market.question)) {
      duplicatesDropped++;
      continue;
    }
    seenQuestions.add(market.question);

    const publishedAt = normalizeToUtc(market.publishedAt);
    if (market.publishedAt && !publishedAt) {
      invalidTimestamps++;
    }
    markets.push({ ...market, publishedAt });
  }

  // sort is stable: equal timestamps keep arrival order
  markets.sort((a, b) => compareNewestFirst(a.publishedAt, b.publishedAt));

  const failed = reports.filter((r) => !r.ok).length;
  console.log(
    `[aggregate] ${markets.length} markets from ${adapters.length - failed}/${adapters.length} sources` +
      ` (${duplicatesDropped} duplicates dropped, ${invalidTimestamps} invalid timestamps)`
  );

  return { markets, reports, duplicatesDropped, invalidTimestamps };
}
