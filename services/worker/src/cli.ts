#!/usr/bin/env node

import 'dotenv/config';
import { Command } from 'commander';
import { PLATFORMS, describeError, formatPoolConfig, isPlatform, loadPoolConfig, type Platform } from '@question-pool/core';
import { DEFAULT_MARKETS_OUTPUT, runFetchMarkets, runKeygen, runListSources, runUpdateEmbeddings } from './commands/index.js';

const program = new Command();

/**
 * Parse a comma-separated platform list, rejecting unknown names
 */
function parsePlatforms(value: string): Platform[] {
  const names = value
    .split(',')
    .map((s) => s.trim().toLowerCase())
    .filter((s) => s.length > 0);
  const unknown = names.filter((name) => !isPlatform(name));
  if (unknown.length > 0) {
    console.error(`Invalid source(s): ${unknown.join(', ')}. Supported: ${PLATFORMS.join(', ')}`);
    process.exit(1);
  }
  return names.filter(isPlatform);
}

function fail(label: string, error: unknown): never {
  const { kind, message } = describeError(error);
  console.error(`${label} error (${kind}): ${message}`);
  process.exit(1);
}

program
  .name('question-pool')
  .description('Pool forecasting questions from prediction markets into an encrypted snapshot')
  .version('0.1.0');

interface FetchCliOptions {
  sources: string;
  output: string;
  includeClosed: boolean;
}

// Fetch command
program
  .command('fetch')
  .description('Fetch markets from every source and write the encrypted snapshot')
  .option('-s, --sources <list>', 'Comma-separated sources', PLATFORMS.join(','))
  .option('-o, --output <path>', 'Snapshot path (<name>.<parquet|csv>.encrypted)', DEFAULT_MARKETS_OUTPUT)
  .option('--include-closed', 'Keep closed and resolved markets', false)
  .action(async (opts: FetchCliOptions) => {
    console.log(formatPoolConfig(loadPoolConfig()));

    try {
      const result = await runFetchMarkets({
        platforms: parsePlatforms(opts.sources),
        output: opts.output,
        includeClosed: opts.includeClosed,
      });

      for (const report of result.aggregate.reports) {
        const status = report.ok ? `${report.converted} markets` : `FAILED (${report.errorKind}): ${report.message}`;
        console.log(`  ${report.platform.padEnd(12)} ${status}`);
      }

      if (!result.ok) {
        process.exit(1);
      }
    } catch (error) {
      fail('Fetch', error);
    }
  });

interface EmbedCliOptions {
  snapshot: string;
  cache?: string;
  remote: boolean;
  export?: string;
}

// Embed command
program
  .command('embed')
  .description('Compute missing embeddings for the snapshot questions')
  .option('--snapshot <path>', 'Encrypted market snapshot', DEFAULT_MARKETS_OUTPUT)
  .option('--cache <path>', 'Local cache artifact (defaults to EMBEDDING_CACHE_PATH)')
  .option('--no-remote', 'Do not bootstrap from the published cache')
  .option('--export <path>', 'Also write the encrypted cache artifact')
  .action(async (opts: EmbedCliOptions) => {
    try {
      // --no-remote only ever turns the bootstrap off
      await runUpdateEmbeddings({
        snapshot: opts.snapshot,
        cachePath: opts.cache,
        useRemote: opts.remote ? undefined : false,
        exportPath: opts.export,
      });
    } catch (error) {
      fail('Embed', error);
    }
  });

// Keygen command
program
  .command('keygen')
  .description('Generate a new encryption key')
  .action(() => {
    runKeygen();
  });

// Sources command
program
  .command('sources')
  .description('List supported sources and their default filters')
  .action(() => {
    runListSources();
  });

program.parse();
