import { PLATFORM_LABELS, loadAdapterEnv, type MarketFilter, type Platform } from '@question-pool/core';
import { createAdapter, getSupportedPlatforms } from '../adapters/index.js';

export interface SourceInfo {
  platform: Platform;
  label: string;
  defaultFilter: MarketFilter;
}

function describeFilter(filter: MarketFilter): string {
  const parts: string[] = [];
  if (filter.minForecasters > 0) parts.push(`forecasters >= ${filter.minForecasters}`);
  if (filter.minComments > 0) parts.push(`comments >= ${filter.minComments}`);
  if (filter.minVolume > 0) parts.push(`volume >= ${filter.minVolume}`);
  if (filter.onlyOpen) parts.push('open only');
  return parts.join(', ');
}

/**
 * List supported sources with their default filters
 */
export function runListSources(env: Record<string, string | undefined> = process.env): SourceInfo[] {
  const adapterEnv = loadAdapterEnv(env);
  const sources = getSupportedPlatforms().map((platform) => ({
    platform,
    label: PLATFORM_LABELS[platform],
    defaultFilter: createAdapter(platform, { env: adapterEnv }).defaultFilter,
  }));

  for (const source of sources) {
    console.log(`  ${source.platform.padEnd(12)} ${source.label.padEnd(12)} ${describeFilter(source.defaultFilter)}`);
  }
  return sources;
}
