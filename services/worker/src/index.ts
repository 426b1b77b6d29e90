export { aggregateMarkets, type AggregateOptions, type AggregateResult, type SourceReport } from './pipeline/aggregate.js';
export { runFetchMarkets, runUpdateEmbeddings, runKeygen, runListSources } from './commands/index.js';
export {
  createAdapter,
  getSupportedPlatforms,
  withAdapterSession,
  type SourceAdapter,
  type AdapterConfig,
  type MetaculusClient,
} from './adapters/index.js';
