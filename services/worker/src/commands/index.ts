export {
  runFetchMarkets,
  DEFAULT_MARKETS_OUTPUT,
  type FetchMarketsOptions,
  type FetchMarketsResult,
} from './fetch-markets.js';
export { runUpdateEmbeddings, type UpdateEmbeddingsOptions, type UpdateEmbeddingsResult } from './update-embeddings.js';
export { runKeygen } from './keygen.js';
export { runListSources, type SourceInfo } from './sources.js';
