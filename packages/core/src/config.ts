import { ConfigurationError } from './errors.js';

export const ENCRYPTION_KEY_ENV = 'POOL_ENCRYPTION_KEY';
export const EMBEDDING_TOKEN_ENV = 'DEEPINFRA_TOKEN';

export const DEFAULT_EMBEDDING_BASE_URL = 'https://api.deepinfra.com/v1/openai';
export const DEFAULT_EMBEDDING_MODEL = 'BAAI/bge-m3';
export const DEFAULT_EMBEDDING_DIM = 1024;
export const DEFAULT_EMBEDDING_CHUNK_SIZE = 1024;
export const DEFAULT_EMBEDDING_CACHE_PATH = 'data/embeddings_cache/embeddings.parquet';

type Env = Record<string, string | undefined>;

/**
 * Parse int from env with fallback
 */
function parseInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/**
 * Parse boolean from env with fallback ("true"/"1"/"yes" are true)
 */
function parseBool(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  return ['true', '1', 'yes'].includes(value.trim().toLowerCase());
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Encryption secret for every artifact leaving the process.
 * Absence is fatal and must be checked before any I/O.
 */
export function requireEncryptionKey(env: Env = process.env): string {
  const key = nonEmpty(env[ENCRYPTION_KEY_ENV]);
  if (!key) {
    throw new ConfigurationError(`${ENCRYPTION_KEY_ENV} environment variable not set`);
  }
  return key;
}

export interface EmbeddingConfig {
  /** Provider credential; only required once vectors have to be computed */
  apiToken?: string;
  baseUrl: string;
  model: string;
  dimension: number;
  chunkSize: number;
  cachePath: string;
  useRemote: boolean;
  timeoutMs: number;
}

export function loadEmbeddingConfig(env: Env = process.env): EmbeddingConfig {
  return {
    apiToken: nonEmpty(env[EMBEDDING_TOKEN_ENV]),
    baseUrl: nonEmpty(env.EMBEDDING_BASE_URL) ?? DEFAULT_EMBEDDING_BASE_URL,
    model: nonEmpty(env.EMBEDDING_MODEL) ?? DEFAULT_EMBEDDING_MODEL,
    dimension: parseInt(env.EMBEDDING_DIM, DEFAULT_EMBEDDING_DIM),
    chunkSize: Math.max(1, parseInt(env.EMBEDDING_CHUNK_SIZE, DEFAULT_EMBEDDING_CHUNK_SIZE)),
    cachePath: nonEmpty(env.EMBEDDING_CACHE_PATH) ?? DEFAULT_EMBEDDING_CACHE_PATH,
    useRemote: parseBool(env.EMBEDDING_USE_REMOTE, true),
    timeoutMs: parseInt(env.EMBEDDING_TIMEOUT_MS, 60000),
  };
}

/**
 * Provider credential, required for any embedding computation
 */
export function requireEmbeddingToken(config: EmbeddingConfig): string {
  if (!config.apiToken) {
    throw new ConfigurationError(`${EMBEDDING_TOKEN_ENV} environment variable not set`);
  }
  return config.apiToken;
}

export const DEFAULT_RELEASE_REPO = 'https://github.com/question-pool/question-pool';

export interface ReleaseConfig {
  /** GitHub repository URL hosting the published artifacts */
  repoUrl: string;
  tag: string;
}

export function loadReleaseConfig(env: Env = process.env): ReleaseConfig {
  return {
    repoUrl: (nonEmpty(env.POOL_RELEASE_REPO) ?? DEFAULT_RELEASE_REPO).replace(/\/+$/, ''),
    tag: nonEmpty(env.POOL_RELEASE_TAG) ?? 'latest',
  };
}

/**
 * Download URL of a published release artifact, e.g.
 * `<repo>/releases/download/latest/embeddings.parquet.encrypted`
 */
export function releaseFileUrl(filename: string, config: ReleaseConfig = loadReleaseConfig()): string {
  return `${config.repoUrl}/releases/download/${config.tag}/${filename}`;
}

export interface Credentials {
  email: string;
  password: string;
}

export interface AdapterEnv {
  timeoutMs: number;
  maxAttempts: number;
  gjopen?: Credentials;
  manifoldApiKey?: string;
  metaculusToken?: string;
}

export function loadAdapterEnv(env: Env = process.env): AdapterEnv {
  const email = nonEmpty(env.GJOPEN_EMAIL);
  const password = nonEmpty(env.GJOPEN_PASSWORD);

  return {
    timeoutMs: parseInt(env.ADAPTER_TIMEOUT_MS, 30000),
    maxAttempts: Math.max(1, parseInt(env.ADAPTER_MAX_ATTEMPTS, 3)),
    gjopen: email && password ? { email, password } : undefined,
    manifoldApiKey: nonEmpty(env.MANIFOLD_API_KEY),
    metaculusToken: nonEmpty(env.METACULUS_TOKEN),
  };
}

export interface PoolConfig {
  embedding: EmbeddingConfig;
  release: ReleaseConfig;
  adapters: AdapterEnv;
}

/**
 * Load full config from env
 */
export function loadPoolConfig(env: Env = process.env): PoolConfig {
  return {
    embedding: loadEmbeddingConfig(env),
    release: loadReleaseConfig(env),
    adapters: loadAdapterEnv(env),
  };
}

function mask(secret: string | undefined): string {
  return secret ? 'set' : 'not set';
}

/**
 * Format config for logging (secrets masked)
 */
export function formatPoolConfig(config: PoolConfig): string {
  return [
    '[config] Configuration:',
    `  embedding.baseUrl: ${config.embedding.baseUrl}`,
    `  embedding.model: ${config.embedding.model} (dim ${config.embedding.dimension})`,
    `  embedding.chunkSize: ${config.embedding.chunkSize}`,
    `  embedding.cachePath: ${config.embedding.cachePath}`,
    `  embedding.useRemote: ${config.embedding.useRemote}`,
    `  embedding.token: ${mask(config.embedding.apiToken)}`,
    `  release: ${config.release.repoUrl} @ ${config.release.tag}`,
    `  adapters.timeoutMs: ${config.adapters.timeoutMs}`,
    `  adapters.maxAttempts: ${config.adapters.maxAttempts}`,
    `  gjopen credentials: ${config.adapters.gjopen ? 'set' : 'not set'}`,
    `  metaculus token: ${mask(config.adapters.metaculusToken)}`,
  ].join('\n');
}
