export * from './crypto/fernet.js';
export * from './crypto/encrypted-store.js';
export * from './tables/table-codec.js';
export * from './markets/market-table.js';
export * from './embeddings/embedding-table.js';
export * from './embeddings/provider.js';
export * from './embeddings/remote-cache.js';
export * from './embeddings/embedding-cache.js';
