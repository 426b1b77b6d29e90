export * from './types.js';
export * from './errors.js';
export * from './utils.js';
export * from './market.js';
export * from './timestamps.js';
export * from './config.js';
