/**
 * Type exports
 */

export * from './query.js';
export * from './cache.js';
export * from './rate-limit.js';
export * from './schemas/index.js';
