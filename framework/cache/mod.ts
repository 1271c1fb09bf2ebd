/**
 * Caching Layer
 *
 * In-process TTL cache for rendered fragments and computed values.
 */

export { Cache, type CacheOptions, type CacheEntry, type CacheStats } from './cache.ts';
