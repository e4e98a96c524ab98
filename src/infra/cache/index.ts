/**
 * Cache Infrastructure
 *
 * In-process TTL cache for the read path. Cache failures never cause
 * request failures; they degrade to a recomputation.
 *
 * @example
 * ```typescript
 * const { responseCache, keyBuilder } = initCache({ config, logger });
 *
 * const key = keyBuilder.fromFilter(CacheNamespace.REGION_STATS, { year: 2023 });
 * const result = await responseCache.getOrCompute(key, () => loadStats(2023), 60_000);
 *
 * invalidateOnRefresh(responseCache, orchestrator, logger);
 * ```
 */

// Ports (interfaces)
export type {
  CachePort,
  SilentCachePort,
  CacheError,
  CacheSetOptions,
  CacheStats,
} from './ports.js';
export { CacheError as CacheErrorFactory } from './ports.js';

// Key generation
export {
  CacheNamespace,
  createKeyBuilder,
  type KeyBuilder,
  type KeyBuilderOptions,
} from './key-builder.js';

// Serialization
export { serialize, deserialize } from './serialization.js';

// Adapters
export { createNoopCache, createMemoryCache, type MemoryCacheOptions } from './adapters/index.js';

// Wrappers
export { createSilentCache, type SilentCacheOptions } from './wrappers/index.js';

// Response cache
export {
  createResponseCache,
  invalidateOnRefresh,
  type ResponseCache,
  type ResponseCacheOptions,
  type ResponseCacheStats,
  type RefreshCompletionSource,
} from './response-cache.js';

// Client factory
export { initCache, type CacheConfig, type CacheClient, type InitCacheOptions } from './client.js';
