/**
 * Cache client factory - creates and configures cache instances.
 */

import { createMemoryCache, createNoopCache } from './adapters/index.js';
import { createKeyBuilder, type KeyBuilder } from './key-builder.js';
import { createResponseCache, type ResponseCache } from './response-cache.js';
import { createSilentCache } from './wrappers/index.js';

import type { CachePort, SilentCachePort } from './ports.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Types
// ─────────────────────────────────────────────────────────────────────────────

export interface CacheConfig {
  /** false selects the no-op backend */
  enabled: boolean;
  /** Default TTL in milliseconds */
  defaultTtlMs: number;
  /** Max entries kept in memory */
  maxEntries: number;
  /** Key prefix for all cache keys. Default: 'region-insights' */
  keyPrefix?: string;
  /** Clock override for tests */
  now?: () => number;
}

export interface CacheClient {
  /** Read-path cache with getOrCompute / invalidateAll */
  responseCache: ResponseCache;
  /** Key builder for generating cache keys */
  keyBuilder: KeyBuilder;
  /** Silent cache port backing the response cache */
  cache: SilentCachePort;
}

// ─────────────────────────────────────────────────────────────────────────────
// Cache Initialization
// ─────────────────────────────────────────────────────────────────────────────

export interface InitCacheOptions {
  config: CacheConfig;
  logger: Logger;
}

/**
 * Initialize the cache infrastructure.
 */
export const initCache = (options: InitCacheOptions): CacheClient => {
  const { config, logger } = options;

  const keyBuilder = createKeyBuilder(
    config.keyPrefix !== undefined ? { globalPrefix: config.keyPrefix } : {}
  );

  let rawCache: CachePort;
  if (config.enabled) {
    logger.info(
      { maxEntries: config.maxEntries, defaultTtlMs: config.defaultTtlMs },
      '[Cache] Using in-memory LRU cache'
    );
    rawCache = createMemoryCache({
      maxEntries: config.maxEntries,
      defaultTtlMs: config.defaultTtlMs,
      ...(config.now !== undefined && { now: config.now }),
    });
  } else {
    logger.info('[Cache] Using NoOp cache (disabled)');
    rawCache = createNoopCache();
  }

  const cache = createSilentCache(rawCache, { logger });
  const responseCache = createResponseCache({ store: cache, logger });

  return {
    responseCache,
    keyBuilder,
    cache,
  };
};
