/**
 * Degrades cache failures to misses.
 *
 * The read path must answer even when the store does not: a failed read
 * recomputes, a failed write leaves the entry uncached and a failed clear
 * reports nothing evicted.
 */

import type { CachePort, CacheSetOptions, CacheStats, SilentCachePort } from '../ports.js';
import type { Logger } from 'pino';

export interface SilentCacheOptions {
  logger: Logger;
}

export const createSilentCache = <T>(
  cache: CachePort<T>,
  options: SilentCacheOptions
): SilentCachePort<T> => {
  const log = options.logger;

  return {
    async get(key: string): Promise<T | undefined> {
      const result = await cache.get(key);
      if (result.isErr()) {
        log.warn({ err: result.error, key }, `[Cache] Get failed: ${result.error.message}`);
        return undefined;
      }
      return result.value;
    },

    async set(key: string, value: T, setOptions?: CacheSetOptions): Promise<void> {
      const result = await cache.set(key, value, setOptions);
      if (result.isErr()) {
        log.warn(
          { err: result.error, key, ttlMs: setOptions?.ttlMs },
          `[Cache] Set failed: ${result.error.message}`
        );
      }
    },

    async clear(): Promise<number> {
      const result = await cache.clear();
      if (result.isErr()) {
        log.error({ err: result.error }, `[Cache] Clear failed: ${result.error.message}`);
        return 0;
      }
      return result.value;
    },

    stats(): Promise<CacheStats> {
      return cache.stats();
    },
  };
};
