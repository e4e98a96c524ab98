/**
 * No-op cache adapter for when caching is disabled.
 * All operations succeed but do nothing.
 */

import { ok } from 'neverthrow';

import type { CachePort, CacheSetOptions, CacheStats } from '../ports.js';

/**
 * Create a no-op cache that does nothing.
 * Used when CACHE_ENABLED=false: every read misses, so every query recomputes.
 */
export const createNoopCache = <T>(): CachePort<T> => {
  return {
    get(_key: string) {
      return Promise.resolve(ok(undefined));
    },

    set(_key: string, _value: T, _options?: CacheSetOptions) {
      return Promise.resolve(ok(undefined));
    },

    clear() {
      return Promise.resolve(ok(0));
    },

    stats(): Promise<CacheStats> {
      return Promise.resolve({ hits: 0, misses: 0, size: 0 });
    },
  };
};
