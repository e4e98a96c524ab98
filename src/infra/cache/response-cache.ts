/**
 * Response cache for the read path.
 *
 * Memoizes successful query results per key with a TTL and is cleared
 * wholesale whenever a refresh commits new data.
 */

import { ok, type Result } from 'neverthrow';

import type { CacheStats, SilentCachePort } from './ports.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface ResponseCacheStats extends CacheStats {
  /** Number of compute functions invoked */
  computations: number;
  /** Number of invalidateAll calls */
  invalidations: number;
  /** ISO timestamp of the last invalidation */
  lastInvalidatedAt: string | null;
}

export interface ResponseCache {
  /**
   * Returns the cached value for `key` when present and not expired,
   * otherwise runs `compute` and caches its Ok value for `ttlMs`.
   * Err results are returned as-is and never cached.
   */
  getOrCompute<T, E>(
    key: string,
    compute: () => Promise<Result<T, E>>,
    ttlMs: number
  ): Promise<Result<T, E>>;

  /**
   * Drops every entry. Results of computations that started before the
   * call are not stored when they complete.
   * @returns Number of entries evicted
   */
  invalidateAll(): Promise<number>;

  stats(): Promise<ResponseCacheStats>;
}

/**
 * Anything that announces completed refreshes.
 */
export interface RefreshCompletionSource<E> {
  onRefreshCompleted(listener: (event: E) => Promise<void> | void): () => void;
}

export interface ResponseCacheOptions {
  store: SilentCachePort;
  logger: Logger;
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export const createResponseCache = (options: ResponseCacheOptions): ResponseCache => {
  const { store } = options;
  const log = options.logger.child({ component: 'ResponseCache' });

  // Bumped on every invalidation; a computation only stores its value
  // when the generation it started in is still current.
  let generation = 0;
  let computations = 0;
  let invalidations = 0;
  let lastInvalidatedAt: string | null = null;

  return {
    async getOrCompute<T, E>(
      key: string,
      compute: () => Promise<Result<T, E>>,
      ttlMs: number
    ): Promise<Result<T, E>> {
      const cached = await store.get(key);
      if (cached !== undefined) {
        // Only the computation registered for a key ever writes it
        return ok(cached as T);
      }

      const startedIn = generation;
      computations++;
      const result = await compute();

      if (result.isOk() && startedIn === generation) {
        await store.set(key, result.value, { ttlMs });
      } else if (result.isOk()) {
        log.debug({ key }, 'Discarding result computed before invalidation');
      }

      return result;
    },

    async invalidateAll(): Promise<number> {
      generation++;
      invalidations++;
      lastInvalidatedAt = new Date().toISOString();
      const evicted = await store.clear();
      log.info({ evicted }, 'Response cache invalidated');
      return evicted;
    },

    async stats(): Promise<ResponseCacheStats> {
      const base = await store.stats();
      return { ...base, computations, invalidations, lastInvalidatedAt };
    },
  };
};

/**
 * Subscribes the cache to refresh completions.
 * @returns Unsubscribe function
 */
export const invalidateOnRefresh = <E extends { runId: string }>(
  cache: ResponseCache,
  source: RefreshCompletionSource<E>,
  logger: Logger
): (() => void) => {
  return source.onRefreshCompleted(async (event) => {
    const evicted = await cache.invalidateAll();
    logger.info({ runId: event.runId, evicted }, 'Cache invalidated after refresh');
  });
};
