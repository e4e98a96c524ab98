/**
 * In-memory LRU cache with TTL expiration.
 *
 * Expiry is checked lazily on access; there is no background sweep.
 * An entry is never served at or after its expiry instant.
 */

import { ok } from 'neverthrow';

import { deserialize, serialize } from '../serialization.js';

import type { CachePort, CacheSetOptions, CacheStats } from '../ports.js';

interface CacheEntry {
  /** Serialized value */
  value: string;
  /** Insertion timestamp (ms since epoch) */
  insertedAt: number;
  /** Expiration timestamp (ms since epoch) */
  expiresAt: number;
}

export interface MemoryCacheOptions {
  /** Maximum number of entries. Default: 1000 */
  maxEntries?: number;
  /** Default TTL in milliseconds. Default: 300000 (5 minutes) */
  defaultTtlMs?: number;
  /** Clock used for expiry, overridable in tests. Default: Date.now */
  now?: () => number;
}

/**
 * Create an in-memory LRU cache with TTL.
 */
export const createMemoryCache = <T>(options: MemoryCacheOptions = {}): CachePort<T> => {
  const maxEntries = options.maxEntries ?? 1000;
  const defaultTtlMs = options.defaultTtlMs ?? 300_000;
  const now = options.now ?? Date.now;

  // Map maintains insertion order, enabling LRU eviction
  const store = new Map<string, CacheEntry>();

  let hits = 0;
  let misses = 0;

  const isExpired = (entry: CacheEntry): boolean => {
    return now() >= entry.expiresAt;
  };

  const evictLru = (): void => {
    const lruKey = store.keys().next().value;
    if (lruKey !== undefined) {
      store.delete(lruKey);
    }
  };

  const refreshLru = (key: string, entry: CacheEntry): void => {
    store.delete(key);
    store.set(key, entry);
  };

  return {
    get(key: string) {
      const entry = store.get(key);

      if (entry === undefined) {
        misses++;
        return Promise.resolve(ok(undefined));
      }

      if (isExpired(entry)) {
        store.delete(key);
        misses++;
        return Promise.resolve(ok(undefined));
      }

      refreshLru(key, entry);

      const result = deserialize(entry.value);
      if (!result.ok) {
        // Corrupted entry, remove it
        store.delete(key);
        misses++;
        return Promise.resolve(ok(undefined));
      }

      hits++;
      return Promise.resolve(ok(result.value as T));
    },

    set(key: string, value: T, setOptions?: CacheSetOptions) {
      const ttlMs = setOptions?.ttlMs ?? defaultTtlMs;

      // A zero TTL means the value must never be served
      if (ttlMs <= 0) {
        store.delete(key);
        return Promise.resolve(ok(undefined));
      }

      if (store.has(key)) {
        store.delete(key);
      } else if (store.size >= maxEntries) {
        evictLru();
      }

      const insertedAt = now();
      store.set(key, {
        value: serialize(value),
        insertedAt,
        expiresAt: insertedAt + ttlMs,
      });

      return Promise.resolve(ok(undefined));
    },

    clear() {
      const count = store.size;
      store.clear();
      return Promise.resolve(ok(count));
    },

    stats(): Promise<CacheStats> {
      return Promise.resolve({ hits, misses, size: store.size });
    },
  };
};
