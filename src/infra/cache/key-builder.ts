/**
 * Cache key generation: one namespace per read query type.
 */

import { createHash } from 'node:crypto';

// ─────────────────────────────────────────────────────────────────────────────
// Namespaces
// ─────────────────────────────────────────────────────────────────────────────

export const CacheNamespace = {
  /** Derived per-region, per-year statistics */
  REGION_STATS: 'region:stats',
  /** Cleaned regional budget rows */
  REGION_BUDGETS: 'region:budgets',
  /** Cleaned regional employment rows */
  REGION_EMPLOYMENT: 'region:employment',
  /** Cleaned commune rows */
  COMMUNES: 'communes',
  /** Dataset catalog and captured source metadata */
  DATASETS: 'datasets',
  /** Headline figures across tables */
  KPIS: 'kpis',
} as const;

export type CacheNamespace = (typeof CacheNamespace)[keyof typeof CacheNamespace];

// ─────────────────────────────────────────────────────────────────────────────
// Key Builder Interface
// ─────────────────────────────────────────────────────────────────────────────

export interface KeyBuilder {
  /**
   * Build a cache key from namespace and identifier.
   * Format: `{globalPrefix}:{namespace}:{identifier}`
   */
  build(namespace: CacheNamespace, identifier: string): string;

  /**
   * Build a key from a filter object by hashing it.
   * Produces deterministic keys for identical filters.
   */
  fromFilter(namespace: CacheNamespace, filter: Record<string, unknown>): string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Recursively sorts object keys and drops undefined fields, so that
 * `{ year: 2023, regionCode: undefined }` and `{ year: 2023 }` map to the same key.
 */
const canonicalize = (value: unknown): unknown => {
  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }

  const entries = Object.entries(value)
    .filter(([, val]) => val !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

  const result: Record<string, unknown> = {};
  for (const [key, val] of entries) {
    result[key] = canonicalize(val);
  }
  return result;
};

/**
 * SHA-256 of the canonical JSON form, truncated to 16 hex characters.
 */
const hashFilter = (filter: Record<string, unknown>): string => {
  const normalized = JSON.stringify(canonicalize(filter));
  return createHash('sha256').update(normalized).digest('hex').substring(0, 16);
};

export interface KeyBuilderOptions {
  /** Global prefix for all keys. Defaults to 'region-insights'. */
  globalPrefix?: string;
}

/**
 * Create a key builder instance.
 */
export const createKeyBuilder = (options: KeyBuilderOptions = {}): KeyBuilder => {
  const globalPrefix = options.globalPrefix ?? 'region-insights';

  return {
    build(namespace: CacheNamespace, identifier: string): string {
      return `${globalPrefix}:${namespace}:${identifier}`;
    },

    fromFilter(namespace: CacheNamespace, filter: Record<string, unknown>): string {
      const hash = hashFilter(filter);
      return `${globalPrefix}:${namespace}:${hash}`;
    },
  };
};
