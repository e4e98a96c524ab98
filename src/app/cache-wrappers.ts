/**
 * Cache wrapper factories for repository methods.
 *
 * Each wrapper returns a cached version of a repository interface. Only
 * successful results are cached; entries live for the TTL configured for
 * their query type and are dropped wholesale when a refresh completes.
 */

import { CacheNamespace, type KeyBuilder, type ResponseCache } from '../infra/cache/index.js';

import type { AppConfig } from '../infra/config/index.js';
import type { RegionDataRepository } from '../modules/region-data/index.js';
import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

export type CacheTtls = AppConfig['cache']['ttlMs'];

/**
 * Generic cache wrapper for Result-returning async functions.
 */
const wrapWithCache = <TArgs extends unknown[], TValue, TError>(
  fn: (...args: TArgs) => Promise<Result<TValue, TError>>,
  cache: ResponseCache,
  keyGenerator: (args: TArgs) => string,
  ttlMs: number
): ((...args: TArgs) => Promise<Result<TValue, TError>>) => {
  return async (...args: TArgs): Promise<Result<TValue, TError>> => {
    const key = keyGenerator(args);
    return cache.getOrCompute(key, () => fn(...args), ttlMs);
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Region Data Repository Wrapper
// ─────────────────────────────────────────────────────────────────────────────

export const wrapRegionDataRepo = (
  repo: RegionDataRepository,
  cache: ResponseCache,
  keyBuilder: KeyBuilder,
  ttls: CacheTtls
): RegionDataRepository => ({
  listRegionStats: wrapWithCache(
    repo.listRegionStats.bind(repo),
    cache,
    ([query]) =>
      keyBuilder.fromFilter(CacheNamespace.REGION_STATS, {
        method: 'listRegionStats',
        ...query,
      }),
    ttls.regionStats
  ),

  listRegionBudgets: wrapWithCache(
    repo.listRegionBudgets.bind(repo),
    cache,
    ([query]) =>
      keyBuilder.fromFilter(CacheNamespace.REGION_BUDGETS, {
        method: 'listRegionBudgets',
        ...query,
      }),
    ttls.budgets
  ),

  listCommunes: wrapWithCache(
    repo.listCommunes.bind(repo),
    cache,
    ([query]) =>
      keyBuilder.fromFilter(CacheNamespace.COMMUNES, {
        method: 'listCommunes',
        ...query,
      }),
    ttls.communes
  ),

  listEmployment: wrapWithCache(
    repo.listEmployment.bind(repo),
    cache,
    ([query]) =>
      keyBuilder.fromFilter(CacheNamespace.REGION_EMPLOYMENT, {
        method: 'listEmployment',
        ...query,
      }),
    ttls.employment
  ),

  listDatasetSources: wrapWithCache(
    repo.listDatasetSources.bind(repo),
    cache,
    () => keyBuilder.build(CacheNamespace.DATASETS, 'sources'),
    ttls.datasets
  ),

  getKpis: wrapWithCache(
    repo.getKpis.bind(repo),
    cache,
    () => keyBuilder.build(CacheNamespace.KPIS, 'summary'),
    ttls.kpis
  ),
});
