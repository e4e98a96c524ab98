/**
 * Region Data Module - Public API
 *
 * Read path over the tables the refresh pipeline maintains.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  RegionBudget,
  Commune,
  EmploymentMonth,
  PageQuery,
  RegionStatsQuery,
  RegionBudgetsQuery,
  CommunesQuery,
  EmploymentQuery,
  RawQueryInput,
  Kpis,
  Page,
} from './core/types.js';
export { DEFAULT_PAGE_LIMIT, MAX_PAGE_LIMIT, MAX_SEARCH_LENGTH } from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors
// ─────────────────────────────────────────────────────────────────────────────

export type { InvalidQueryError, RegionDataError } from './core/errors.js';
export {
  createInvalidQueryError,
  getHttpStatusForError,
  REGION_DATA_ERROR_HTTP_STATUS,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Ports & Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export type { RegionDataRepository } from './core/ports.js';
export { listRegionStats, type ListRegionStatsDeps } from './core/usecases/list-region-stats.js';
export {
  listRegionBudgets,
  type ListRegionBudgetsDeps,
} from './core/usecases/list-region-budgets.js';
export { listCommunes, type ListCommunesDeps } from './core/usecases/list-communes.js';
export { listEmployment, type ListEmploymentDeps } from './core/usecases/list-employment.js';
export { getKpis, type GetKpisDeps } from './core/usecases/get-kpis.js';
export {
  normalizePage,
  normalizeYear,
  normalizeRegionCode,
  normalizeDepartmentCode,
  normalizeMonth,
  normalizeSearch,
} from './core/usecases/normalize-query.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell
// ─────────────────────────────────────────────────────────────────────────────

export { makeRegionDataRepo, type RegionDataRepoOptions } from './shell/repo/region-data-repo.js';
export { makeRegionDataRoutes, type MakeRegionDataRoutesDeps } from './shell/rest/routes.js';
