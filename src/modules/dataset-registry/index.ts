/**
 * Dataset Registry Module - Public API
 *
 * Static catalog of the datasets the refresh pipeline pulls.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  SemanticType,
  MissingValuePolicy,
  TextFormat,
  DatePrecision,
  ColumnSpec,
  DatasetId,
  SourceLocator,
  DuplicatePolicy,
  RefreshCadence,
  DatasetTable,
  DatasetSpec,
  RegionInfo,
} from './core/types.js';
export { DATASET_IDS, isDatasetId } from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors
// ─────────────────────────────────────────────────────────────────────────────

export type { DatasetNotFoundError, DatasetRegistryError } from './core/errors.js';
export { createDatasetNotFoundError, DATASET_REGISTRY_ERROR_HTTP_STATUS } from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Registry
// ─────────────────────────────────────────────────────────────────────────────

export {
  DATASET_SPECS,
  createDatasetRegistry,
  validateDatasetSpec,
  type DatasetRegistry,
} from './core/registry.js';
export { normalizeColumnName, resolveColumns, type ColumnResolution } from './core/columns.js';
export { CURRENT_REGIONS, makeRegionReference, type RegionReference } from './core/regions.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - REST Routes
// ─────────────────────────────────────────────────────────────────────────────

export { makeDatasetRoutes, type MakeDatasetRoutesDeps } from './shell/rest/routes.js';
