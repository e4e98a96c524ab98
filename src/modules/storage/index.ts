/**
 * Storage Module - Public API
 *
 * Natural-key upserts and filtered reads over the pipeline's tables.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  TableName,
  StoredColumnType,
  StoredColumn,
  TableDefinition,
  StoredValue,
  StoredRecord,
  SortDirection,
  ReadFilter,
  UpsertSummary,
} from './core/types.js';
export { TABLE_NAMES, isTableName } from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Ports
// ─────────────────────────────────────────────────────────────────────────────

export type { StorageGateway } from './core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Logic
// ─────────────────────────────────────────────────────────────────────────────

export { TABLE_DEFINITIONS, hasColumn } from './core/tables.js';
export {
  recordKey,
  validateBatch,
  collapseByKey,
  compareStored,
  applyReadFilter,
  unknownFilterColumns,
} from './core/records.js';
export {
  regionStatsToRecord,
  recordToRegionStats,
  sourceEntryToRecord,
  recordToSourceEntry,
  type DatasetSourceEntry,
} from './core/mappers.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - Repositories
// ─────────────────────────────────────────────────────────────────────────────

export {
  makeKyselyStorageGateway,
  type KyselyStorageGatewayOptions,
} from './shell/repo/kysely-storage-gateway.js';
export {
  makeMemoryStorageGateway,
  type MemoryStorageGateway,
  type MemoryStorageGatewayOptions,
} from './shell/repo/memory-storage-gateway.js';
export { ensureStorageSchema } from './shell/repo/schema.js';
