/**
 * In-Memory Storage Gateway
 *
 * Process-local tables used when no DATABASE_URL is configured.
 * Each upsert swaps in a new table map, so a batch lands whole or not at all.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  createDatabaseError,
  createStorageCommitFailureError,
  type DatabaseError,
  type StorageCommitFailureError,
} from '@/common/types/errors.js';

import {
  applyReadFilter,
  collapseByKey,
  recordKey,
  unknownFilterColumns,
  validateBatch,
} from '../../core/records.js';
import { TABLE_DEFINITIONS } from '../../core/tables.js';

import type { StorageGateway } from '../../core/ports.js';
import type { ReadFilter, StoredRecord, TableName, UpsertSummary } from '../../core/types.js';
import type { Logger } from 'pino';

export interface MemoryStorageGatewayOptions {
  logger: Logger;
}

export interface MemoryStorageGateway extends StorageGateway {
  /** Number of stored records in a table */
  count(table: TableName): number;
}

export const makeMemoryStorageGateway = (
  options: MemoryStorageGatewayOptions
): MemoryStorageGateway => {
  const log = options.logger.child({ repo: 'MemoryStorageGateway' });
  const tables = new Map<TableName, ReadonlyMap<string, StoredRecord>>();

  return {
    upsertBatch(
      table: TableName,
      records: readonly StoredRecord[],
      naturalKey: readonly string[]
    ): Promise<Result<UpsertSummary, StorageCommitFailureError>> {
      const validation = validateBatch(TABLE_DEFINITIONS[table], records, naturalKey);
      if (validation.isErr()) {
        log.error({ table, reason: validation.error }, 'Rejected invalid batch');
        return Promise.resolve(
          err(createStorageCommitFailureError(table, records.length, validation.error))
        );
      }

      const rows = collapseByKey(records, naturalKey);
      const next = new Map(tables.get(table));
      for (const row of rows) {
        next.set(recordKey(row, naturalKey), row);
      }
      tables.set(table, next);

      log.debug({ table, written: rows.length }, 'Batch committed');
      return Promise.resolve(ok({ table, written: rows.length }));
    },

    read(table: TableName, filter: ReadFilter = {}): Promise<Result<StoredRecord[], DatabaseError>> {
      const definition = TABLE_DEFINITIONS[table];
      const unknown = unknownFilterColumns(definition, filter);
      if (unknown.length > 0) {
        return Promise.resolve(
          err(createDatabaseError(`Unknown columns on '${table}': ${unknown.join(', ')}`))
        );
      }

      const stored = [...(tables.get(table)?.values() ?? [])];
      return Promise.resolve(ok(applyReadFilter(definition, stored, filter)));
    },

    count(table: TableName): number {
      return tables.get(table)?.size ?? 0;
    },
  };
};
