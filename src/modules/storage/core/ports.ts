/**
 * Storage Module - Ports
 */

import type { ReadFilter, StoredRecord, TableName, UpsertSummary } from './types.js';
import type { DatabaseError, StorageCommitFailureError } from '@/common/types/errors.js';
import type { Result } from 'neverthrow';

/**
 * Persistence boundary of the pipeline and the read path.
 */
export interface StorageGateway {
  /**
   * Inserts or replaces records by natural key.
   *
   * Atomic per call: either every record lands or none does. There is no
   * coordination across calls, so tables committed earlier in a run stay
   * committed when a later call fails.
   */
  upsertBatch(
    table: TableName,
    records: readonly StoredRecord[],
    naturalKey: readonly string[]
  ): Promise<Result<UpsertSummary, StorageCommitFailureError>>;

  /**
   * Reads records matching a filter.
   */
  read(table: TableName, filter?: ReadFilter): Promise<Result<StoredRecord[], DatabaseError>>;
}
