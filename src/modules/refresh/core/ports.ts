/**
 * Refresh Module - Ports
 */

import type { DatasetSpec } from '@/modules/dataset-registry/index.js';
import type { IngestionError, RawRecordStream } from '@/modules/ingestion/index.js';
import type { Result } from 'neverthrow';

/**
 * Source of raw dataset payloads.
 */
export interface DatasetFetcher {
  fetch(spec: DatasetSpec): Promise<Result<RawRecordStream, IngestionError>>;
}
