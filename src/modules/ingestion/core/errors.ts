/**
 * Ingestion Module - Errors
 */

import type { SchemaMismatchError, SourceUnavailableError } from '@/common/types/errors.js';

export type { SchemaMismatchError, SourceUnavailableError } from '@/common/types/errors.js';
export { createSchemaMismatchError, createSourceUnavailableError } from '@/common/types/errors.js';

export type IngestionError = SourceUnavailableError | SchemaMismatchError;

/**
 * Raised while iterating a RawRecordStream whose payload is malformed.
 * Carries the typed error so the caller can record it.
 */
export class RawStreamError extends Error {
  constructor(public readonly error: IngestionError) {
    super(error.message);
    this.name = 'RawStreamError';
  }
}

