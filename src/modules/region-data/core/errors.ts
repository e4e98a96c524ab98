/**
 * Region Data Module - Domain Errors
 */

import type { DatabaseError } from '@/common/types/errors.js';

export { createDatabaseError, type DatabaseError } from '@/common/types/errors.js';

/**
 * A query parameter is malformed.
 */
export interface InvalidQueryError {
  readonly type: 'InvalidQuery';
  readonly message: string;
  readonly field: string;
}

export type RegionDataError = DatabaseError | InvalidQueryError;

export const createInvalidQueryError = (field: string, message: string): InvalidQueryError => ({
  type: 'InvalidQuery',
  message,
  field,
});

/**
 * HTTP status codes for region data errors.
 */
export const REGION_DATA_ERROR_HTTP_STATUS: Record<RegionDataError['type'], number> = {
  InvalidQuery: 400,
  DatabaseError: 500,
};

export const getHttpStatusForError = (error: RegionDataError): number =>
  REGION_DATA_ERROR_HTTP_STATUS[error.type];
