/**
 * Refresh Module - Domain Errors
 */

import type { StorageCommitFailureError } from '@/common/types/errors.js';

export {
  createAlreadyRunningError,
  createStorageCommitFailureError,
  type AlreadyRunningError,
  type StorageCommitFailureError,
} from '@/common/types/errors.js';

/**
 * Every dataset failed, so there was nothing to transform.
 */
export interface NoDatasetsAvailableError {
  readonly type: 'NoDatasetsAvailable';
  readonly message: string;
  readonly failed: readonly string[];
}

/**
 * An exception escaped the pipeline.
 */
export interface UnexpectedRefreshError {
  readonly type: 'UnexpectedRefreshError';
  readonly message: string;
  readonly cause?: unknown;
}

export type RefreshFailure =
  | StorageCommitFailureError
  | NoDatasetsAvailableError
  | UnexpectedRefreshError;

export const createNoDatasetsAvailableError = (
  failed: readonly string[]
): NoDatasetsAvailableError => ({
  type: 'NoDatasetsAvailable',
  message: `All datasets failed: ${failed.join(', ')}`,
  failed,
});

export const createUnexpectedRefreshError = (
  message: string,
  cause?: unknown
): UnexpectedRefreshError => ({
  type: 'UnexpectedRefreshError',
  message,
  ...(cause !== undefined && { cause }),
});

/**
 * HTTP status codes for refresh errors.
 */
export const REFRESH_ERROR_HTTP_STATUS = {
  AlreadyRunning: 409,
} as const;
