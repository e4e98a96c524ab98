/**
 * Dataset Registry - Errors
 */

import type { DatasetNotFoundError } from '@/common/types/errors.js';

export type { DatasetNotFoundError } from '@/common/types/errors.js';
export { createDatasetNotFoundError } from '@/common/types/errors.js';

export type DatasetRegistryError = DatasetNotFoundError;

/**
 * Maps error types to HTTP status codes.
 */
export const DATASET_REGISTRY_ERROR_HTTP_STATUS: Record<DatasetRegistryError['type'], number> = {
  DatasetNotFound: 404,
};
