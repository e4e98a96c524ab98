/**
 * Error taxonomy shared by the refresh pipeline and the read path.
 *
 * All errors are discriminated unions with a 'type' field for easy matching.
 */

/**
 * Base interface for all application errors
 */
export interface AppError {
  readonly type: string;
  readonly message: string;
  readonly cause?: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Dataset-level errors (abort one dataset's contribution to a run)
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The remote source could not be reached or returned an unusable payload.
 */
export interface SourceUnavailableError extends AppError {
  readonly type: 'SourceUnavailable';
  readonly datasetId: string;
  /** false for 4xx responses and malformed payloads */
  readonly retryable: boolean;
  readonly status?: number;
  readonly attempts: number;
}

/**
 * Expected columns are absent from a fetched payload.
 */
export interface SchemaMismatchError extends AppError {
  readonly type: 'SchemaMismatch';
  readonly datasetId: string;
  readonly missingColumns: readonly string[];
  readonly receivedColumns: readonly string[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Row-level failures (absorbed into cleaning reports)
// ─────────────────────────────────────────────────────────────────────────────

export type ValidationFailureReason = 'coercion' | 'missing' | 'duplicate';

/**
 * A row rejected during cleaning. Never aborts a run.
 */
export interface ValidationFailure extends AppError {
  readonly type: 'ValidationFailure';
  readonly datasetId: string;
  readonly reason: ValidationFailureReason;
  /** Zero-based index of the row in the fetched sequence */
  readonly rowIndex: number;
  readonly field?: string;
  readonly value?: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Run-level errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The persistence layer rejected a batch.
 */
export interface StorageCommitFailureError extends AppError {
  readonly type: 'StorageCommitFailure';
  readonly table: string;
  readonly recordCount: number;
}

/**
 * A refresh was requested while another one is running.
 */
export interface AlreadyRunningError extends AppError {
  readonly type: 'AlreadyRunning';
  readonly runningRunId: string;
}

/**
 * Read failure on the query path.
 */
export interface DatabaseError extends AppError {
  readonly type: 'DatabaseError';
  readonly retryable: boolean;
}

/**
 * Unknown dataset identifier.
 */
export interface DatasetNotFoundError extends AppError {
  readonly type: 'DatasetNotFound';
  readonly datasetId: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createSourceUnavailableError = (
  datasetId: string,
  message: string,
  details: {
    retryable: boolean;
    attempts: number;
    status?: number | undefined;
    cause?: unknown;
  }
): SourceUnavailableError => ({
  type: 'SourceUnavailable',
  message,
  datasetId,
  retryable: details.retryable,
  attempts: details.attempts,
  ...(details.status !== undefined && { status: details.status }),
  ...(details.cause !== undefined && { cause: details.cause }),
});

export const createSchemaMismatchError = (
  datasetId: string,
  missingColumns: readonly string[],
  receivedColumns: readonly string[]
): SchemaMismatchError => ({
  type: 'SchemaMismatch',
  message: `Dataset '${datasetId}' is missing required columns: ${missingColumns.join(', ')}`,
  datasetId,
  missingColumns,
  receivedColumns,
});

export const createValidationFailure = (
  datasetId: string,
  reason: ValidationFailureReason,
  rowIndex: number,
  message: string,
  field?: string,
  value?: string
): ValidationFailure => ({
  type: 'ValidationFailure',
  message,
  datasetId,
  reason,
  rowIndex,
  ...(field !== undefined && { field }),
  ...(value !== undefined && { value }),
});

export const createStorageCommitFailureError = (
  table: string,
  recordCount: number,
  cause?: unknown
): StorageCommitFailureError => ({
  type: 'StorageCommitFailure',
  message: `Failed to commit ${String(recordCount)} records to '${table}'`,
  table,
  recordCount,
  ...(cause !== undefined && { cause }),
});

export const createAlreadyRunningError = (runningRunId: string): AlreadyRunningError => ({
  type: 'AlreadyRunning',
  message: `Refresh run '${runningRunId}' is already in progress`,
  runningRunId,
});

export const createDatabaseError = (message: string, cause?: unknown): DatabaseError => ({
  type: 'DatabaseError',
  message,
  retryable: true,
  ...(cause !== undefined && { cause }),
});

export const createDatasetNotFoundError = (datasetId: string): DatasetNotFoundError => ({
  type: 'DatasetNotFound',
  message: `Dataset with id '${datasetId}' not found`,
  datasetId,
});

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Extracts a message from an unknown thrown value.
 */
export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : 'Unknown error';
};
