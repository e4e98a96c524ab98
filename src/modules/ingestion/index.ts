/**
 * Ingestion Module - Public API
 *
 * Fetches dataset payloads over HTTP as lazy RawRecord sequences.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  RawRecord,
  RawRecordStream,
  SourceMetadata,
  IngestionConfig,
  FetchFn,
  SleepFn,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors
// ─────────────────────────────────────────────────────────────────────────────

export type { IngestionError, SchemaMismatchError, SourceUnavailableError } from './core/errors.js';
export { RawStreamError } from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Logic
// ─────────────────────────────────────────────────────────────────────────────

export {
  withRetry,
  backoffDelay,
  isTransientStatus,
  type AttemptFailure,
  type RetryFailure,
  type RetryOptions,
} from './core/retry.js';
export { decodePayload, detectDelimiter } from './core/payload.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - HTTP Client
// ─────────────────────────────────────────────────────────────────────────────

export {
  makeIngestionClient,
  type IngestionClient,
  type IngestionClientOptions,
} from './shell/ingestion-client.js';
