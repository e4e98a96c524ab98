/**
 * Ingestion Module - Domain Types
 */

import type { DatasetId } from '@/modules/dataset-registry/index.js';

/**
 * One fetched row: source header → untyped text value.
 */
export type RawRecord = Readonly<Record<string, string>>;

/**
 * Provenance captured for a fetched dataset.
 */
export interface SourceMetadata {
  readonly datasetId: DatasetId;
  readonly title: string | null;
  readonly organization: string | null;
  readonly license: string | null;
  /** Last modification reported by the catalog (ISO string) */
  readonly lastModified: string | null;
  /** URL the CSV payload was downloaded from */
  readonly resourceUrl: string;
  readonly fetchedAt: string;
}

/**
 * A fetched payload, parsed lazily.
 *
 * `records` is one-shot: it can be iterated once. Iteration throws
 * `RawStreamError` when the payload turns out to be malformed.
 */
export interface RawRecordStream {
  readonly metadata: SourceMetadata;
  /** Source headers in payload order */
  readonly headers: readonly string[];
  readonly delimiter: ';' | ',';
  readonly records: AsyncIterable<RawRecord>;
}

export interface IngestionConfig {
  /** data.gouv.fr API base, without trailing slash */
  dataGouvApiUrl: string;
  /** Per-attempt timeout */
  timeoutMs: number;
  /** Maximum attempts per request, including the first */
  maxAttempts: number;
  /** Backoff base: attempt n waits base * 2^(n-1) before retrying */
  retryBaseDelayMs: number;
}

/**
 * Subset of the global fetch the client depends on.
 */
export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export type SleepFn = (ms: number) => Promise<void>;
