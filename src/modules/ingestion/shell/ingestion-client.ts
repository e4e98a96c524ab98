/**
 * Ingestion Client
 *
 * Downloads a dataset's CSV payload over HTTP and exposes it as a lazy,
 * one-shot sequence of RawRecord. Catalog sources are first resolved
 * through the data.gouv.fr API to their CSV resource.
 *
 * Every request gets a per-attempt timeout; transient failures (network
 * errors, timeouts, 5xx, 408, 429) are retried with exponential backoff.
 */

import { setTimeout as sleepFor } from 'node:timers/promises';

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { parse } from 'csv-parse';
import { parse as parseSync } from 'csv-parse/sync';
import { err, ok, type Result } from 'neverthrow';

import { describeError } from '@/common/types/errors.js';
import { resolveColumns, type DatasetSpec } from '@/modules/dataset-registry/index.js';

import {
  RawStreamError,
  createSchemaMismatchError,
  createSourceUnavailableError,
  type IngestionError,
  type SourceUnavailableError,
} from '../core/errors.js';
import { decodePayload, detectDelimiter, isStringRecord } from '../core/payload.js';
import { isTransientStatus, withRetry, type AttemptFailure } from '../core/retry.js';

import type {
  FetchFn,
  IngestionConfig,
  RawRecord,
  RawRecordStream,
  SleepFn,
  SourceMetadata,
} from '../core/types.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Catalog Schemas
// ─────────────────────────────────────────────────────────────────────────────

const NullableString = Type.Optional(Type.Union([Type.String(), Type.Null()]));

const CatalogResourceSchema = Type.Object({
  url: Type.String(),
  format: NullableString,
  title: NullableString,
  last_modified: NullableString,
});

const CatalogDatasetSchema = Type.Object({
  title: Type.String(),
  license: NullableString,
  last_modified: NullableString,
  organization: Type.Optional(Type.Union([Type.Object({ name: Type.String() }), Type.Null()])),
  resources: Type.Array(CatalogResourceSchema),
});

type CatalogDataset = Static<typeof CatalogDatasetSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface IngestionClient {
  /**
   * Fetches a dataset. The HTTP exchange completes before the stream is
   * returned; rows are parsed as the stream is iterated.
   */
  fetch(spec: DatasetSpec): Promise<Result<RawRecordStream, IngestionError>>;
}

export interface IngestionClientOptions {
  config: IngestionConfig;
  logger: Logger;
  /** Defaults to the global fetch */
  fetch?: FetchFn;
  /** Defaults to a timer-based sleep */
  sleep?: SleepFn;
  now?: () => Date;
}

interface ResolvedSource {
  url: string;
  catalog: CatalogDataset | null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const defaultSleep: SleepFn = async (ms) => {
  await sleepFor(ms);
};

const isCsvResource = (resource: CatalogDataset['resources'][number]): boolean =>
  resource.format?.toLowerCase() === 'csv';

const readHeader = (text: string, delimiter: ';' | ','): string[] | null => {
  try {
    const rows: unknown = parseSync(text, { delimiter, to_line: 1, relax_quotes: true });
    if (!Array.isArray(rows)) {
      return null;
    }
    const first: unknown = rows[0];
    if (!Array.isArray(first)) {
      return null;
    }
    return first.filter((cell): cell is string => typeof cell === 'string').map((h) => h.trim());
  } catch {
    return null;
  }
};

async function* parseRecords(
  text: string,
  delimiter: ';' | ',',
  datasetId: string
): AsyncGenerator<RawRecord> {
  const parser = parse(text, {
    columns: true,
    delimiter,
    skip_empty_lines: true,
    trim: true,
    relax_quotes: true,
  });

  try {
    for await (const row of parser) {
      const record: unknown = row;
      if (!isStringRecord(record)) {
        throw new Error('Parsed row is not a header-keyed record');
      }
      yield record;
    }
  } catch (error) {
    throw new RawStreamError(
      createSourceUnavailableError(datasetId, `Malformed CSV payload: ${describeError(error)}`, {
        retryable: false,
        attempts: 1,
        cause: error,
      })
    );
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates the HTTP ingestion client.
 */
export const makeIngestionClient = (options: IngestionClientOptions): IngestionClient => {
  const { config } = options;
  const fetchFn: FetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  const sleep = options.sleep ?? defaultSleep;
  const now = options.now ?? (() => new Date());
  const log = options.logger.child({ component: 'IngestionClient' });

  /**
   * One HTTP attempt. The timeout signal also bounds reading the body.
   */
  const attemptRequest = async (
    url: string,
    accept: string
  ): Promise<Result<Uint8Array, AttemptFailure>> => {
    let response: Response;
    try {
      response = await fetchFn(url, {
        headers: { accept },
        signal: AbortSignal.timeout(config.timeoutMs),
      });
    } catch (error) {
      return err({ message: `Request failed: ${describeError(error)}`, retryable: true, cause: error });
    }

    if (!response.ok) {
      return err({
        message: `HTTP ${String(response.status)} from ${url}`,
        retryable: isTransientStatus(response.status),
        status: response.status,
      });
    }

    try {
      return ok(new Uint8Array(await response.arrayBuffer()));
    } catch (error) {
      return err({
        message: `Failed to read response body: ${describeError(error)}`,
        retryable: true,
        cause: error,
      });
    }
  };

  const request = async (
    datasetId: string,
    url: string,
    accept: string
  ): Promise<Result<Uint8Array, SourceUnavailableError>> => {
    const result = await withRetry(() => attemptRequest(url, accept), {
      maxAttempts: config.maxAttempts,
      baseDelayMs: config.retryBaseDelayMs,
      sleep,
      onRetry: (failure, attempt, delayMs) => {
        log.warn(
          { datasetId, url, attempt, delayMs, status: failure.status, err: failure.cause },
          `Fetch attempt failed, retrying: ${failure.message}`
        );
      },
    });

    return result.mapErr((failure) =>
      createSourceUnavailableError(datasetId, failure.message, {
        retryable: failure.retryable,
        attempts: failure.attempts,
        status: failure.status,
        cause: failure.cause,
      })
    );
  };

  const resolveSource = async (
    spec: DatasetSpec
  ): Promise<Result<ResolvedSource, SourceUnavailableError>> => {
    if (spec.source.kind === 'url') {
      return ok({ url: spec.source.url, catalog: null });
    }

    const catalogUrl = `${config.dataGouvApiUrl}/datasets/${encodeURIComponent(spec.source.slug)}/`;
    const bodyResult = await request(spec.id, catalogUrl, 'application/json');
    if (bodyResult.isErr()) {
      return err(bodyResult.error);
    }

    let catalog: unknown;
    try {
      catalog = JSON.parse(decodePayload(bodyResult.value));
    } catch (error) {
      return err(
        createSourceUnavailableError(spec.id, 'Catalog response is not valid JSON', {
          retryable: false,
          attempts: 1,
          cause: error,
        })
      );
    }

    if (!Value.Check(CatalogDatasetSchema, catalog)) {
      return err(
        createSourceUnavailableError(spec.id, 'Catalog response has an unexpected shape', {
          retryable: false,
          attempts: 1,
        })
      );
    }

    const resource = catalog.resources.find(isCsvResource);
    if (resource === undefined) {
      return err(
        createSourceUnavailableError(spec.id, `No CSV resource in catalog entry '${spec.source.slug}'`, {
          retryable: false,
          attempts: 1,
        })
      );
    }

    return ok({ url: resource.url, catalog });
  };

  const buildMetadata = (spec: DatasetSpec, source: ResolvedSource): SourceMetadata => ({
    datasetId: spec.id,
    title: source.catalog?.title ?? null,
    organization: source.catalog?.organization?.name ?? null,
    license: source.catalog?.license ?? null,
    lastModified: source.catalog?.last_modified ?? null,
    resourceUrl: source.url,
    fetchedAt: now().toISOString(),
  });

  return {
    async fetch(spec) {
      log.info({ datasetId: spec.id, source: spec.source }, 'Fetching dataset');

      const sourceResult = await resolveSource(spec);
      if (sourceResult.isErr()) {
        return err(sourceResult.error);
      }
      const source = sourceResult.value;

      const payloadResult = await request(spec.id, source.url, 'text/csv');
      if (payloadResult.isErr()) {
        return err(payloadResult.error);
      }

      const text = decodePayload(payloadResult.value);
      if (text.trim() === '') {
        return err(
          createSourceUnavailableError(spec.id, `Empty payload from ${source.url}`, {
            retryable: false,
            attempts: 1,
          })
        );
      }

      const delimiter = spec.delimiter ?? detectDelimiter(text);
      const headers = readHeader(text, delimiter);
      if (headers === null) {
        return err(
          createSourceUnavailableError(spec.id, `Unreadable CSV header from ${source.url}`, {
            retryable: false,
            attempts: 1,
          })
        );
      }

      // A payload matching none of the declared columns is not this dataset
      const resolution = resolveColumns(spec, headers);
      if (resolution.mapping.size === 0) {
        const required = spec.columns.filter((c) => c.required).map((c) => c.name);
        return err(createSchemaMismatchError(spec.id, required, headers));
      }

      log.info(
        { datasetId: spec.id, url: source.url, bytes: payloadResult.value.byteLength, delimiter },
        'Dataset payload downloaded'
      );

      return ok({
        metadata: buildMetadata(spec, source),
        headers,
        delimiter,
        records: parseRecords(text, delimiter, spec.id),
      });
    },
  };
};
