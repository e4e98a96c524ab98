/**
 * Test data builders/factories
 * Provides sensible defaults for test entities
 */

import pinoLib, { type Logger } from 'pino';

import type { AppConfig } from '@/infra/config/env.js';
import type { CleaningReport, CleanRecord } from '@/modules/cleaning/index.js';
import type { DatasetId } from '@/modules/dataset-registry/index.js';
import type { HealthCheckResult, HealthChecker } from '@/modules/health/index.js';
import type { RawRecord, RawRecordStream, SourceMetadata } from '@/modules/ingestion/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Health
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Create a health check result with defaults
 */
export const makeHealthCheckResult = (
  overrides: Partial<HealthCheckResult> = {}
): HealthCheckResult => ({
  name: 'test-check',
  status: 'healthy',
  ...overrides,
});

/**
 * Create a health checker function that returns a fixed result
 */
export const makeHealthChecker = (result: Partial<HealthCheckResult> = {}): HealthChecker => {
  const fullResult = makeHealthCheckResult(result);
  return async () => fullResult;
};

/**
 * Create a health checker that resolves after a delay and reports its latency
 */
export const makeSlowHealthChecker = (
  delayMs: number,
  result: Partial<HealthCheckResult> = {}
): HealthChecker => {
  return async () => {
    const start = Date.now();
    await new Promise((resolve) => setTimeout(resolve, delayMs));
    return makeHealthCheckResult({ ...result, latencyMs: Date.now() - start });
  };
};

/**
 * Create a health checker that throws an error
 */
export const makeFailingHealthChecker = (errorMessage: string): HealthChecker => {
  return async () => {
    throw new Error(errorMessage);
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Config & Logger
// ─────────────────────────────────────────────────────────────────────────────

export const makeTestLogger = (): Logger => pinoLib({ level: 'silent' });

/**
 * Create a test configuration with defaults
 */
export const makeTestConfig = (overrides: Partial<AppConfig> = {}): AppConfig => {
  const defaults: AppConfig = {
    server: {
      port: 3000,
      host: '0.0.0.0',
      version: '0.0.0-test',
      isDevelopment: false,
      isProduction: false,
      isTest: true,
    },
    logger: {
      level: 'silent',
      pretty: false,
    },
    database: {
      url: undefined,
    },
    cors: {
      allowedOrigins: undefined,
      clientBaseUrl: undefined,
    },
    refresh: {
      intervalMs: undefined,
      runOnStart: false,
      historySize: 10,
    },
    ingestion: {
      dataGouvApiUrl: 'https://catalog.test/api/1',
      timeoutMs: 1000,
      maxAttempts: 3,
      retryBaseDelayMs: 10,
    },
    cache: {
      enabled: true,
      maxEntries: 100,
      defaultTtlMs: 60_000,
      ttlMs: {
        regionStats: 60_000,
        budgets: 60_000,
        communes: 60_000,
        employment: 60_000,
        datasets: 60_000,
        kpis: 60_000,
      },
    },
  };

  return {
    ...defaults,
    ...overrides,
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Raw Rows (source headers, as published)
// ─────────────────────────────────────────────────────────────────────────────

export const BUDGET_HEADERS = ['exer', 'reg', 'lbudg', 'rec_totales', 'dep_totales', 'encours_dette'];

export const makeBudgetRow = (overrides: Record<string, string> = {}): RawRecord => ({
  exer: '2023',
  reg: '11',
  lbudg: 'REG ILE-DE-FRANCE',
  rec_totales: '1000',
  dep_totales: '800',
  encours_dette: '',
  ...overrides,
});

export const COMMUNE_HEADERS = ['code_insee', 'nom_standard', 'reg_code', 'reg_nom', 'dep_code', 'population'];

export const makeCommuneRow = (overrides: Record<string, string> = {}): RawRecord => ({
  code_insee: '75056',
  nom_standard: 'Paris',
  reg_code: '11',
  reg_nom: 'Île-de-France',
  dep_code: '75',
  population: '500',
  ...overrides,
});

export const EMPLOYMENT_HEADERS = ['code_region', 'region', 'mois', 'masse_salariale_brute', 'assiette_chomage_partiel'];

export const makeEmploymentRow = (overrides: Record<string, string> = {}): RawRecord => ({
  code_region: '11',
  region: 'Île-de-France',
  mois: '2023-01',
  masse_salariale_brute: '100',
  assiette_chomage_partiel: '5',
  ...overrides,
});

/**
 * Renders rows as CSV text with the given header order.
 */
export const toCsv = (
  headers: readonly string[],
  rows: readonly RawRecord[],
  delimiter: ';' | ',' = ';'
): string =>
  [headers.join(delimiter), ...rows.map((row) => headers.map((h) => row[h] ?? '').join(delimiter))]
    .join('\n')
    .concat('\n');

// ─────────────────────────────────────────────────────────────────────────────
// Streams & Reports
// ─────────────────────────────────────────────────────────────────────────────

export const makeSourceMetadata = (
  datasetId: DatasetId,
  overrides: Partial<SourceMetadata> = {}
): SourceMetadata => ({
  datasetId,
  title: `Title of ${datasetId}`,
  organization: 'Test Publisher',
  license: 'lov2',
  lastModified: '2024-01-15T00:00:00',
  resourceUrl: `https://files.test/${datasetId}.csv`,
  fetchedAt: '2024-02-01T00:00:00.000Z',
  ...overrides,
});

async function* iterate(rows: readonly RawRecord[]): AsyncGenerator<RawRecord> {
  for (const row of rows) {
    yield row;
  }
}

/**
 * A RawRecordStream over in-memory rows. Headers default to the first row's keys.
 */
export const makeRawStream = (
  datasetId: DatasetId,
  rows: readonly RawRecord[],
  headers?: readonly string[]
): RawRecordStream => ({
  metadata: makeSourceMetadata(datasetId),
  headers: headers ?? Object.keys(rows[0] ?? {}),
  delimiter: ';',
  records: iterate(rows),
});

export const makeCleaningReport = (
  datasetId: DatasetId,
  overrides: Partial<CleaningReport> = {}
): CleaningReport => ({
  datasetId,
  totalRows: 0,
  keptRows: 0,
  rejectedRows: 0,
  duplicateRows: 0,
  nullFilled: 0,
  zeroFilled: 0,
  ignoredColumns: [],
  failures: [],
  ...overrides,
});

/**
 * Clean record builder; pass fields as they come out of the cleaner.
 */
export const makeCleanRecord = (fields: Record<string, CleanRecord[string]>): CleanRecord => ({
  ...fields,
});
