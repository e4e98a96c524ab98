/**
 * Conversions between domain records and stored rows.
 */

import { Decimal } from 'decimal.js';

import { isDatasetId } from '@/modules/dataset-registry/index.js';

import type { StoredRecord, StoredValue } from './types.js';
import type { CleaningReport } from '@/modules/cleaning/index.js';
import type { SourceMetadata } from '@/modules/ingestion/index.js';
import type { RegionStatsRecord } from '@/modules/transform/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Field Readers
// ─────────────────────────────────────────────────────────────────────────────

const readText = (value: StoredValue | undefined): string | null =>
  typeof value === 'string' ? value : null;

const readInteger = (value: StoredValue | undefined): number | null =>
  typeof value === 'number' ? value : null;

const readDecimal = (value: StoredValue | undefined): Decimal | null => {
  if (value === undefined || value === null) {
    return null;
  }
  if (Decimal.isDecimal(value)) {
    return value;
  }
  return new Decimal(value);
};

// ─────────────────────────────────────────────────────────────────────────────
// Region Stats
// ─────────────────────────────────────────────────────────────────────────────

export const regionStatsToRecord = (stats: RegionStatsRecord, runId: string): StoredRecord => ({
  region_code: stats.regionCode,
  region_name: stats.regionName,
  year: stats.year,
  population: stats.population,
  commune_count: stats.communeCount,
  total_revenue: stats.totalRevenue,
  total_expenditure: stats.totalExpenditure,
  debt: stats.debt,
  revenue_per_capita: stats.revenuePerCapita,
  expenditure_per_capita: stats.expenditurePerCapita,
  debt_per_capita: stats.debtPerCapita,
  salary_mass: stats.salaryMass,
  partial_unemployment_base: stats.partialUnemploymentBase,
  employment_months: stats.employmentMonths,
  run_id: runId,
});

/**
 * Returns null for a row missing its key fields.
 */
export const recordToRegionStats = (record: StoredRecord): RegionStatsRecord | null => {
  const regionCode = readText(record['region_code']);
  const year = readInteger(record['year']);
  if (regionCode === null || year === null) {
    return null;
  }

  return {
    regionCode,
    regionName: readText(record['region_name']),
    year,
    population: readInteger(record['population']),
    communeCount: readInteger(record['commune_count']),
    totalRevenue: readDecimal(record['total_revenue']),
    totalExpenditure: readDecimal(record['total_expenditure']),
    debt: readDecimal(record['debt']),
    revenuePerCapita: readDecimal(record['revenue_per_capita']),
    expenditurePerCapita: readDecimal(record['expenditure_per_capita']),
    debtPerCapita: readDecimal(record['debt_per_capita']),
    salaryMass: readDecimal(record['salary_mass']),
    partialUnemploymentBase: readDecimal(record['partial_unemployment_base']),
    employmentMonths: readInteger(record['employment_months']),
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Dataset Sources
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Provenance of the last successful fetch of a dataset.
 */
export interface DatasetSourceEntry extends SourceMetadata {
  readonly totalRows: number;
  readonly keptRows: number;
  readonly rejectedRows: number;
  readonly duplicateRows: number;
  readonly runId: string;
}

export const sourceEntryToRecord = (
  metadata: SourceMetadata,
  report: CleaningReport,
  runId: string
): StoredRecord => ({
  dataset_id: metadata.datasetId,
  title: metadata.title,
  organization: metadata.organization,
  license: metadata.license,
  last_modified: metadata.lastModified,
  resource_url: metadata.resourceUrl,
  fetched_at: metadata.fetchedAt,
  total_rows: report.totalRows,
  kept_rows: report.keptRows,
  rejected_rows: report.rejectedRows,
  duplicate_rows: report.duplicateRows,
  run_id: runId,
});

export const recordToSourceEntry = (record: StoredRecord): DatasetSourceEntry | null => {
  const datasetId = readText(record['dataset_id']);
  const resourceUrl = readText(record['resource_url']);
  const fetchedAt = readText(record['fetched_at']);
  const runId = readText(record['run_id']);
  if (
    datasetId === null ||
    !isDatasetId(datasetId) ||
    resourceUrl === null ||
    fetchedAt === null ||
    runId === null
  ) {
    return null;
  }

  return {
    datasetId,
    title: readText(record['title']),
    organization: readText(record['organization']),
    license: readText(record['license']),
    lastModified: readText(record['last_modified']),
    resourceUrl,
    fetchedAt,
    totalRows: readInteger(record['total_rows']) ?? 0,
    keptRows: readInteger(record['kept_rows']) ?? 0,
    rejectedRows: readInteger(record['rejected_rows']) ?? 0,
    duplicateRows: readInteger(record['duplicate_rows']) ?? 0,
    runId,
  };
};
