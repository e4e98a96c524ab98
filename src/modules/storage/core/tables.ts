/**
 * Table catalogue.
 *
 * Dataset tables mirror their DatasetSpec columns; the stats and source
 * tables are defined here.
 */

import { DATASET_SPECS, type DatasetSpec } from '@/modules/dataset-registry/index.js';

import type { StoredColumn, TableDefinition, TableName } from './types.js';

const fromDatasetSpec = (spec: DatasetSpec): TableDefinition => ({
  name: spec.targetTable,
  columns: spec.columns.map((column) => ({ name: column.name, type: column.type })),
  naturalKey: spec.naturalKey,
});

const REGION_STATS_COLUMNS: readonly StoredColumn[] = [
  { name: 'region_code', type: 'text' },
  { name: 'region_name', type: 'text' },
  { name: 'year', type: 'integer' },
  { name: 'population', type: 'integer' },
  { name: 'commune_count', type: 'integer' },
  { name: 'total_revenue', type: 'decimal' },
  { name: 'total_expenditure', type: 'decimal' },
  { name: 'debt', type: 'decimal' },
  { name: 'revenue_per_capita', type: 'decimal' },
  { name: 'expenditure_per_capita', type: 'decimal' },
  { name: 'debt_per_capita', type: 'decimal' },
  { name: 'salary_mass', type: 'decimal' },
  { name: 'partial_unemployment_base', type: 'decimal' },
  { name: 'employment_months', type: 'integer' },
  { name: 'run_id', type: 'text' },
];

const DATASET_SOURCES_COLUMNS: readonly StoredColumn[] = [
  { name: 'dataset_id', type: 'text' },
  { name: 'title', type: 'text' },
  { name: 'organization', type: 'text' },
  { name: 'license', type: 'text' },
  { name: 'last_modified', type: 'text' },
  { name: 'resource_url', type: 'text' },
  { name: 'fetched_at', type: 'timestamp' },
  { name: 'total_rows', type: 'integer' },
  { name: 'kept_rows', type: 'integer' },
  { name: 'rejected_rows', type: 'integer' },
  { name: 'duplicate_rows', type: 'integer' },
  { name: 'run_id', type: 'text' },
];

const datasetTable = (id: DatasetSpec['id']): TableDefinition => {
  const spec = DATASET_SPECS.find((candidate) => candidate.id === id);
  if (spec === undefined) {
    throw new Error(`No dataset spec for '${id}'`);
  }
  return fromDatasetSpec(spec);
};

export const TABLE_DEFINITIONS: Readonly<Record<TableName, TableDefinition>> = {
  dataset_sources: {
    name: 'dataset_sources',
    columns: DATASET_SOURCES_COLUMNS,
    naturalKey: ['dataset_id'],
  },
  region_budgets: datasetTable('region_budgets'),
  communes: datasetTable('communes'),
  region_employment: datasetTable('regional_employment'),
  region_stats: {
    name: 'region_stats',
    columns: REGION_STATS_COLUMNS,
    naturalKey: ['region_code', 'year'],
  },
};

export const hasColumn = (table: TableDefinition, column: string): boolean =>
  table.columns.some((candidate) => candidate.name === column);
