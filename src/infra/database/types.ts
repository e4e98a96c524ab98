// Ignore naming conventions for database tables

import type { ColumnType, Generated } from 'kysely';

// Helper for timestamps which can be strings or Dates depending on driver config
export type Timestamp = ColumnType<Date, Date | string, Date | string>;

// NUMERIC columns come back from node-postgres as strings
export type Numeric = ColumnType<string, string | number, string | number>;

// DATE columns are parsed to Date; written as YYYY-MM-DD
export type CalendarDate = ColumnType<Date, string, string>;

// Dataset Sources Table
export interface DatasetSources {
  dataset_id: string;
  title: string | null;
  organization: string | null;
  license: string | null;
  last_modified: string | null;
  resource_url: string;
  fetched_at: Timestamp;
  total_rows: number;
  kept_rows: number;
  rejected_rows: number;
  duplicate_rows: number;
  run_id: string;
  updated_at: Generated<Timestamp>;
}

// Region Budgets Table
export interface RegionBudgets {
  year: number;
  region_code: string;
  region_name: string | null;
  recettes: Numeric | null;
  depenses: Numeric | null;
  dette: Numeric | null;
  operating_revenue: Numeric | null;
  operating_expenditure: Numeric | null;
  investment_revenue: Numeric | null;
  investment_expenditure: Numeric | null;
  updated_at: Generated<Timestamp>;
}

// Communes Table
export interface Communes {
  commune_code: string;
  commune_name: string | null;
  region_code: string | null;
  region_name: string | null;
  department_code: string | null;
  department_name: string | null;
  population: number;
  area_km2: Numeric | null;
  density: Numeric | null;
  updated_at: Generated<Timestamp>;
}

// Region Employment Table
export interface RegionEmployment {
  region_code: string;
  region_name: string | null;
  month: CalendarDate;
  salary_mass: Numeric | null;
  partial_unemployment_base: Numeric | null;
  salary_yoy_change: Numeric | null;
  partial_unemployment_share: Numeric | null;
  updated_at: Generated<Timestamp>;
}

// Region Stats Table
export interface RegionStats {
  region_code: string;
  region_name: string | null;
  year: number;
  population: number | null;
  commune_count: number | null;
  total_revenue: Numeric | null;
  total_expenditure: Numeric | null;
  debt: Numeric | null;
  revenue_per_capita: Numeric | null;
  expenditure_per_capita: Numeric | null;
  debt_per_capita: Numeric | null;
  salary_mass: Numeric | null;
  partial_unemployment_base: Numeric | null;
  employment_months: number | null;
  run_id: string;
  updated_at: Generated<Timestamp>;
}

export interface RegionInsightsDatabase {
  dataset_sources: DatasetSources;
  region_budgets: RegionBudgets;
  communes: Communes;
  region_employment: RegionEmployment;
  region_stats: RegionStats;
}
