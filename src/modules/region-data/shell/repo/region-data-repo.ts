/**
 * Region Data Repository Implementation
 *
 * Reads the refreshed tables through the storage gateway.
 */

import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import {
  recordToRegionStats,
  recordToSourceEntry,
  type DatasetSourceEntry,
  type ReadFilter,
  type StorageGateway,
  type StoredRecord,
  type StoredValue,
} from '@/modules/storage/index.js';

import type { RegionDataRepository } from '../../core/ports.js';
import type {
  Commune,
  CommunesQuery,
  EmploymentMonth,
  EmploymentQuery,
  Kpis,
  PageQuery,
  RegionBudget,
  RegionBudgetsQuery,
  RegionStatsQuery,
} from '../../core/types.js';
import type { DatabaseError } from '@/common/types/errors.js';
import type { RegionStatsRecord } from '@/modules/transform/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface RegionDataRepoOptions {
  storage: StorageGateway;
}

// ─────────────────────────────────────────────────────────────────────────────
// Row Mapping
// ─────────────────────────────────────────────────────────────────────────────

const text = (value: StoredValue | undefined): string | null =>
  typeof value === 'string' ? value : null;

const integer = (value: StoredValue | undefined): number | null =>
  typeof value === 'number' ? value : null;

const decimal = (value: StoredValue | undefined): Decimal | null => {
  if (value === undefined || value === null) {
    return null;
  }
  return Decimal.isDecimal(value) ? value : new Decimal(value);
};

const toRegionBudget = (row: StoredRecord): RegionBudget | null => {
  const year = integer(row['year']);
  const regionCode = text(row['region_code']);
  if (year === null || regionCode === null) {
    return null;
  }
  return {
    year,
    regionCode,
    regionName: text(row['region_name']),
    recettes: decimal(row['recettes']),
    depenses: decimal(row['depenses']),
    dette: decimal(row['dette']),
    operatingRevenue: decimal(row['operating_revenue']),
    operatingExpenditure: decimal(row['operating_expenditure']),
    investmentRevenue: decimal(row['investment_revenue']),
    investmentExpenditure: decimal(row['investment_expenditure']),
  };
};

const toCommune = (row: StoredRecord): Commune | null => {
  const communeCode = text(row['commune_code']);
  const population = integer(row['population']);
  if (communeCode === null || population === null) {
    return null;
  }
  return {
    communeCode,
    communeName: text(row['commune_name']),
    regionCode: text(row['region_code']),
    regionName: text(row['region_name']),
    departmentCode: text(row['department_code']),
    departmentName: text(row['department_name']),
    population,
    areaKm2: decimal(row['area_km2']),
    density: decimal(row['density']),
  };
};

const toEmploymentMonth = (row: StoredRecord): EmploymentMonth | null => {
  const regionCode = text(row['region_code']);
  const month = text(row['month']);
  if (regionCode === null || month === null) {
    return null;
  }
  return {
    regionCode,
    regionName: text(row['region_name']),
    month,
    salaryMass: decimal(row['salary_mass']),
    partialUnemploymentBase: decimal(row['partial_unemployment_base']),
    salaryYoyChange: decimal(row['salary_yoy_change']),
    partialUnemploymentShare: decimal(row['partial_unemployment_share']),
  };
};

const isPresent = <T>(value: T | null): value is T => value !== null;

const pageFilter = (
  page: PageQuery,
  where: Record<string, string | number | undefined>
): ReadFilter => {
  const conditions: Record<string, string | number> = {};
  for (const [column, value] of Object.entries(where)) {
    if (value !== undefined) {
      conditions[column] = value;
    }
  }
  return { where: conditions, limit: page.limit, offset: page.offset };
};

// ─────────────────────────────────────────────────────────────────────────────
// Repository Implementation
// ─────────────────────────────────────────────────────────────────────────────

export const makeRegionDataRepo = (options: RegionDataRepoOptions): RegionDataRepository => {
  const { storage } = options;

  return {
    async listRegionStats(
      query: RegionStatsQuery
    ): Promise<Result<RegionStatsRecord[], DatabaseError>> {
      const result = await storage.read(
        'region_stats',
        pageFilter(query, { year: query.year, region_code: query.regionCode })
      );
      if (result.isErr()) return err(result.error);
      return ok(result.value.map(recordToRegionStats).filter(isPresent));
    },

    async listRegionBudgets(
      query: RegionBudgetsQuery
    ): Promise<Result<RegionBudget[], DatabaseError>> {
      const result = await storage.read(
        'region_budgets',
        pageFilter(query, { year: query.year, region_code: query.regionCode })
      );
      if (result.isErr()) return err(result.error);
      return ok(result.value.map(toRegionBudget).filter(isPresent));
    },

    async listCommunes(query: CommunesQuery): Promise<Result<Commune[], DatabaseError>> {
      const filter = pageFilter(query, {
        region_code: query.regionCode,
        department_code: query.departmentCode,
      });
      const result = await storage.read(
        'communes',
        query.search === undefined
          ? filter
          : { ...filter, contains: { column: 'commune_name', value: query.search } }
      );
      if (result.isErr()) return err(result.error);
      return ok(result.value.map(toCommune).filter(isPresent));
    },

    async listEmployment(query: EmploymentQuery): Promise<Result<EmploymentMonth[], DatabaseError>> {
      const result = await storage.read(
        'region_employment',
        pageFilter(query, { region_code: query.regionCode, month: query.month })
      );
      if (result.isErr()) return err(result.error);
      return ok(result.value.map(toEmploymentMonth).filter(isPresent));
    },

    async listDatasetSources(): Promise<Result<DatasetSourceEntry[], DatabaseError>> {
      const result = await storage.read('dataset_sources');
      if (result.isErr()) return err(result.error);
      return ok(result.value.map(recordToSourceEntry).filter(isPresent));
    },

    async getKpis(): Promise<Result<Kpis, DatabaseError>> {
      const communes = await storage.read('communes');
      if (communes.isErr()) return err(communes.error);

      const budgets = await storage.read('region_budgets');
      if (budgets.isErr()) return err(budgets.error);

      let totalPopulation = 0;
      for (const row of communes.value) {
        totalPopulation += integer(row['population']) ?? 0;
      }

      const regions = new Set<string>();
      let min: number | null = null;
      let max: number | null = null;
      for (const row of budgets.value) {
        const regionCode = text(row['region_code']);
        if (regionCode !== null) {
          regions.add(regionCode);
        }
        const year = integer(row['year']);
        if (year !== null) {
          min = min === null ? year : Math.min(min, year);
          max = max === null ? year : Math.max(max, year);
        }
      }

      return ok({
        totalCommunes: communes.value.length,
        totalRegions: regions.size,
        totalPopulation,
        budgetYearRange: { min, max },
      });
    },
  };
};
