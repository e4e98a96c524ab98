/**
 * JSON views of region data. Decimals are sent as strings to keep precision.
 */

import type { Commune, EmploymentMonth, Kpis, Page, RegionBudget } from '../../core/types.js';
import type { RegionStatsRecord } from '@/modules/transform/index.js';
import type { Decimal } from 'decimal.js';

const str = (value: Decimal | null): string | null => (value === null ? null : value.toString());

/** Per-capita figures always carry two decimals */
const cents = (value: Decimal | null): string | null => (value === null ? null : value.toFixed(2));

export const toRegionStatsDto = (stats: RegionStatsRecord) => ({
  regionCode: stats.regionCode,
  regionName: stats.regionName,
  year: stats.year,
  population: stats.population,
  communeCount: stats.communeCount,
  totalRevenue: str(stats.totalRevenue),
  totalExpenditure: str(stats.totalExpenditure),
  debt: str(stats.debt),
  revenuePerCapita: cents(stats.revenuePerCapita),
  expenditurePerCapita: cents(stats.expenditurePerCapita),
  debtPerCapita: cents(stats.debtPerCapita),
  salaryMass: str(stats.salaryMass),
  partialUnemploymentBase: str(stats.partialUnemploymentBase),
  employmentMonths: stats.employmentMonths,
});

export const toRegionBudgetDto = (budget: RegionBudget) => ({
  year: budget.year,
  regionCode: budget.regionCode,
  regionName: budget.regionName,
  recettes: str(budget.recettes),
  depenses: str(budget.depenses),
  dette: str(budget.dette),
  operatingRevenue: str(budget.operatingRevenue),
  operatingExpenditure: str(budget.operatingExpenditure),
  investmentRevenue: str(budget.investmentRevenue),
  investmentExpenditure: str(budget.investmentExpenditure),
});

export const toCommuneDto = (commune: Commune) => ({
  communeCode: commune.communeCode,
  communeName: commune.communeName,
  regionCode: commune.regionCode,
  regionName: commune.regionName,
  departmentCode: commune.departmentCode,
  departmentName: commune.departmentName,
  population: commune.population,
  areaKm2: str(commune.areaKm2),
  density: str(commune.density),
});

export const toEmploymentMonthDto = (month: EmploymentMonth) => ({
  regionCode: month.regionCode,
  regionName: month.regionName,
  month: month.month,
  salaryMass: str(month.salaryMass),
  partialUnemploymentBase: str(month.partialUnemploymentBase),
  salaryYoyChange: str(month.salaryYoyChange),
  partialUnemploymentShare: str(month.partialUnemploymentShare),
});

export const toPageDto = <T, D>(page: Page<T>, map: (item: T) => D) => ({
  items: page.items.map(map),
  limit: page.limit,
  offset: page.offset,
});

export const toKpisDto = (kpis: Kpis) => ({
  totalCommunes: kpis.totalCommunes,
  totalRegions: kpis.totalRegions,
  totalPopulation: kpis.totalPopulation,
  budgetYearRange: { min: kpis.budgetYearRange.min, max: kpis.budgetYearRange.max },
});
