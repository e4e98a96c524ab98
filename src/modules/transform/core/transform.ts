/**
 * Region Transformer
 *
 * Joins the three clean datasets on region code and derives one
 * RegionStatsRecord per (region, year):
 * - communes are rolled up to their region for population
 * - budgets give recettes, dépenses and dette
 * - monthly employment figures are summed per calendar year
 *
 * Aggregation is always a sum. A metric with no contributing input is
 * null, never zero.
 */

import { Decimal } from 'decimal.js';

import { addNullable, decimalField, integerField, textField } from './fields.js';
import {
  MAX_EXCLUDED_SAMPLES,
  type RegionStatsRecord,
  type TransformInput,
  type TransformOutput,
  type TransformSource,
} from './types.js';

import type { CleanRecord } from '@/modules/cleaning/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Accumulators
// ─────────────────────────────────────────────────────────────────────────────

interface PeriodAccumulator {
  revenue: Decimal | null;
  expenditure: Decimal | null;
  debt: Decimal | null;
  salaryMass: Decimal | null;
  partialUnemploymentBase: Decimal | null;
  employmentMonths: number;
}

interface RegionAccumulator {
  readonly code: string;
  referenceName: string | null;
  communeName: string | null;
  employmentName: string | null;
  budgetName: string | null;
  population: number | null;
  communeCount: number;
  readonly periods: Map<number, PeriodAccumulator>;
}

const emptyPeriod = (): PeriodAccumulator => ({
  revenue: null,
  expenditure: null,
  debt: null,
  salaryMass: null,
  partialUnemploymentBase: null,
  employmentMonths: 0,
});

class RegionTable {
  private readonly regions = new Map<string, RegionAccumulator>();

  region(code: string): RegionAccumulator {
    let region = this.regions.get(code);
    if (region === undefined) {
      region = {
        code,
        referenceName: null,
        communeName: null,
        employmentName: null,
        budgetName: null,
        population: null,
        communeCount: 0,
        periods: new Map(),
      };
      this.regions.set(code, region);
    }
    return region;
  }

  period(code: string, year: number): PeriodAccumulator {
    const region = this.region(code);
    let period = region.periods.get(year);
    if (period === undefined) {
      period = emptyPeriod();
      region.periods.set(year, period);
    }
    return period;
  }

  all(): RegionAccumulator[] {
    return [...this.regions.values()];
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Budget files label regions in capitals with a "REG " prefix.
 *
 * @example cleanBudgetLabel('REG ILE-DE-FRANCE') // 'Ile-De-France'
 */
export const cleanBudgetLabel = (label: string): string =>
  label
    .replace(/^REG\s+/i, '')
    .trim()
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_match, separator: string, letter: string) => {
      return separator + letter.toUpperCase();
    });

/**
 * Sum divided by population, rounded half-up to cents.
 * Null when either side is absent or the population is zero.
 */
export const perCapita = (sum: Decimal | null, population: number | null): Decimal | null => {
  if (sum === null || population === null || population === 0) {
    return null;
  }
  return sum.div(population).toDecimalPlaces(2, Decimal.ROUND_HALF_UP);
};

/**
 * A section total from its operating and investment halves, when both exist.
 */
const sectionTotal = (operating: Decimal | null, investment: Decimal | null): Decimal | null =>
  operating !== null && investment !== null ? operating.plus(investment) : null;

const yearOfMonth = (month: string): number | null => {
  const year = Number(month.slice(0, 4));
  return Number.isInteger(year) && year > 0 ? year : null;
};

// ─────────────────────────────────────────────────────────────────────────────
// Folding
// ─────────────────────────────────────────────────────────────────────────────

const foldCommunes = (
  table: RegionTable,
  communes: readonly CleanRecord[],
  reference: TransformInput['regionReference']
): { excluded: number; samples: string[] } => {
  let excluded = 0;
  const samples: string[] = [];

  for (const commune of communes) {
    const regionCode = textField(commune, 'region_code');
    if (regionCode === null || !reference.has(regionCode)) {
      excluded++;
      if (samples.length < MAX_EXCLUDED_SAMPLES) {
        samples.push(textField(commune, 'commune_code') ?? '?');
      }
      continue;
    }

    const region = table.region(regionCode);
    region.communeCount++;
    region.communeName ??= textField(commune, 'region_name');

    const population = integerField(commune, 'population');
    if (population !== null) {
      region.population = (region.population ?? 0) + population;
    }
  }

  return { excluded, samples };
};

const foldBudgets = (table: RegionTable, budgets: readonly CleanRecord[]): void => {
  for (const row of budgets) {
    const regionCode = textField(row, 'region_code');
    const year = integerField(row, 'year');
    if (regionCode === null || year === null) {
      continue;
    }

    const revenue =
      decimalField(row, 'recettes') ??
      sectionTotal(decimalField(row, 'operating_revenue'), decimalField(row, 'investment_revenue'));
    const expenditure =
      decimalField(row, 'depenses') ??
      sectionTotal(
        decimalField(row, 'operating_expenditure'),
        decimalField(row, 'investment_expenditure')
      );

    const period = table.period(regionCode, year);
    period.revenue = addNullable(period.revenue, revenue);
    period.expenditure = addNullable(period.expenditure, expenditure);
    period.debt = addNullable(period.debt, decimalField(row, 'dette'));

    const label = textField(row, 'region_name');
    const region = table.region(regionCode);
    if (label !== null) {
      region.budgetName ??= cleanBudgetLabel(label);
    }
  }
};

const foldEmployment = (table: RegionTable, employment: readonly CleanRecord[]): void => {
  for (const row of employment) {
    const regionCode = textField(row, 'region_code');
    const month = textField(row, 'month');
    const year = month === null ? null : yearOfMonth(month);
    if (regionCode === null || year === null) {
      continue;
    }

    const period = table.period(regionCode, year);
    period.salaryMass = addNullable(period.salaryMass, decimalField(row, 'salary_mass'));
    period.partialUnemploymentBase = addNullable(
      period.partialUnemploymentBase,
      decimalField(row, 'partial_unemployment_base')
    );
    period.employmentMonths++;

    table.region(regionCode).employmentName ??= textField(row, 'region_name');
  }
};

// ─────────────────────────────────────────────────────────────────────────────
// Entry Point
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Derives per-region statistics from whichever inputs are present.
 *
 * Years come from the region's own budget and employment rows. A region
 * known only through its communes takes every year observed in the run.
 * Output is ordered by region code, then year.
 */
export const transformRegions = (input: TransformInput): TransformOutput => {
  const { regionReference } = input;
  const table = new RegionTable();
  const missingInputs: TransformSource[] = [];

  let excludedCommunes = 0;
  let excludedCommuneSamples: string[] = [];

  if (input.communes === null) {
    missingInputs.push('communes');
  } else {
    const folded = foldCommunes(table, input.communes, regionReference);
    excludedCommunes = folded.excluded;
    excludedCommuneSamples = folded.samples;
  }

  if (input.budgets === null) {
    missingInputs.push('budgets');
  } else {
    foldBudgets(table, input.budgets);
  }

  if (input.employment === null) {
    missingInputs.push('employment');
  } else {
    foldEmployment(table, input.employment);
  }

  const regions = table.all();
  const observedYears = new Set<number>();
  for (const region of regions) {
    region.referenceName = regionReference.get(region.code) ?? null;
    for (const year of region.periods.keys()) {
      observedYears.add(year);
    }
  }

  const records: RegionStatsRecord[] = [];
  const regionsWithoutPeriod: string[] = [];
  const hasCommunes = input.communes !== null;

  for (const region of regions) {
    const years =
      region.periods.size > 0 ? [...region.periods.keys()] : [...observedYears];
    if (years.length === 0) {
      regionsWithoutPeriod.push(region.code);
      continue;
    }

    const regionName =
      region.referenceName ?? region.communeName ?? region.employmentName ?? region.budgetName;

    for (const year of years) {
      const period = region.periods.get(year) ?? emptyPeriod();
      records.push({
        regionCode: region.code,
        regionName,
        year,
        population: region.population,
        communeCount: hasCommunes ? region.communeCount : null,
        totalRevenue: period.revenue,
        totalExpenditure: period.expenditure,
        debt: period.debt,
        revenuePerCapita: perCapita(period.revenue, region.population),
        expenditurePerCapita: perCapita(period.expenditure, region.population),
        debtPerCapita: perCapita(period.debt, region.population),
        salaryMass: period.salaryMass,
        partialUnemploymentBase: period.partialUnemploymentBase,
        employmentMonths: period.employmentMonths > 0 ? period.employmentMonths : null,
      });
    }
  }

  records.sort((a, b) =>
    a.regionCode === b.regionCode ? a.year - b.year : a.regionCode < b.regionCode ? -1 : 1
  );

  return {
    records,
    report: {
      regions: new Set(records.map((r) => r.regionCode)).size,
      records: records.length,
      excludedCommunes,
      excludedCommuneSamples,
      missingInputs,
      regionsWithoutPeriod,
    },
  };
};
