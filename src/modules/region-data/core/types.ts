/**
 * Region Data Module - Domain Types
 */

import type { Decimal } from 'decimal.js';

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

export const DEFAULT_PAGE_LIMIT = 100;
export const MAX_PAGE_LIMIT = 1000;
export const MAX_SEARCH_LENGTH = 100;

// ─────────────────────────────────────────────────────────────────────────────
// Stored Entities
// ─────────────────────────────────────────────────────────────────────────────

export interface RegionBudget {
  readonly year: number;
  readonly regionCode: string;
  readonly regionName: string | null;
  readonly recettes: Decimal | null;
  readonly depenses: Decimal | null;
  readonly dette: Decimal | null;
  readonly operatingRevenue: Decimal | null;
  readonly operatingExpenditure: Decimal | null;
  readonly investmentRevenue: Decimal | null;
  readonly investmentExpenditure: Decimal | null;
}

export interface Commune {
  readonly communeCode: string;
  readonly communeName: string | null;
  readonly regionCode: string | null;
  readonly regionName: string | null;
  readonly departmentCode: string | null;
  readonly departmentName: string | null;
  readonly population: number;
  readonly areaKm2: Decimal | null;
  readonly density: Decimal | null;
}

export interface EmploymentMonth {
  readonly regionCode: string;
  readonly regionName: string | null;
  /** First day of the month, YYYY-MM-DD */
  readonly month: string;
  readonly salaryMass: Decimal | null;
  readonly partialUnemploymentBase: Decimal | null;
  readonly salaryYoyChange: Decimal | null;
  readonly partialUnemploymentShare: Decimal | null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Queries
// ─────────────────────────────────────────────────────────────────────────────

export interface PageQuery {
  readonly limit: number;
  readonly offset: number;
}

export interface RegionStatsQuery extends PageQuery {
  readonly year?: number;
  readonly regionCode?: string;
}

export interface RegionBudgetsQuery extends PageQuery {
  readonly year?: number;
  readonly regionCode?: string;
}

export interface CommunesQuery extends PageQuery {
  readonly regionCode?: string;
  readonly departmentCode?: string;
  /** Case-insensitive substring of the commune name */
  readonly search?: string;
}

export interface EmploymentQuery extends PageQuery {
  readonly regionCode?: string;
  /** YYYY-MM-DD, first day of the month */
  readonly month?: string;
}

/**
 * Unvalidated query input, as received from a transport.
 */
export interface RawQueryInput {
  readonly year?: number;
  readonly regionCode?: string;
  readonly departmentCode?: string;
  readonly search?: string;
  readonly month?: string;
  readonly limit?: number;
  readonly offset?: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Summary
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Headline figures over the stored tables.
 */
export interface Kpis {
  readonly totalCommunes: number;
  /** Distinct region codes with at least one budget row */
  readonly totalRegions: number;
  readonly totalPopulation: number;
  readonly budgetYearRange: { readonly min: number | null; readonly max: number | null };
}

export interface Page<T> {
  readonly items: readonly T[];
  readonly limit: number;
  readonly offset: number;
}
