/**
 * Transform Module - Domain Types
 */

import type { CleanRecord } from '@/modules/cleaning/index.js';
import type { RegionReference } from '@/modules/dataset-registry/index.js';
import type { Decimal } from 'decimal.js';

/**
 * Derived statistics for one region and fiscal year.
 *
 * A null field means no contributing data, never zero.
 */
export interface RegionStatsRecord {
  readonly regionCode: string;
  readonly regionName: string | null;
  readonly year: number;
  /** Sum of mapped commune populations; period-independent */
  readonly population: number | null;
  readonly communeCount: number | null;
  /** Budget recettes */
  readonly totalRevenue: Decimal | null;
  /** Budget dépenses */
  readonly totalExpenditure: Decimal | null;
  /** Budget encours de dette */
  readonly debt: Decimal | null;
  readonly revenuePerCapita: Decimal | null;
  readonly expenditurePerCapita: Decimal | null;
  readonly debtPerCapita: Decimal | null;
  /** Masse salariale summed over the year's months */
  readonly salaryMass: Decimal | null;
  /** Assiette chômage partiel summed over the year's months */
  readonly partialUnemploymentBase: Decimal | null;
  /** Months of employment data behind the two sums above */
  readonly employmentMonths: number | null;
}

export type TransformSource = 'budgets' | 'communes' | 'employment';

/**
 * Clean inputs. A null dataset failed this run and contributes nothing.
 */
export interface TransformInput {
  readonly budgets: readonly CleanRecord[] | null;
  readonly communes: readonly CleanRecord[] | null;
  readonly employment: readonly CleanRecord[] | null;
  readonly regionReference: RegionReference;
}

export interface TransformReport {
  readonly regions: number;
  readonly records: number;
  /** Communes with no region code or a code outside the reference */
  readonly excludedCommunes: number;
  readonly excludedCommuneSamples: readonly string[];
  /** Datasets absent from this run */
  readonly missingInputs: readonly TransformSource[];
  /** Regions with population only and no period to attach it to */
  readonly regionsWithoutPeriod: readonly string[];
}

export interface TransformOutput {
  readonly records: readonly RegionStatsRecord[];
  readonly report: TransformReport;
}

export const MAX_EXCLUDED_SAMPLES = 20;
