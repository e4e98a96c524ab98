/**
 * Cleaning Module - Domain Types
 */

import type { ValidationFailure } from '@/common/types/errors.js';
import type { DatasetId } from '@/modules/dataset-registry/index.js';
import type { Decimal } from 'decimal.js';

/**
 * A typed field value.
 * - integer columns hold numbers
 * - decimal columns hold Decimal
 * - text and date columns hold strings (dates as `YYYY-MM-DD`)
 */
export type FieldValue = string | number | Decimal | null;

/**
 * One validated row keyed by canonical column name. Natural key fields
 * are always non-null.
 */
export type CleanRecord = Readonly<Record<string, FieldValue>>;

export interface CleaningReport {
  readonly datasetId: DatasetId;
  /** Rows received */
  readonly totalRows: number;
  /** Rows in the output */
  readonly keptRows: number;
  /** Rows dropped by coercion, missing-value or reject-all duplicate rules */
  readonly rejectedRows: number;
  /** Earlier occurrences superseded under keep-last */
  readonly duplicateRows: number;
  /** Optional fields stored as null (missing or uncoercible) */
  readonly nullFilled: number;
  /** Missing numeric fields defaulted to zero by policy */
  readonly zeroFilled: number;
  /** Source headers matched by no declared column */
  readonly ignoredColumns: readonly string[];
  /** First rejections, for diagnostics */
  readonly failures: readonly ValidationFailure[];
}

export interface CleanOutput {
  readonly records: readonly CleanRecord[];
  readonly report: CleaningReport;
}

/**
 * Number of failures kept in a report.
 */
export const MAX_REPORTED_FAILURES = 20;
