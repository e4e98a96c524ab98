/**
 * Dataset Registry - Domain Types
 */

// ─────────────────────────────────────────────────────────────────────────────
// Column Schema
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Semantic type a raw text value is coerced to.
 * - integer: whole number (JS number)
 * - decimal: arbitrary precision (Decimal)
 * - text: trimmed string
 * - date: calendar date as `YYYY-MM-DD`
 */
export type SemanticType = 'integer' | 'decimal' | 'text' | 'date';

/**
 * What to do when a field is empty or holds a missing-value token.
 */
export type MissingValuePolicy = 'reject' | 'zero' | 'null';

/**
 * Canonical forms applied to text identifiers.
 * - region-code: INSEE region code, leading zeros stripped then padded to 2 (`011` → `11`)
 * - insee-code: INSEE commune code, upper-cased and padded to 5 (`1001` → `01001`)
 */
export type TextFormat = 'region-code' | 'insee-code';

/**
 * Resolution kept for date columns. `month` truncates every date to the
 * first day of its month (`2023-01-31` → `2023-01-01`).
 */
export type DatePrecision = 'day' | 'month';

export interface ColumnSpec {
  /** Canonical column name */
  readonly name: string;
  readonly type: SemanticType;
  /** Source header variants mapped to this column */
  readonly aliases: readonly string[];
  /** Required columns must be present in the header; coercion failures drop the row */
  readonly required: boolean;
  readonly onMissing: MissingValuePolicy;
  readonly format?: TextFormat;
  /** Date columns only; defaults to `day` */
  readonly precision?: DatePrecision;
}

// ─────────────────────────────────────────────────────────────────────────────
// Dataset Spec
// ─────────────────────────────────────────────────────────────────────────────

export type DatasetId = 'region_budgets' | 'communes' | 'regional_employment';

export const DATASET_IDS: readonly DatasetId[] = [
  'region_budgets',
  'communes',
  'regional_employment',
];

export const isDatasetId = (value: string): value is DatasetId =>
  DATASET_IDS.some((id) => id === value);

/**
 * Where a dataset is downloaded from.
 * - data-gouv: catalog slug, resolved to the dataset's first CSV resource
 * - url: direct CSV location
 */
export type SourceLocator =
  | { readonly kind: 'data-gouv'; readonly slug: string }
  | { readonly kind: 'url'; readonly url: string };

/**
 * How rows sharing a natural key are resolved.
 * - keep-last: the occurrence with the highest input index wins
 * - reject-all: every occurrence of the key is rejected
 */
export type DuplicatePolicy = 'keep-last' | 'reject-all';

export type RefreshCadence = 'monthly' | 'quarterly' | 'yearly';

/** Table a dataset's clean records are upserted into */
export type DatasetTable = 'region_budgets' | 'communes' | 'region_employment';

export interface DatasetSpec {
  readonly id: DatasetId;
  readonly displayName: string;
  readonly description: string;
  readonly publisher: string;
  readonly source: SourceLocator;
  /** CSV delimiter; auto-detected from the header line when absent */
  readonly delimiter?: ';' | ',';
  readonly columns: readonly ColumnSpec[];
  readonly targetTable: DatasetTable;
  readonly naturalKey: readonly string[];
  readonly duplicatePolicy: DuplicatePolicy;
  readonly refreshCadence: RefreshCadence;
}

// ─────────────────────────────────────────────────────────────────────────────
// Region Reference
// ─────────────────────────────────────────────────────────────────────────────

export interface RegionInfo {
  readonly code: string;
  readonly name: string;
}
