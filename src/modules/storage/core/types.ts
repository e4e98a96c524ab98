/**
 * Storage Module - Domain Types
 */

import type { Decimal } from 'decimal.js';

// ─────────────────────────────────────────────────────────────────────────────
// Tables
// ─────────────────────────────────────────────────────────────────────────────

export const TABLE_NAMES = [
  'dataset_sources',
  'region_budgets',
  'communes',
  'region_employment',
  'region_stats',
] as const;

export type TableName = (typeof TABLE_NAMES)[number];

export const isTableName = (value: string): value is TableName =>
  TABLE_NAMES.some((name) => name === value);

/**
 * Column storage type. `timestamp` values travel as ISO-8601 strings.
 */
export type StoredColumnType = 'integer' | 'decimal' | 'text' | 'date' | 'timestamp';

export interface StoredColumn {
  readonly name: string;
  readonly type: StoredColumnType;
}

export interface TableDefinition {
  readonly name: TableName;
  readonly columns: readonly StoredColumn[];
  readonly naturalKey: readonly string[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Records
// ─────────────────────────────────────────────────────────────────────────────

export type StoredValue = string | number | Decimal | null;

/**
 * A row keyed by column name. Money and ratios are Decimal.
 */
export type StoredRecord = Readonly<Record<string, StoredValue>>;

export type SortDirection = 'asc' | 'desc';

export interface ReadFilter {
  /** Column equality conditions, ANDed */
  readonly where?: Readonly<Record<string, string | number>>;
  /** Case-insensitive substring match on a text column, ANDed with `where` */
  readonly contains?: { readonly column: string; readonly value: string };
  /** Defaults to the table's natural key, ascending */
  readonly orderBy?: readonly { readonly column: string; readonly direction: SortDirection }[];
  readonly limit?: number;
  readonly offset?: number;
}

export interface UpsertSummary {
  readonly table: TableName;
  /** Distinct natural keys written */
  readonly written: number;
}
