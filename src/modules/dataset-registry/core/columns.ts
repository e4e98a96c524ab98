/**
 * Header normalization and header → canonical column resolution.
 */

import type { ColumnSpec, DatasetSpec } from './types.js';

/**
 * Normalizes a source header or alias for comparison:
 * strips diacritics, lower-cases, and collapses every run of
 * non-alphanumerics (spaces, dashes, apostrophes, dots) to a single `_`.
 *
 * @example normalizeColumnName(' Code Région ') // 'code_region'
 */
export const normalizeColumnName = (raw: string): string =>
  raw
    .normalize('NFD')
    .replace(/\p{M}/gu, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');

export interface ColumnResolution {
  /** canonical column name → source header as received */
  readonly mapping: ReadonlyMap<string, string>;
  /** Required columns with no matching header */
  readonly missingRequired: readonly string[];
  /** Source headers matched by no column */
  readonly ignored: readonly string[];
}

const candidatesFor = (column: ColumnSpec): string[] =>
  [column.name, ...column.aliases].map(normalizeColumnName);

/**
 * Maps source headers onto a spec's canonical columns.
 *
 * Columns are resolved in declaration order; for each column the first
 * candidate (canonical name, then aliases in order) present in the header
 * wins. A header is claimed by at most one column.
 */
export const resolveColumns = (spec: DatasetSpec, headers: readonly string[]): ColumnResolution => {
  const byNormalized = new Map<string, string>();
  for (const header of headers) {
    const normalized = normalizeColumnName(header);
    if (!byNormalized.has(normalized)) {
      byNormalized.set(normalized, header);
    }
  }

  const claimed = new Set<string>();
  const mapping = new Map<string, string>();
  const missingRequired: string[] = [];

  for (const column of spec.columns) {
    const match = candidatesFor(column).find(
      (candidate) => byNormalized.has(candidate) && !claimed.has(candidate)
    );

    if (match === undefined) {
      if (column.required) {
        missingRequired.push(column.name);
      }
      continue;
    }

    claimed.add(match);
    const header = byNormalized.get(match);
    if (header !== undefined) {
      mapping.set(column.name, header);
    }
  }

  const ignored = headers.filter((header) => !claimed.has(normalizeColumnName(header)));

  return { mapping, missingRequired, ignored };
};
