/**
 * Pure record helpers shared by the storage gateways.
 */

import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { hasColumn } from './tables.js';

import type { ReadFilter, StoredRecord, StoredValue, TableDefinition } from './types.js';

const KEY_SEPARATOR = '\u001f';

const keyPart = (value: StoredValue): string =>
  Decimal.isDecimal(value) ? value.toString() : String(value);

export const recordKey = (record: StoredRecord, naturalKey: readonly string[]): string =>
  naturalKey.map((column) => keyPart(record[column] ?? null)).join(KEY_SEPARATOR);

/**
 * Checks that every record carries a non-null value for each key column
 * and that the key columns exist on the table.
 */
export const validateBatch = (
  table: TableDefinition,
  records: readonly StoredRecord[],
  naturalKey: readonly string[]
): Result<void, string> => {
  if (naturalKey.length === 0) {
    return err('Natural key is empty');
  }

  const unknown = naturalKey.filter((column) => !hasColumn(table, column));
  if (unknown.length > 0) {
    return err(`Unknown key columns on '${table.name}': ${unknown.join(', ')}`);
  }

  for (const [index, record] of records.entries()) {
    const missing = naturalKey.filter((column) => (record[column] ?? null) === null);
    if (missing.length > 0) {
      return err(`Record ${String(index)} has no value for key columns: ${missing.join(', ')}`);
    }
  }

  return ok(undefined);
};

/**
 * Collapses a batch to one record per natural key, the last one winning.
 * Output keeps the order of each key's first occurrence.
 */
export const collapseByKey = (
  records: readonly StoredRecord[],
  naturalKey: readonly string[]
): StoredRecord[] => {
  const byKey = new Map<string, StoredRecord>();
  for (const record of records) {
    byKey.set(recordKey(record, naturalKey), record);
  }
  return [...byKey.values()];
};

/**
 * Orders stored values the way the database does: nulls last.
 */
export const compareStored = (a: StoredValue, b: StoredValue): number => {
  if (a === null || b === null) {
    return a === b ? 0 : a === null ? 1 : -1;
  }
  if (Decimal.isDecimal(a) || Decimal.isDecimal(b)) {
    return new Decimal(keyPart(a)).cmp(new Decimal(keyPart(b)));
  }
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  const left = String(a);
  const right = String(b);
  return left === right ? 0 : left < right ? -1 : 1;
};

const matchesWhere = (
  record: StoredRecord,
  where: Readonly<Record<string, string | number>>
): boolean =>
  Object.entries(where).every(([column, expected]) => {
    const actual = record[column] ?? null;
    return actual !== null && compareStored(actual, expected) === 0;
  });

const matchesContains = (record: StoredRecord, contains: ReadFilter['contains']): boolean => {
  if (contains === undefined) {
    return true;
  }
  const actual = record[contains.column] ?? null;
  return (
    typeof actual === 'string' && actual.toLowerCase().includes(contains.value.toLowerCase())
  );
};

/**
 * Columns a filter refers to that the table does not have.
 */
export const unknownFilterColumns = (table: TableDefinition, filter: ReadFilter): string[] => {
  const columns = [
    ...Object.keys(filter.where ?? {}),
    ...(filter.orderBy ?? []).map((order) => order.column),
    ...(filter.contains !== undefined ? [filter.contains.column] : []),
  ];
  return columns.filter((column) => !hasColumn(table, column));
};

/**
 * Evaluates a ReadFilter over in-memory records.
 */
export const applyReadFilter = (
  table: TableDefinition,
  records: readonly StoredRecord[],
  filter: ReadFilter
): StoredRecord[] => {
  const where = filter.where ?? {};
  const orderBy =
    filter.orderBy ?? table.naturalKey.map((column) => ({ column, direction: 'asc' as const }));

  const matched = records.filter(
    (record) => matchesWhere(record, where) && matchesContains(record, filter.contains)
  );
  matched.sort((a, b) => {
    for (const { column, direction } of orderBy) {
      const order = compareStored(a[column] ?? null, b[column] ?? null);
      if (order !== 0) {
        return direction === 'asc' ? order : -order;
      }
    }
    return 0;
  });

  const offset = filter.offset ?? 0;
  return filter.limit === undefined
    ? matched.slice(offset)
    : matched.slice(offset, offset + filter.limit);
};
