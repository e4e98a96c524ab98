/**
 * Cleaner
 *
 * Turns raw rows into validated CleanRecords in four steps:
 * 1. header normalization onto canonical column names
 * 2. type coercion
 * 3. missing-value policy
 * 4. deduplication by natural key
 *
 * Row-level problems never abort the batch: the row is dropped and
 * counted. Only a required column absent from the header fails the
 * whole dataset, with SchemaMismatch.
 */

import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import {
  createSchemaMismatchError,
  createValidationFailure,
  type SchemaMismatchError,
  type ValidationFailure,
} from '@/common/types/errors.js';
import {
  resolveColumns,
  type ColumnSpec,
  type DatasetSpec,
} from '@/modules/dataset-registry/index.js';

import { coerceValue, type CoercionOutcome } from './coerce.js';
import {
  MAX_REPORTED_FAILURES,
  type CleanOutput,
  type CleanRecord,
  type CleaningReport,
  type FieldValue,
} from './types.js';

import type { RawRecord } from '@/modules/ingestion/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

interface ResolvedColumn {
  readonly column: ColumnSpec;
  /** Source header, or null when an optional column is absent */
  readonly header: string | null;
}

type RowOutcome =
  | { readonly kind: 'kept'; readonly record: CleanRecord }
  | { readonly kind: 'rejected'; readonly failure: ValidationFailure };

interface Counters {
  nullFilled: number;
  zeroFilled: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Steps
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Step 1: map source headers onto the spec's columns.
 */
const normalizeColumns = (
  spec: DatasetSpec,
  headers: readonly string[]
): Result<{ columns: ResolvedColumn[]; ignored: readonly string[] }, SchemaMismatchError> => {
  const resolution = resolveColumns(spec, headers);

  if (resolution.missingRequired.length > 0) {
    return err(createSchemaMismatchError(spec.id, resolution.missingRequired, headers));
  }

  const columns = spec.columns.map((column) => ({
    column,
    header: resolution.mapping.get(column.name) ?? null,
  }));

  return ok({ columns, ignored: resolution.ignored });
};

/**
 * Step 2: coerce every field of a row.
 */
const coerceRow = (columns: readonly ResolvedColumn[], row: RawRecord): CoercionOutcome[] =>
  columns.map(({ column, header }) =>
    coerceValue(column, header === null ? undefined : row[header])
  );

const zeroFor = (column: ColumnSpec): FieldValue =>
  column.type === 'integer' ? 0 : new Decimal(0);

/**
 * Step 3: resolve coercion outcomes into field values, applying the
 * missing-value policy and the required/optional coercion rule.
 */
const applyMissingPolicy = (
  spec: DatasetSpec,
  columns: readonly ResolvedColumn[],
  outcomes: readonly CoercionOutcome[],
  row: RawRecord,
  rowIndex: number,
  counters: Counters
): RowOutcome => {
  const record: Record<string, FieldValue> = {};
  let nullFilled = 0;
  let zeroFilled = 0;

  for (const [index, { column, header }] of columns.entries()) {
    const outcome: CoercionOutcome = outcomes[index] ?? { kind: 'missing' };
    const raw = header === null ? undefined : row[header];

    switch (outcome.kind) {
      case 'value':
        record[column.name] = outcome.value;
        break;

      case 'invalid':
        if (column.required) {
          return {
            kind: 'rejected',
            failure: createValidationFailure(
              spec.id,
              'coercion',
              rowIndex,
              `${column.name}: ${outcome.reason}`,
              column.name,
              raw
            ),
          };
        }
        record[column.name] = null;
        nullFilled++;
        break;

      case 'missing':
        // An optional column absent from the header carries no data at all
        if (header === null) {
          record[column.name] = null;
          nullFilled++;
          break;
        }
        if (column.onMissing === 'reject') {
          return {
            kind: 'rejected',
            failure: createValidationFailure(
              spec.id,
              'missing',
              rowIndex,
              `${column.name}: value is missing`,
              column.name,
              raw
            ),
          };
        }
        if (column.onMissing === 'zero') {
          record[column.name] = zeroFor(column);
          zeroFilled++;
        } else {
          record[column.name] = null;
          nullFilled++;
        }
        break;
    }
  }

  // Counters only move for rows that are kept
  counters.nullFilled += nullFilled;
  counters.zeroFilled += zeroFilled;
  return { kind: 'kept', record };
};

const keyPart = (value: FieldValue): string => {
  if (value === null) {
    return '\u0000';
  }
  return Decimal.isDecimal(value) ? value.toString() : String(value);
};

/**
 * Natural key of a record as a single comparable string.
 */
export const naturalKeyOf = (record: CleanRecord, naturalKey: readonly string[]): string =>
  naturalKey.map((column) => keyPart(record[column] ?? null)).join('\u001f');

interface Indexed {
  readonly record: CleanRecord;
  readonly rowIndex: number;
}

/**
 * Step 4: resolve duplicate natural keys.
 *
 * Output keeps the position of each key's first occurrence. Under
 * keep-last the record at that position is the key's highest-index row.
 */
const deduplicate = (
  spec: DatasetSpec,
  rows: readonly Indexed[]
): { records: CleanRecord[]; duplicateRows: number; rejected: ValidationFailure[] } => {
  const slots = new Map<string, Indexed[]>();
  for (const row of rows) {
    const key = naturalKeyOf(row.record, spec.naturalKey);
    const existing = slots.get(key);
    if (existing === undefined) {
      slots.set(key, [row]);
    } else {
      existing.push(row);
    }
  }

  const records: CleanRecord[] = [];
  const rejected: ValidationFailure[] = [];
  let duplicateRows = 0;

  for (const [key, occurrences] of slots) {
    const last = occurrences[occurrences.length - 1];
    if (last === undefined) {
      continue;
    }

    if (occurrences.length === 1) {
      records.push(last.record);
    } else if (spec.duplicatePolicy === 'keep-last') {
      records.push(last.record);
      duplicateRows += occurrences.length - 1;
    } else {
      for (const occurrence of occurrences) {
        rejected.push(
          createValidationFailure(
            spec.id,
            'duplicate',
            occurrence.rowIndex,
            `natural key (${spec.naturalKey.join(', ')}) = ${key.replaceAll('\u001f', ', ')} appears ${String(occurrences.length)} times`
          )
        );
      }
    }
  }

  return { records, duplicateRows, rejected };
};

// ─────────────────────────────────────────────────────────────────────────────
// Entry Points
// ─────────────────────────────────────────────────────────────────────────────

const emptyReport = (spec: DatasetSpec): CleaningReport => ({
  datasetId: spec.id,
  totalRows: 0,
  keptRows: 0,
  rejectedRows: 0,
  duplicateRows: 0,
  nullFilled: 0,
  zeroFilled: 0,
  ignoredColumns: [],
  failures: [],
});

/**
 * Incremental cleaner: feed rows one at a time, then finish.
 */
const createCleaner = (
  spec: DatasetSpec,
  headers: readonly string[]
): Result<
  { push(row: RawRecord): void; finish(): CleanOutput },
  SchemaMismatchError
> => {
  const normalized = normalizeColumns(spec, headers);
  if (normalized.isErr()) {
    return err(normalized.error);
  }
  const { columns, ignored } = normalized.value;

  const counters: Counters = { nullFilled: 0, zeroFilled: 0 };
  const kept: Indexed[] = [];
  const failures: ValidationFailure[] = [];
  let rowIndex = 0;
  let rejectedRows = 0;

  const recordFailure = (failure: ValidationFailure): void => {
    rejectedRows++;
    if (failures.length < MAX_REPORTED_FAILURES) {
      failures.push(failure);
    }
  };

  return ok({
    push(row) {
      const index = rowIndex++;
      const outcomes = coerceRow(columns, row);
      const outcome = applyMissingPolicy(spec, columns, outcomes, row, index, counters);
      if (outcome.kind === 'kept') {
        kept.push({ record: outcome.record, rowIndex: index });
      } else {
        recordFailure(outcome.failure);
      }
    },

    finish() {
      const { records, duplicateRows, rejected } = deduplicate(spec, kept);
      rejected.forEach(recordFailure);

      return {
        records,
        report: {
          datasetId: spec.id,
          totalRows: rowIndex,
          keptRows: records.length,
          rejectedRows,
          duplicateRows,
          nullFilled: counters.nullFilled,
          zeroFilled: counters.zeroFilled,
          ignoredColumns: ignored,
          failures,
        },
      };
    },
  });
};

/**
 * Cleans an in-memory row sequence.
 *
 * @param headers - Source headers; defaults to the keys of the first row
 */
export const cleanRecords = (
  spec: DatasetSpec,
  rows: Iterable<RawRecord>,
  headers?: readonly string[]
): Result<CleanOutput, SchemaMismatchError> => {
  const buffered = [...rows];
  const first = buffered[0];
  const effectiveHeaders = headers ?? (first === undefined ? null : Object.keys(first));

  if (effectiveHeaders === null) {
    return ok({ records: [], report: emptyReport(spec) });
  }

  const cleaner = createCleaner(spec, effectiveHeaders);
  if (cleaner.isErr()) {
    return err(cleaner.error);
  }

  for (const row of buffered) {
    cleaner.value.push(row);
  }
  return ok(cleaner.value.finish());
};

/**
 * Cleans a lazily produced row sequence, consuming it once.
 * Errors thrown by the sequence propagate to the caller.
 */
export const cleanDataset = async (
  spec: DatasetSpec,
  rows: AsyncIterable<RawRecord>,
  headers: readonly string[]
): Promise<Result<CleanOutput, SchemaMismatchError>> => {
  const cleaner = createCleaner(spec, headers);
  if (cleaner.isErr()) {
    return err(cleaner.error);
  }

  for await (const row of rows) {
    cleaner.value.push(row);
  }
  return ok(cleaner.value.finish());
};
