/**
 * Storage Gateway Implementation
 *
 * Kysely/PostgreSQL gateway. Table and column names are only ever taken
 * from the table catalogue, so every identifier is known before it is
 * quoted into SQL.
 */

import { Decimal } from 'decimal.js';
import { sql, type RawBuilder } from 'kysely';
import { err, ok, type Result } from 'neverthrow';

import {
  createDatabaseError,
  createStorageCommitFailureError,
  type DatabaseError,
  type StorageCommitFailureError,
} from '@/common/types/errors.js';

import { collapseByKey, unknownFilterColumns, validateBatch } from '../../core/records.js';
import { TABLE_DEFINITIONS } from '../../core/tables.js';

import type { StorageGateway } from '../../core/ports.js';
import type {
  ReadFilter,
  StoredColumn,
  StoredRecord,
  StoredValue,
  TableDefinition,
  TableName,
  UpsertSummary,
} from '../../core/types.js';
import type { RegionInsightsDbClient } from '@/infra/database/client.js';
import type { Logger } from 'pino';

/** Rows per INSERT statement */
const UPSERT_CHUNK_SIZE = 500;

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface KyselyStorageGatewayOptions {
  db: RegionInsightsDbClient;
  logger: Logger;
}

// ─────────────────────────────────────────────────────────────────────────────
// Value Mapping
// ─────────────────────────────────────────────────────────────────────────────

const toDbValue = (value: StoredValue | undefined): string | number | null => {
  if (value === undefined || value === null) {
    return null;
  }
  return Decimal.isDecimal(value) ? value.toString() : value;
};

const pad2 = (value: number): string => String(value).padStart(2, '0');

/**
 * node-postgres parses DATE columns into local-midnight Date objects.
 */
const formatDbDate = (value: Date): string =>
  `${String(value.getFullYear())}-${pad2(value.getMonth() + 1)}-${pad2(value.getDate())}`;

const fromDbValue = (column: StoredColumn, value: unknown): StoredValue => {
  if (value === null || value === undefined) {
    return null;
  }

  switch (column.type) {
    case 'integer': {
      const parsed = typeof value === 'number' ? value : Number(value);
      return Number.isSafeInteger(parsed) ? parsed : null;
    }
    case 'decimal':
      return typeof value === 'number' || typeof value === 'string' ? new Decimal(value) : null;
    case 'date':
      if (value instanceof Date) {
        return formatDbDate(value);
      }
      return typeof value === 'string' ? value.slice(0, 10) : null;
    case 'timestamp':
      if (value instanceof Date) {
        return value.toISOString();
      }
      return typeof value === 'string' ? value : null;
    case 'text':
      return typeof value === 'string' || typeof value === 'number' ? String(value) : null;
  }
};

const mapRow = (table: TableDefinition, row: Readonly<Record<string, unknown>>): StoredRecord => {
  const record: Record<string, StoredValue> = {};
  for (const column of table.columns) {
    record[column.name] = fromDbValue(column, row[column.name]);
  }
  return record;
};

// ─────────────────────────────────────────────────────────────────────────────
// SQL Fragments
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Escapes LIKE wildcards so a search term matches literally.
 */
const likePattern = (value: string): string => `%${value.replace(/[\\%_]/g, '\\$&')}%`;

const whereClause = (filter: ReadFilter): RawBuilder<unknown> => {
  const conditions = Object.entries(filter.where ?? {}).map(
    ([column, value]) => sql`${sql.ref(column)} = ${value}`
  );
  if (filter.contains !== undefined) {
    conditions.push(
      sql`${sql.ref(filter.contains.column)} ILIKE ${likePattern(filter.contains.value)}`
    );
  }
  return conditions.length > 0 ? sql`WHERE ${sql.join(conditions, sql` AND `)}` : sql``;
};

const orderClause = (table: TableDefinition, filter: ReadFilter): RawBuilder<unknown> => {
  const orderBy =
    filter.orderBy ?? table.naturalKey.map((column) => ({ column, direction: 'asc' as const }));
  const terms = orderBy.map(
    ({ column, direction }) =>
      sql`${sql.ref(column)} ${sql.raw(direction === 'asc' ? 'ASC NULLS LAST' : 'DESC NULLS FIRST')}`
  );
  return sql`ORDER BY ${sql.join(terms)}`;
};

const pageClause = (filter: ReadFilter): RawBuilder<unknown> => {
  const limit = filter.limit === undefined ? sql`` : sql`LIMIT ${filter.limit}`;
  const offset = filter.offset === undefined ? sql`` : sql`OFFSET ${filter.offset}`;
  return sql`${limit} ${offset}`;
};

// ─────────────────────────────────────────────────────────────────────────────
// Gateway Implementation
// ─────────────────────────────────────────────────────────────────────────────

class KyselyStorageGateway implements StorageGateway {
  private readonly db: RegionInsightsDbClient;
  private readonly log: Logger;

  constructor(options: KyselyStorageGatewayOptions) {
    this.db = options.db;
    this.log = options.logger.child({ repo: 'StorageGateway' });
  }

  async upsertBatch(
    table: TableName,
    records: readonly StoredRecord[],
    naturalKey: readonly string[]
  ): Promise<Result<UpsertSummary, StorageCommitFailureError>> {
    const definition = TABLE_DEFINITIONS[table];

    const validation = validateBatch(definition, records, naturalKey);
    if (validation.isErr()) {
      this.log.error({ table, reason: validation.error }, 'Rejected invalid batch');
      return err(createStorageCommitFailureError(table, records.length, validation.error));
    }

    const rows = collapseByKey(records, naturalKey);
    if (rows.length === 0) {
      return ok({ table, written: 0 });
    }

    const columnNames = definition.columns.map((column) => column.name);
    const columnRefs = sql.join(columnNames.map((name) => sql.ref(name)));
    const keyRefs = sql.join(naturalKey.map((name) => sql.ref(name)));
    const updates = sql.join([
      ...columnNames
        .filter((name) => !naturalKey.includes(name))
        .map((name) => sql`${sql.ref(name)} = ${sql.ref(`excluded.${name}`)}`),
      sql`${sql.ref('updated_at')} = now()`,
    ]);

    this.log.debug({ table, records: rows.length }, 'Upserting batch');

    try {
      await this.db.transaction().execute(async (trx) => {
        for (let start = 0; start < rows.length; start += UPSERT_CHUNK_SIZE) {
          const chunk = rows.slice(start, start + UPSERT_CHUNK_SIZE);
          const values = sql.join(
            chunk.map((row) => sql`(${sql.join(columnNames.map((name) => toDbValue(row[name])))})`)
          );

          await sql`
            INSERT INTO ${sql.table(table)} (${columnRefs})
            VALUES ${values}
            ON CONFLICT (${keyRefs}) DO UPDATE SET ${updates}
          `.execute(trx);
        }
      });
    } catch (error) {
      this.log.error({ err: error, table, records: rows.length }, 'Batch commit failed');
      return err(createStorageCommitFailureError(table, rows.length, error));
    }

    this.log.info({ table, written: rows.length }, 'Batch committed');
    return ok({ table, written: rows.length });
  }

  async read(
    table: TableName,
    filter: ReadFilter = {}
  ): Promise<Result<StoredRecord[], DatabaseError>> {
    const definition = TABLE_DEFINITIONS[table];

    const unknown = unknownFilterColumns(definition, filter);
    if (unknown.length > 0) {
      return err(createDatabaseError(`Unknown columns on '${table}': ${unknown.join(', ')}`));
    }

    const columns = sql.join(definition.columns.map((column) => sql.ref(column.name)));

    try {
      const result = await sql<Record<string, unknown>>`
        SELECT ${columns}
        FROM ${sql.table(table)}
        ${whereClause(filter)}
        ${orderClause(definition, filter)}
        ${pageClause(filter)}
      `.execute(this.db);

      return ok(result.rows.map((row) => mapRow(definition, row)));
    } catch (error) {
      this.log.error({ err: error, table, filter }, 'Failed to read table');
      return err(createDatabaseError(`Failed to read '${table}'`, error));
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates the PostgreSQL storage gateway.
 */
export const makeKyselyStorageGateway = (options: KyselyStorageGatewayOptions): StorageGateway => {
  return new KyselyStorageGateway(options);
};
