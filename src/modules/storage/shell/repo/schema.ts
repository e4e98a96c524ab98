/**
 * Storage schema bootstrap.
 *
 * Creates any missing table from the table catalogue. Each table's
 * natural key is its primary key, which is what upserts conflict on.
 */

import { sql } from 'kysely';

import { TABLE_DEFINITIONS } from '../../core/tables.js';
import { TABLE_NAMES, type StoredColumnType, type TableDefinition } from '../../core/types.js';

import type { RegionInsightsDbClient } from '@/infra/database/client.js';
import type { Logger } from 'pino';

const SQL_TYPES: Readonly<Record<StoredColumnType, string>> = {
  integer: 'integer',
  decimal: 'numeric',
  text: 'text',
  date: 'date',
  timestamp: 'timestamptz',
};

const createTableStatement = (table: TableDefinition) => {
  const columns = table.columns.map((column) => {
    const nullability = table.naturalKey.includes(column.name) ? ' NOT NULL' : '';
    return sql`${sql.ref(column.name)} ${sql.raw(SQL_TYPES[column.type] + nullability)}`;
  });

  return sql`
    CREATE TABLE IF NOT EXISTS ${sql.table(table.name)} (
      ${sql.join(columns)},
      ${sql.ref('updated_at')} timestamptz NOT NULL DEFAULT now(),
      PRIMARY KEY (${sql.join(table.naturalKey.map((column) => sql.ref(column)))})
    )
  `;
};

/**
 * Creates missing tables. Throws when the database rejects a statement.
 */
export const ensureStorageSchema = async (
  db: RegionInsightsDbClient,
  logger: Logger
): Promise<void> => {
  for (const name of TABLE_NAMES) {
    await createTableStatement(TABLE_DEFINITIONS[name]).execute(db);
  }
  logger.info({ tables: TABLE_NAMES }, 'Storage schema ready');
};
