import { Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';

import type { RegionInsightsDatabase } from './types.js';

const { Pool: PG_POOL } = pg;

export type RegionInsightsDbClient = Kysely<RegionInsightsDatabase>;

export interface DatabaseOptions {
  url: string;
  /** Connection pool size (default: 10) */
  poolSize?: number;
}

/**
 * Create the Kysely client for the region insights database
 */
export const initDatabase = (options: DatabaseOptions): RegionInsightsDbClient => {
  if (options.url === '') {
    throw new Error('Missing configuration for database (DATABASE_URL)');
  }

  return new Kysely<RegionInsightsDatabase>({
    dialect: new PostgresDialect({
      pool: new PG_POOL({
        connectionString: options.url,
        max: options.poolSize ?? 10,
      }),
    }),
  });
};

// Re-export types
export type * from './types.js';
