/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  // Server
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),
  PORT: Type.Number({ default: 3000, minimum: 1, maximum: 65535 }),
  HOST: Type.String({ default: '0.0.0.0' }),
  APP_VERSION: Type.String({ default: '0.1.0', minLength: 1 }),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  DATABASE_URL: Type.Optional(Type.String({ minLength: 1 })),

  // CORS
  ALLOWED_ORIGINS: Type.Optional(Type.String()),
  CLIENT_BASE_URL: Type.Optional(Type.String()),

  // Refresh pipeline
  REFRESH_INTERVAL_MS: Type.Optional(Type.Number({ minimum: 1000 })),
  REFRESH_RUN_ON_START: Type.Boolean({ default: false }),
  REFRESH_HISTORY_SIZE: Type.Number({ default: 10, minimum: 1, maximum: 100 }),

  // Ingestion
  DATA_GOUV_API_URL: Type.String({ default: 'https://www.data.gouv.fr/api/1' }),
  FETCH_TIMEOUT_MS: Type.Number({ default: 30_000, minimum: 100 }),
  FETCH_MAX_ATTEMPTS: Type.Number({ default: 3, minimum: 1, maximum: 10 }),
  FETCH_RETRY_BASE_DELAY_MS: Type.Number({ default: 1000, minimum: 0 }),

  // Cache
  CACHE_ENABLED: Type.Boolean({ default: true }),
  CACHE_DEFAULT_TTL_MS: Type.Number({ default: 300_000, minimum: 0 }),
  CACHE_MAX_ENTRIES: Type.Number({ default: 1000, minimum: 1 }),
  CACHE_TTL_REGION_STATS_MS: Type.Optional(Type.Number({ minimum: 0 })),
  CACHE_TTL_BUDGETS_MS: Type.Optional(Type.Number({ minimum: 0 })),
  CACHE_TTL_COMMUNES_MS: Type.Optional(Type.Number({ minimum: 0 })),
  CACHE_TTL_EMPLOYMENT_MS: Type.Optional(Type.Number({ minimum: 0 })),
  CACHE_TTL_DATASETS_MS: Type.Optional(Type.Number({ minimum: 0 })),
  CACHE_TTL_KPIS_MS: Type.Optional(Type.Number({ minimum: 0 })),
});

export type Env = Static<typeof EnvSchema>;

const parseIntOr = (value: string | undefined, fallback: number): number =>
  value != null && value !== '' ? Number.parseInt(value, 10) : fallback;

const parseOptionalInt = (value: string | undefined): number | undefined =>
  value != null && value !== '' ? Number.parseInt(value, 10) : undefined;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    PORT: parseIntOr(env['PORT'], 3000),
    HOST: env['HOST'] ?? '0.0.0.0',
    APP_VERSION: env['APP_VERSION'] ?? '0.1.0',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    DATABASE_URL: env['DATABASE_URL'],
    ALLOWED_ORIGINS: env['ALLOWED_ORIGINS'],
    CLIENT_BASE_URL: env['CLIENT_BASE_URL'],
    REFRESH_INTERVAL_MS: parseOptionalInt(env['REFRESH_INTERVAL_MS']),
    REFRESH_RUN_ON_START: env['REFRESH_RUN_ON_START'] === 'true',
    REFRESH_HISTORY_SIZE: parseIntOr(env['REFRESH_HISTORY_SIZE'], 10),
    DATA_GOUV_API_URL: env['DATA_GOUV_API_URL'] ?? 'https://www.data.gouv.fr/api/1',
    FETCH_TIMEOUT_MS: parseIntOr(env['FETCH_TIMEOUT_MS'], 30_000),
    FETCH_MAX_ATTEMPTS: parseIntOr(env['FETCH_MAX_ATTEMPTS'], 3),
    FETCH_RETRY_BASE_DELAY_MS: parseIntOr(env['FETCH_RETRY_BASE_DELAY_MS'], 1000),
    CACHE_ENABLED: env['CACHE_ENABLED'] !== 'false',
    CACHE_DEFAULT_TTL_MS: parseIntOr(env['CACHE_DEFAULT_TTL_MS'], 300_000),
    CACHE_MAX_ENTRIES: parseIntOr(env['CACHE_MAX_ENTRIES'], 1000),
    CACHE_TTL_REGION_STATS_MS: parseOptionalInt(env['CACHE_TTL_REGION_STATS_MS']),
    CACHE_TTL_BUDGETS_MS: parseOptionalInt(env['CACHE_TTL_BUDGETS_MS']),
    CACHE_TTL_COMMUNES_MS: parseOptionalInt(env['CACHE_TTL_COMMUNES_MS']),
    CACHE_TTL_EMPLOYMENT_MS: parseOptionalInt(env['CACHE_TTL_EMPLOYMENT_MS']),
    CACHE_TTL_DATASETS_MS: parseOptionalInt(env['CACHE_TTL_DATASETS_MS']),
    CACHE_TTL_KPIS_MS: parseOptionalInt(env['CACHE_TTL_KPIS_MS']),
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => {
  const defaultTtlMs = env.CACHE_DEFAULT_TTL_MS;

  return {
    server: {
      port: env.PORT,
      host: env.HOST,
      version: env.APP_VERSION,
      isDevelopment: env.NODE_ENV === 'development',
      isProduction: env.NODE_ENV === 'production',
      isTest: env.NODE_ENV === 'test',
    },
    logger: {
      level: env.LOG_LEVEL,
      pretty: env.NODE_ENV === 'development',
    },
    database: {
      url: env.DATABASE_URL,
    },
    cors: {
      allowedOrigins: env.ALLOWED_ORIGINS,
      clientBaseUrl: env.CLIENT_BASE_URL,
    },
    refresh: {
      /** Periodic refresh interval; undefined means manual trigger only */
      intervalMs: env.REFRESH_INTERVAL_MS,
      runOnStart: env.REFRESH_RUN_ON_START,
      historySize: env.REFRESH_HISTORY_SIZE,
    },
    ingestion: {
      dataGouvApiUrl: env.DATA_GOUV_API_URL.replace(/\/+$/, ''),
      timeoutMs: env.FETCH_TIMEOUT_MS,
      maxAttempts: env.FETCH_MAX_ATTEMPTS,
      retryBaseDelayMs: env.FETCH_RETRY_BASE_DELAY_MS,
    },
    cache: {
      enabled: env.CACHE_ENABLED,
      maxEntries: env.CACHE_MAX_ENTRIES,
      defaultTtlMs,
      /** Time-to-live per logical query type */
      ttlMs: {
        regionStats: env.CACHE_TTL_REGION_STATS_MS ?? defaultTtlMs,
        budgets: env.CACHE_TTL_BUDGETS_MS ?? defaultTtlMs,
        communes: env.CACHE_TTL_COMMUNES_MS ?? defaultTtlMs,
        employment: env.CACHE_TTL_EMPLOYMENT_MS ?? defaultTtlMs,
        datasets: env.CACHE_TTL_DATASETS_MS ?? defaultTtlMs,
        kpis: env.CACHE_TTL_KPIS_MS ?? defaultTtlMs,
      },
    },
  };
};

export type AppConfig = ReturnType<typeof createConfig>;
