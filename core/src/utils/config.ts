import dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables
dotenv.config();

/**
 * Configuration schema for the storage layer and its administrative scripts
 */
const ConfigSchema = z.object({
  // Database configuration
  postgres: z.object({
    host: z.string().default('localhost'),
    port: z.number().int().positive().default(5432),
    user: z.string().default('postgres'),
    password: z.string().default(''),
    database: z.string().default('zettl'),
    connectionString: z.string().optional(),
    poolMax: z.number().int().positive().default(20),
    idleTimeoutMillis: z.number().int().nonnegative().default(30000),
    connectionTimeoutMillis: z.number().int().nonnegative().default(2000),
  }),

  // Migration sequencer configuration
  migration: z.object({
    backfillTenantId: z.number().int().positive().optional(),
    backupDir: z.string().default('backups'),
    pgDumpPath: z.string().default('pg_dump'),
  }),

  // Derived views
  tagCounts: z.object({
    refreshConcurrently: z.boolean().default(true),
  }),

  // Client-side caching
  noteCache: z.object({
    maxEntries: z.number().int().positive().default(500),
    ttlMs: z.number().int().positive().default(5 * 60 * 1000),
  }),

  // Logging
  monitoring: z.object({
    logLevel: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

function optionalInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return Number(value);
}

/**
 * Load and validate configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig = {
    postgres: {
      host: env.POSTGRES_HOST || 'localhost',
      port: parseInt(env.POSTGRES_PORT || '5432'),
      user: env.POSTGRES_USER || 'postgres',
      password: env.POSTGRES_PASSWORD || '',
      database: env.POSTGRES_DB || 'zettl',
      connectionString: env.DATABASE_URL,
      poolMax: parseInt(env.POSTGRES_POOL_MAX || '20'),
      idleTimeoutMillis: parseInt(env.POSTGRES_IDLE_TIMEOUT_MS || '30000'),
      connectionTimeoutMillis: parseInt(env.POSTGRES_CONNECTION_TIMEOUT_MS || '2000'),
    },
    migration: {
      backfillTenantId: optionalInt(env.MIGRATION_BACKFILL_TENANT_ID),
      backupDir: env.MIGRATION_BACKUP_DIR || 'backups',
      pgDumpPath: env.PG_DUMP_PATH || 'pg_dump',
    },
    tagCounts: {
      refreshConcurrently: env.TAG_COUNTS_REFRESH_CONCURRENTLY !== 'false',
    },
    noteCache: {
      maxEntries: parseInt(env.NOTE_CACHE_MAX_ENTRIES || '500'),
      ttlMs: parseInt(env.NOTE_CACHE_TTL_MS || '300000'),
    },
    monitoring: {
      logLevel: env.LOG_LEVEL || 'info',
    },
  };

  return ConfigSchema.parse(rawConfig);
}

/**
 * Connection string for the configured database, preferring DATABASE_URL
 */
export function getConnectionString(config: Config): string {
  const { postgres } = config;
  return postgres.connectionString ||
    `postgresql://${postgres.user}:${postgres.password}@${postgres.host}:${postgres.port}/${postgres.database}`;
}
