import { Pool, type PoolConfig } from 'pg';
import { Kysely, PostgresDialect } from 'kysely';
import type { ZettlDatabase } from '../shared/types/database.js';
import { getConnectionString, loadConfig, type Config } from './config.js';
import { createLogger } from './logger.js';

const logger = createLogger('database-pool');

/**
 * Database Connection Pool Manager
 *
 * Owns the pg pool used by both the client path (through TenantScope) and the
 * administrative path. There is no retry layer here: failed statements surface
 * to the caller.
 */

export function poolConfigFrom(config: Config): PoolConfig {
  return {
    connectionString: getConnectionString(config),
    max: config.postgres.poolMax,
    idleTimeoutMillis: config.postgres.idleTimeoutMillis,
    connectionTimeoutMillis: config.postgres.connectionTimeoutMillis,
    application_name: 'zettl-storage',
  };
}

export class DatabaseConnectionPool {
  private readonly pool: Pool;
  private db: Kysely<ZettlDatabase> | null = null;
  private schemaDb: Kysely<unknown> | null = null;

  constructor(config: PoolConfig) {
    this.pool = new Pool(config);
    this.setupEventListeners();
  }

  /**
   * Kysely instance over this pool, created once
   */
  getKyselyDatabase(): Kysely<ZettlDatabase> {
    if (!this.db) {
      this.db = new Kysely<ZettlDatabase>({
        dialect: new PostgresDialect({ pool: this.pool }),
      });
    }
    return this.db;
  }

  /**
   * Untyped Kysely instance over the same pool, for migrations and catalog work
   */
  getSchemaDatabase(): Kysely<unknown> {
    if (!this.schemaDb) {
      this.schemaDb = new Kysely<unknown>({
        dialect: new PostgresDialect({ pool: this.pool }),
      });
    }
    return this.schemaDb;
  }

  /**
   * Close all connections. The Kysely instances share the pool, so it is
   * ended once here instead of through each of them.
   */
  async close(): Promise<void> {
    this.db = null;
    this.schemaDb = null;
    await this.pool.end();
    logger.info('Database connection pool closed');
  }

  private setupEventListeners(): void {
    this.pool.on('connect', () => {
      logger.debug('New client connected');
    });

    this.pool.on('error', (error) => {
      logger.error('Idle client error', { error });
    });
  }
}

/**
 * Create a pool from the environment configuration
 */
export function createDatabaseConnectionPool(config: Config = loadConfig()): DatabaseConnectionPool {
  return new DatabaseConnectionPool(poolConfigFrom(config));
}
