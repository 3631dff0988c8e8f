/**
 * Migration Runner
 *
 * Takes a backup before any pending migration runs; a failed backup stops
 * the run. Kysely's migrator executes the pending migrations in a single
 * transaction under an advisory lock, so concurrent runners serialize and a
 * failure leaves the schema as it was.
 */

import { Migrator, type Kysely, type MigrationProvider } from 'kysely';
import type { BackupResult, BackupService } from '../backup/pg-dump-backup.js';
import { MigrationError } from '../errors.js';
import { logger } from '../utils/logger.js';
import { createMigrationProvider } from './migration-provider.js';

export interface MigrationRunnerOptions {
  db: Kysely<unknown>;
  backup: BackupService;
  provider?: MigrationProvider;
  backfillTenantId?: number;
}

export interface MigrationRunResult {
  executed: string[];
  backup?: BackupResult;
}

export class MigrationRunner {
  private readonly migrator: Migrator;
  private readonly backup: BackupService;

  constructor(options: MigrationRunnerOptions) {
    this.backup = options.backup;
    this.migrator = new Migrator({
      db: options.db,
      provider: options.provider ?? createMigrationProvider({ backfillTenantId: options.backfillTenantId }),
    });
  }

  async pendingMigrations(): Promise<string[]> {
    const migrations = await this.migrator.getMigrations();
    return migrations.filter((migration) => migration.executedAt === undefined).map((migration) => migration.name);
  }

  async migrateToLatest(): Promise<MigrationRunResult> {
    const pending = await this.pendingMigrations();
    if (pending.length === 0) {
      logger.info('Database schema is up to date');
      return { executed: [] };
    }

    logger.info(`Pending migrations: ${pending.join(', ')}`);
    const backup = await this.backup.createBackup('pre-migration');

    const { error, results = [] } = await this.migrator.migrateToLatest();

    for (const result of results) {
      if (result.status === 'Error') {
        logger.error(`Migration ${result.migrationName} failed`);
      } else if (result.status === 'NotExecuted') {
        logger.warn(`Migration ${result.migrationName} rolled back`);
      }
    }

    if (error !== undefined) {
      logger.error('Migration run failed; the schema was left unchanged. To restore the backup run:', {
        restoreCommand: backup.restoreCommand,
      });
      if (error instanceof Error) {
        throw error;
      }
      throw new MigrationError('MIGRATION_FAILED', String(error), { backup: backup.path });
    }

    const executed = results.filter((result) => result.status === 'Success').map((result) => result.migrationName);
    logger.info(`Applied ${executed.length} migrations`, { executed });
    return { executed, backup };
  }
}
