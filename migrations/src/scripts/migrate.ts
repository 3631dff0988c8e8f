/**
 * Apply pending migrations
 *
 * Takes a pg_dump backup first and refuses to continue when it fails.
 *
 * Usage:
 *   npm run migrate -- [--with-prerequisites] [--backfill-tenant <id>]
 */

import { createDatabaseConnectionPool, getConnectionString, loadConfig } from '@zettl/core';
import { PgDumpBackupService } from '../backup/pg-dump-backup.js';
import { MigrationRunner, type MigrationRunResult } from '../database/migration-runner.js';
import { ensurePrerequisites } from '../database/prerequisites.js';
import { MigrationError } from '../errors.js';
import { logger } from '../utils/logger.js';

export interface MigrateOptions {
  withPrerequisites: boolean;
  backfillTenantId?: number;
  help: boolean;
}

export function parseMigrateArgs(args: string[]): MigrateOptions {
  const options: MigrateOptions = { withPrerequisites: false, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--with-prerequisites':
        options.withPrerequisites = true;
        break;
      case '--backfill-tenant': {
        const value = Number(args[++i]);
        if (!Number.isInteger(value) || value <= 0) {
          throw new MigrationError('INVALID_ARGUMENT', '--backfill-tenant expects a positive integer');
        }
        options.backfillTenantId = value;
        break;
      }
      case '--help':
      case '-h':
        options.help = true;
        break;
    }
  }

  return options;
}

function showHelp(): void {
  console.log(`
Usage:
  npm run migrate -- [options]

Options:
  --with-prerequisites    Create the client roles and tenants table when missing
  --backfill-tenant <id>  Tenant that receives pre-existing rows
                          (default: MIGRATION_BACKFILL_TENANT_ID, else the earliest tenant)
  --help, -h              Show this help
  `.trim());
}

export async function migrate(options: MigrateOptions): Promise<MigrationRunResult> {
  const config = loadConfig();
  const pool = createDatabaseConnectionPool(config);

  try {
    const db = pool.getSchemaDatabase();
    if (options.withPrerequisites) {
      await ensurePrerequisites(db);
    }

    const runner = new MigrationRunner({
      db,
      backup: new PgDumpBackupService({
        connectionString: getConnectionString(config),
        backupDir: config.migration.backupDir,
        pgDumpPath: config.migration.pgDumpPath,
      }),
      backfillTenantId: options.backfillTenantId ?? config.migration.backfillTenantId,
    });
    return await runner.migrateToLatest();
  } finally {
    await pool.close();
  }
}

// CLI execution if run directly
if (import.meta.url === `file://${process.argv[1]}`) {
  const options = parseMigrateArgs(process.argv.slice(2));

  if (options.help) {
    showHelp();
  } else {
    migrate(options)
      .then((result) => {
        console.log(JSON.stringify(result, null, 2));
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error('Migration failed', { error });
        process.exit(1);
      });
  }
}
