/**
 * Tenant Isolation Migration
 *
 * Runs the tenant-isolation sequencer inside the migrator's transaction.
 * There is no step-wise rollback: the pre-migration backup is the way back.
 */

import { Kysely } from 'kysely';
import type { Migration } from 'kysely';
import { IrreversibleMigrationError } from '../errors.js';
import { TenantIsolationSequencer } from '../sequencer/tenant-isolation-sequencer.js';
import { logger } from '../utils/logger.js';

export const TENANT_ISOLATION_MIGRATION = '002_tenant_isolation';

export interface TenantIsolationMigrationOptions {
  backfillTenantId?: number;
}

export function createTenantIsolationMigration(options: TenantIsolationMigrationOptions = {}): Migration {
  return {
    async up(db: Kysely<any>): Promise<void> {
      logger.info(`Running migration: ${TENANT_ISOLATION_MIGRATION} (up)`);

      const report = await new TenantIsolationSequencer({
        backfillTenantId: options.backfillTenantId,
        logger,
      }).apply(db);

      logger.info(`Migration ${TENANT_ISOLATION_MIGRATION} completed`, {
        applied: report.applied.length,
        skipped: report.skipped.length,
        backfillTenantId: report.backfill?.tenantId,
      });
    },

    async down(): Promise<void> {
      throw new IrreversibleMigrationError(TENANT_ISOLATION_MIGRATION);
    },
  };
}
