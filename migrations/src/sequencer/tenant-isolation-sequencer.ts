/**
 * Tenant Isolation Sequencer
 *
 * Converts the single-tenant note schema in place: every row gains an owning
 * tenant, every key becomes composite and the tables are put behind
 * row-level security. Steps that are already satisfied are skipped, so a
 * partially converted database resumes where it stopped.
 */

import { CLIENT_ROLES, type Logger } from '@zettl/core';
import { MigrationPreconditionError } from '../errors.js';
import { logger as defaultLogger } from '../utils/logger.js';
import { roleExists, tableExists, type SchemaExecutor } from './catalog.js';
import { LEGACY_TABLES, TENANTS_TABLE } from './schema-plan.js';
import { TENANT_ISOLATION_STEPS } from './steps.js';
import type { MigrationStep, SequencerContext, SequencerReport } from './types.js';
import { verifyTenantIsolation } from './verification.js';

export interface SequencerOptions {
  steps?: readonly MigrationStep[];
  /** Tenant that receives pre-existing rows; defaults to the earliest tenant */
  backfillTenantId?: number;
  logger?: Logger;
}

export class TenantIsolationSequencer {
  private readonly steps: readonly MigrationStep[];
  private readonly backfillTenantId?: number;
  private readonly logger: Logger;

  constructor(options: SequencerOptions = {}) {
    this.steps = options.steps ?? TENANT_ISOLATION_STEPS;
    this.backfillTenantId = options.backfillTenantId;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Run every step on `db`, which should already be a transaction: a failure
   * part way through must leave nothing behind.
   */
  async apply(db: SchemaExecutor): Promise<SequencerReport> {
    await this.checkPreconditions(db);

    const context: SequencerContext = {
      db,
      logger: this.logger,
      backfillTenantId: this.backfillTenantId,
      outcome: {},
    };
    const report: SequencerReport = { applied: [], skipped: [], verified: false };

    for (const step of this.steps) {
      if (await step.isApplied(context)) {
        this.logger.debug(`Skipping ${step.id}: already applied`);
        report.skipped.push(step.id);
        continue;
      }

      this.logger.info(`Applying ${step.id}: ${step.description}`);
      await step.apply(context);
      report.applied.push(step.id);
    }

    await verifyTenantIsolation(db);
    report.verified = true;
    report.backfill = context.outcome.backfill;

    this.logger.info('Tenant isolation verified', {
      applied: report.applied,
      skipped: report.skipped,
    });
    return report;
  }

  /**
   * Same as `apply`, inside a transaction of its own
   */
  async run(db: SchemaExecutor): Promise<SequencerReport> {
    return db.transaction().execute((trx) => this.apply(trx));
  }

  private async checkPreconditions(db: SchemaExecutor): Promise<void> {
    const missing: string[] = [];

    if (!(await tableExists(db, TENANTS_TABLE))) {
      missing.push(`table ${TENANTS_TABLE}`);
    }
    for (const role of Object.values(CLIENT_ROLES)) {
      if (!(await roleExists(db, role))) {
        missing.push(`role ${role}`);
      }
    }
    for (const table of LEGACY_TABLES) {
      if (!(await tableExists(db, table))) {
        missing.push(`table ${table}`);
      }
    }

    if (missing.length > 0) {
      throw new MigrationPreconditionError(
        `Tenant isolation prerequisites are missing: ${missing.join(', ')}`,
        { missing }
      );
    }
  }
}
