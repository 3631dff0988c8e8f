/**
 * Administrative Override Audit Migration
 *
 * One row per privileged cross-tenant operation. Client roles have no access.
 */

import { Kysely, sql } from 'kysely';
import type { Migration } from 'kysely';
import { CLIENT_ROLES } from '@zettl/core';
import { logger } from '../utils/logger.js';

export const adminOverrideAudit: Migration = {
  async up(db: Kysely<any>): Promise<void> {
    logger.info('Running migration: 005_admin_override_audit (up)');

    await db.schema
      .createTable('admin_override_audit')
      .addColumn('id', 'serial', (col) => col.primaryKey())
      .addColumn('tenant_id', 'integer', (col) => col.notNull().references('tenants.id').onDelete('cascade'))
      .addColumn('actor', 'text', (col) => col.notNull())
      .addColumn('reason', 'text', (col) => col.notNull())
      .addColumn('operation', 'text', (col) => col.notNull())
      .addColumn('rows_affected', 'integer')
      .addColumn('started_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
      .addColumn('finished_at', 'timestamptz')
      .execute();

    await db.schema
      .createIndex('idx_admin_override_audit_tenant')
      .on('admin_override_audit')
      .columns(['tenant_id', 'started_at'])
      .execute();

    await sql`
      REVOKE ALL ON admin_override_audit
      FROM PUBLIC, ${sql.id(CLIENT_ROLES.authenticated)}, ${sql.id(CLIENT_ROLES.anonymous)}
    `.execute(db);

    logger.info('Migration 005_admin_override_audit completed');
  },

  async down(db: Kysely<any>): Promise<void> {
    logger.info('Running migration: 005_admin_override_audit (down)');
    await db.schema.dropTable('admin_override_audit').ifExists().execute();
  },
};
