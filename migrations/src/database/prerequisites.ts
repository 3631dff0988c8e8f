/**
 * Prerequisites of the tenant-scoped schema
 *
 * In production the auth service owns the `tenants` table and the client
 * roles. This bootstrap creates them for development databases and tests;
 * every statement is a no-op when the object already exists.
 */

import { sql, type Kysely } from 'kysely';
import { CLIENT_ROLES } from '@zettl/core';
import { logger } from '../utils/logger.js';

export async function ensureClientRole(db: Kysely<unknown>, role: string): Promise<void> {
  await sql`
    DO $$
    BEGIN
      IF NOT EXISTS (SELECT 1 FROM pg_catalog.pg_roles WHERE rolname = ${sql.lit(role)}) THEN
        CREATE ROLE ${sql.id(role)} NOLOGIN;
      END IF;
    END
    $$
  `.execute(db);
}

export async function ensurePrerequisites(db: Kysely<unknown>): Promise<void> {
  for (const role of Object.values(CLIENT_ROLES)) {
    await ensureClientRole(db, role);
  }

  await db.schema
    .createTable('tenants')
    .ifNotExists()
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('handle', 'text', (col) => col.notNull().unique())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('is_active', 'boolean', (col) => col.notNull().defaultTo(true))
    .execute();

  // Ownership of notes_with_tags is handed to the authenticated role, which a
  // non-superuser migrator can only do as a member of it
  await sql`
    DO $$
    BEGIN
      IF NOT pg_has_role(current_user, ${sql.lit(CLIENT_ROLES.authenticated)}, 'MEMBER') THEN
        EXECUTE format('GRANT %I TO %I', ${sql.lit(CLIENT_ROLES.authenticated)}, current_user);
      END IF;
    END
    $$
  `.execute(db);

  logger.debug('Tenancy prerequisites in place');
}
