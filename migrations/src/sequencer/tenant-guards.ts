/**
 * Tenant Guards
 *
 * The identity function, the stamping trigger and the row-level security
 * policy shared by every tenant-scoped table. Installation is idempotent, so
 * the sequencer and later migrations can both call it.
 */

import { sql } from 'kysely';
import { ADMIN_OVERRIDE_SETTING, CLAIMS_SETTING, CLIENT_ROLES, MAX_TENANT_ID } from '@zettl/core';
import {
  functionExists,
  hasTablePrivilege,
  policyExists,
  rowSecurityEnabled,
  triggerExists,
  type SchemaExecutor,
} from './catalog.js';

export const AUTH_SCHEMA = 'auth';
export const IDENTITY_FUNCTION = 'tenant_id';
export const STAMP_FUNCTION = 'stamp_tenant_id';

const CLIENT_PRIVILEGES = ['SELECT', 'INSERT', 'UPDATE', 'DELETE'] as const;

export function policyNameFor(table: string): string {
  return `${table}_tenant_isolation`;
}

export function stampTriggerNameFor(table: string): string {
  return `${table}_stamp_tenant_id`;
}

/**
 * `auth.tenant_id()` and `auth.stamp_tenant_id()`
 */
export async function installIdentityResolution(db: SchemaExecutor): Promise<void> {
  await sql`CREATE SCHEMA IF NOT EXISTS ${sql.id(AUTH_SCHEMA)}`.execute(db);
  await sql`GRANT USAGE ON SCHEMA ${sql.id(AUTH_SCHEMA)} TO ${sql.id(CLIENT_ROLES.authenticated)}`.execute(db);

  // Absent, empty or malformed claims and a missing, non-numeric or
  // out-of-range sub all resolve to NULL
  await sql`
    CREATE OR REPLACE FUNCTION ${sql.id(AUTH_SCHEMA, IDENTITY_FUNCTION)}()
    RETURNS integer
    LANGUAGE plpgsql
    STABLE
    AS $$
    DECLARE
      claims text := current_setting(${sql.lit(CLAIMS_SETTING)}, true);
      subject text;
    BEGIN
      IF claims IS NULL OR btrim(claims) = '' THEN
        RETURN NULL;
      END IF;

      BEGIN
        subject := claims::json ->> 'sub';
      EXCEPTION WHEN others THEN
        RETURN NULL;
      END;

      IF subject IS NULL OR subject !~ '^[1-9][0-9]{0,9}$' THEN
        RETURN NULL;
      END IF;

      IF subject::bigint > ${sql.lit(MAX_TENANT_ID)} THEN
        RETURN NULL;
      END IF;

      RETURN subject::integer;
    END;
    $$
  `.execute(db);

  // Not SECURITY DEFINER: current_user must be the caller's role for the
  // override check to mean anything
  await sql`
    CREATE OR REPLACE FUNCTION ${sql.id(AUTH_SCHEMA, STAMP_FUNCTION)}()
    RETURNS trigger
    LANGUAGE plpgsql
    AS $$
    DECLARE
      resolved integer;
    BEGIN
      IF current_setting(${sql.lit(ADMIN_OVERRIDE_SETTING)}, true) = 'on'
         AND current_user NOT IN (${sql.lit(CLIENT_ROLES.authenticated)}, ${sql.lit(CLIENT_ROLES.anonymous)}) THEN
        IF NEW.tenant_id IS NULL THEN
          RAISE EXCEPTION 'Administrative override on % requires an explicit tenant_id', TG_TABLE_NAME
            USING ERRCODE = '28000';
        END IF;
        RETURN NEW;
      END IF;

      resolved := ${sql.id(AUTH_SCHEMA, IDENTITY_FUNCTION)}();
      IF resolved IS NULL THEN
        RAISE EXCEPTION 'Cannot determine tenant from session claims for insert into %. Authentication required.', TG_TABLE_NAME
          USING ERRCODE = '28000';
      END IF;

      NEW.tenant_id := resolved;
      RETURN NEW;
    END;
    $$
  `.execute(db);
}

/**
 * Stamping trigger, row-level security, the isolation policy and grants for
 * one table
 */
export async function guardTable(db: SchemaExecutor, table: string): Promise<void> {
  const trigger = stampTriggerNameFor(table);
  const policy = policyNameFor(table);
  const authenticated = sql.id(CLIENT_ROLES.authenticated);

  await sql`DROP TRIGGER IF EXISTS ${sql.id(trigger)} ON ${sql.table(table)}`.execute(db);
  await sql`
    CREATE TRIGGER ${sql.id(trigger)}
    BEFORE INSERT ON ${sql.table(table)}
    FOR EACH ROW
    EXECUTE FUNCTION ${sql.id(AUTH_SCHEMA, STAMP_FUNCTION)}()
  `.execute(db);

  await sql`ALTER TABLE ${sql.table(table)} ENABLE ROW LEVEL SECURITY`.execute(db);

  await sql`DROP POLICY IF EXISTS ${sql.id(policy)} ON ${sql.table(table)}`.execute(db);
  await sql`
    CREATE POLICY ${sql.id(policy)} ON ${sql.table(table)}
    FOR ALL
    TO ${authenticated}
    USING (tenant_id = ${sql.id(AUTH_SCHEMA, IDENTITY_FUNCTION)}())
    WITH CHECK (tenant_id = ${sql.id(AUTH_SCHEMA, IDENTITY_FUNCTION)}())
  `.execute(db);

  await sql`GRANT SELECT, INSERT, UPDATE, DELETE ON ${sql.table(table)} TO ${authenticated}`.execute(db);
  await sql`REVOKE ALL ON ${sql.table(table)} FROM ${sql.id(CLIENT_ROLES.anonymous)}`.execute(db);
}

/**
 * Sequences owned by columns of `table` (serial and identity columns)
 */
export async function ownedSequences(db: SchemaExecutor, table: string): Promise<string[]> {
  const { rows } = await sql<{ sequence: string }>`
    SELECT seq.relname AS sequence
    FROM pg_catalog.pg_class seq
    JOIN pg_catalog.pg_depend dep ON dep.objid = seq.oid AND dep.deptype IN ('a', 'i')
    JOIN pg_catalog.pg_class tbl ON tbl.oid = dep.refobjid
    JOIN pg_catalog.pg_namespace nsp ON nsp.oid = tbl.relnamespace
    WHERE seq.relkind = 'S'
      AND nsp.nspname = current_schema()
      AND tbl.relname = ${table}
    ORDER BY seq.relname
  `.execute(db);
  return rows.map((row) => row.sequence);
}

/**
 * Sequences back the surrogate ids of links and tags. Only the sequences of
 * guarded tables are granted; `tenants_id_seq` stays out of reach.
 */
export async function grantSequenceUsage(db: SchemaExecutor, tables: readonly string[]): Promise<void> {
  for (const table of tables) {
    for (const sequence of await ownedSequences(db, table)) {
      await sql`
        GRANT USAGE, SELECT ON SEQUENCE ${sql.table(sequence)} TO ${sql.id(CLIENT_ROLES.authenticated)}
      `.execute(db);
    }
  }
}

export async function installTenantGuards(db: SchemaExecutor, tables: readonly string[]): Promise<void> {
  await installIdentityResolution(db);
  for (const table of tables) {
    await guardTable(db, table);
  }
  await grantSequenceUsage(db, tables);
}

/**
 * Problems with the guards on `tables`, empty when fully installed
 */
export async function inspectTenantGuards(db: SchemaExecutor, tables: readonly string[]): Promise<string[]> {
  const problems: string[] = [];

  for (const fn of [IDENTITY_FUNCTION, STAMP_FUNCTION]) {
    if (!(await functionExists(db, AUTH_SCHEMA, fn))) {
      problems.push(`function ${AUTH_SCHEMA}.${fn}() is missing`);
    }
  }

  for (const table of tables) {
    if (!(await rowSecurityEnabled(db, table))) {
      problems.push(`row level security is disabled on ${table}`);
    }
    if (!(await policyExists(db, table, policyNameFor(table)))) {
      problems.push(`policy ${policyNameFor(table)} is missing`);
    }
    if (!(await triggerExists(db, table, stampTriggerNameFor(table)))) {
      problems.push(`trigger ${stampTriggerNameFor(table)} is missing`);
    }
    for (const privilege of CLIENT_PRIVILEGES) {
      if (!(await hasTablePrivilege(db, CLIENT_ROLES.authenticated, table, privilege))) {
        problems.push(`${CLIENT_ROLES.authenticated} lacks ${privilege} on ${table}`);
      }
    }
    if (await hasTablePrivilege(db, CLIENT_ROLES.anonymous, table, 'SELECT')) {
      problems.push(`${CLIENT_ROLES.anonymous} can read ${table}`);
    }
  }

  return problems;
}
