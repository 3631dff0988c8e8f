/**
 * Catalog inspection used by the sequencer steps and verification.
 *
 * Every lookup is scoped to the current schema, which is where the migrations
 * create their tables.
 */

import { sql, type Kysely } from 'kysely';

export type SchemaExecutor = Kysely<unknown>;

export interface ColumnState {
  exists: boolean;
  nullable: boolean;
}

export interface ConstraintInfo {
  table: string;
  name: string;
  columns: string[];
}

export async function tableExists(db: SchemaExecutor, table: string): Promise<boolean> {
  const { rows } = await sql<{ exists: boolean }>`
    SELECT EXISTS (
      SELECT 1 FROM pg_catalog.pg_class c
      JOIN pg_catalog.pg_namespace n ON n.oid = c.relnamespace
      WHERE n.nspname = current_schema() AND c.relname = ${table} AND c.relkind IN ('r', 'p')
    ) AS exists
  `.execute(db);
  return rows[0]?.exists ?? false;
}

export async function roleExists(db: SchemaExecutor, role: string): Promise<boolean> {
  const { rows } = await sql<{ exists: boolean }>`
    SELECT EXISTS (SELECT 1 FROM pg_catalog.pg_roles WHERE rolname = ${role}) AS exists
  `.execute(db);
  return rows[0]?.exists ?? false;
}

export async function columnState(db: SchemaExecutor, table: string, column: string): Promise<ColumnState> {
  const { rows } = await sql<{ is_nullable: string }>`
    SELECT is_nullable
    FROM information_schema.columns
    WHERE table_schema = current_schema() AND table_name = ${table} AND column_name = ${column}
  `.execute(db);
  const row = rows[0];
  return row ? { exists: true, nullable: row.is_nullable === 'YES' } : { exists: false, nullable: true };
}

export async function countNullTenantRows(db: SchemaExecutor, table: string): Promise<number> {
  const { rows } = await sql<{ count: number }>`
    SELECT count(*)::int AS count FROM ${sql.table(table)} WHERE tenant_id IS NULL
  `.execute(db);
  return rows[0]?.count ?? 0;
}

/**
 * Constraints of one kind on a table with their columns in key order
 */
async function constraintsOf(
  db: SchemaExecutor,
  table: string,
  kind: 'p' | 'u' | 'f'
): Promise<ConstraintInfo[]> {
  const { rows } = await sql<{ name: string; columns: string }>`
    SELECT
      con.conname AS name,
      string_agg(att.attname::text, ',' ORDER BY k.ord) AS columns
    FROM pg_catalog.pg_constraint con
    JOIN pg_catalog.pg_class rel ON rel.oid = con.conrelid
    JOIN pg_catalog.pg_namespace nsp ON nsp.oid = rel.relnamespace
    CROSS JOIN LATERAL unnest(con.conkey) WITH ORDINALITY AS k(attnum, ord)
    JOIN pg_catalog.pg_attribute att ON att.attrelid = con.conrelid AND att.attnum = k.attnum
    WHERE nsp.nspname = current_schema() AND rel.relname = ${table} AND con.contype = ${kind}
    GROUP BY con.conname
    ORDER BY con.conname
  `.execute(db);

  return rows.map((row) => ({ table, name: row.name, columns: row.columns.split(',') }));
}

export async function primaryKey(db: SchemaExecutor, table: string): Promise<ConstraintInfo | undefined> {
  const keys = await constraintsOf(db, table, 'p');
  return keys[0];
}

export async function uniqueConstraints(db: SchemaExecutor, table: string): Promise<ConstraintInfo[]> {
  return constraintsOf(db, table, 'u');
}

/**
 * Foreign keys on any table of the current schema that reference
 * `referencedTable` through a single column
 */
export async function singleColumnReferencesTo(
  db: SchemaExecutor,
  referencedTable: string
): Promise<ConstraintInfo[]> {
  const { rows } = await sql<{ table_name: string; name: string; column_name: string }>`
    SELECT rel.relname AS table_name, con.conname AS name, att.attname AS column_name
    FROM pg_catalog.pg_constraint con
    JOIN pg_catalog.pg_class rel ON rel.oid = con.conrelid
    JOIN pg_catalog.pg_class ref ON ref.oid = con.confrelid
    JOIN pg_catalog.pg_namespace nsp ON nsp.oid = ref.relnamespace
    JOIN pg_catalog.pg_attribute att ON att.attrelid = con.conrelid AND att.attnum = con.conkey[1]
    WHERE con.contype = 'f'
      AND nsp.nspname = current_schema()
      AND ref.relname = ${referencedTable}
      AND cardinality(con.conkey) = 1
    ORDER BY rel.relname, con.conname
  `.execute(db);

  return rows.map((row) => ({ table: row.table_name, name: row.name, columns: [row.column_name] }));
}

export async function constraintExists(db: SchemaExecutor, table: string, name: string): Promise<boolean> {
  const { rows } = await sql<{ exists: boolean }>`
    SELECT EXISTS (
      SELECT 1 FROM pg_catalog.pg_constraint con
      JOIN pg_catalog.pg_class rel ON rel.oid = con.conrelid
      JOIN pg_catalog.pg_namespace nsp ON nsp.oid = rel.relnamespace
      WHERE nsp.nspname = current_schema() AND rel.relname = ${table} AND con.conname = ${name}
    ) AS exists
  `.execute(db);
  return rows[0]?.exists ?? false;
}

/**
 * `confdeltype` of a foreign key: `c` cascade, `a` no action, `r` restrict,
 * `n` set null, `d` set default
 */
export async function foreignKeyDeleteAction(
  db: SchemaExecutor,
  table: string,
  name: string
): Promise<string | undefined> {
  const { rows } = await sql<{ action: string }>`
    SELECT con.confdeltype AS action
    FROM pg_catalog.pg_constraint con
    JOIN pg_catalog.pg_class rel ON rel.oid = con.conrelid
    JOIN pg_catalog.pg_namespace nsp ON nsp.oid = rel.relnamespace
    WHERE nsp.nspname = current_schema()
      AND rel.relname = ${table}
      AND con.conname = ${name}
      AND con.contype = 'f'
  `.execute(db);
  return rows[0]?.action;
}

export async function indexExists(db: SchemaExecutor, name: string): Promise<boolean> {
  const { rows } = await sql<{ exists: boolean }>`
    SELECT EXISTS (
      SELECT 1 FROM pg_catalog.pg_indexes
      WHERE schemaname = current_schema() AND indexname = ${name}
    ) AS exists
  `.execute(db);
  return rows[0]?.exists ?? false;
}

export async function rowSecurityEnabled(db: SchemaExecutor, table: string): Promise<boolean> {
  const { rows } = await sql<{ enabled: boolean }>`
    SELECT c.relrowsecurity AS enabled
    FROM pg_catalog.pg_class c
    JOIN pg_catalog.pg_namespace n ON n.oid = c.relnamespace
    WHERE n.nspname = current_schema() AND c.relname = ${table}
  `.execute(db);
  return rows[0]?.enabled ?? false;
}

export async function policyExists(db: SchemaExecutor, table: string, policy: string): Promise<boolean> {
  const { rows } = await sql<{ exists: boolean }>`
    SELECT EXISTS (
      SELECT 1 FROM pg_catalog.pg_policies
      WHERE schemaname = current_schema() AND tablename = ${table} AND policyname = ${policy}
    ) AS exists
  `.execute(db);
  return rows[0]?.exists ?? false;
}

export async function triggerExists(db: SchemaExecutor, table: string, trigger: string): Promise<boolean> {
  const { rows } = await sql<{ exists: boolean }>`
    SELECT EXISTS (
      SELECT 1 FROM pg_catalog.pg_trigger t
      JOIN pg_catalog.pg_class c ON c.oid = t.tgrelid
      JOIN pg_catalog.pg_namespace n ON n.oid = c.relnamespace
      WHERE n.nspname = current_schema() AND c.relname = ${table}
        AND t.tgname = ${trigger} AND NOT t.tgisinternal
    ) AS exists
  `.execute(db);
  return rows[0]?.exists ?? false;
}

export async function functionExists(db: SchemaExecutor, schema: string, name: string): Promise<boolean> {
  const { rows } = await sql<{ exists: boolean }>`
    SELECT EXISTS (
      SELECT 1 FROM pg_catalog.pg_proc p
      JOIN pg_catalog.pg_namespace n ON n.oid = p.pronamespace
      WHERE n.nspname = ${schema} AND p.proname = ${name}
    ) AS exists
  `.execute(db);
  return rows[0]?.exists ?? false;
}

export async function hasTablePrivilege(
  db: SchemaExecutor,
  role: string,
  table: string,
  privilege: string
): Promise<boolean> {
  const { rows } = await sql<{ granted: boolean }>`
    SELECT has_table_privilege(${role}::name, format('%I.%I', current_schema(), ${table}::text), ${privilege}::text) AS granted
  `.execute(db);
  return rows[0]?.granted ?? false;
}

export async function relationOwner(db: SchemaExecutor, relation: string): Promise<string | undefined> {
  const { rows } = await sql<{ owner: string }>`
    SELECT pg_get_userbyid(c.relowner) AS owner
    FROM pg_catalog.pg_class c
    JOIN pg_catalog.pg_namespace n ON n.oid = c.relnamespace
    WHERE n.nspname = current_schema() AND c.relname = ${relation}
  `.execute(db);
  return rows[0]?.owner;
}
