/**
 * Tenant Isolation Steps
 *
 * The order is load-bearing: columns are added nullable, backfilled, then
 * made NOT NULL; foreign keys on the old single-column note key are dropped
 * before that key is; composite keys exist before the composite references
 * that need them; the guards go on last.
 */

import { sql } from 'kysely';
import { MigrationPreconditionError } from '../errors.js';
import {
  columnState,
  constraintExists,
  countNullTenantRows,
  foreignKeyDeleteAction,
  indexExists,
  primaryKey,
  singleColumnReferencesTo,
  uniqueConstraints,
  type ConstraintInfo,
} from './catalog.js';
import {
  COMPOSITE_PRIMARY_KEYS,
  COMPOSITE_REFERENCES,
  LEGACY_INDEXES,
  LEGACY_TABLES,
  TENANT_INDEXES,
  TENANT_UNIQUE_CONSTRAINTS,
  TENANTS_TABLE,
} from './schema-plan.js';
import { inspectTenantGuards, installTenantGuards } from './tenant-guards.js';
import type { BackfillDecision, MigrationStep, SequencerContext } from './types.js';

const CASCADE = 'c';

function sameColumns(actual: readonly string[] | undefined, expected: readonly string[]): boolean {
  return actual !== undefined &&
    actual.length === expected.length &&
    actual.every((column, index) => column === expected[index]);
}

// ===================
// 1. ADD TENANT COLUMNS
// ===================

export const addTenantColumns: MigrationStep = {
  id: 'add_tenant_columns',
  description: 'Add nullable tenant_id columns referencing tenants',

  async isApplied({ db }) {
    for (const table of LEGACY_TABLES) {
      if (!(await columnState(db, table, 'tenant_id')).exists) {
        return false;
      }
    }
    return true;
  },

  async apply({ db, logger }) {
    for (const table of LEGACY_TABLES) {
      if ((await columnState(db, table, 'tenant_id')).exists) {
        continue;
      }
      await db.schema
        .alterTable(table)
        .addColumn('tenant_id', 'integer', (col) => col.references(`${TENANTS_TABLE}.id`).onDelete('cascade'))
        .execute();
      logger.info(`Added tenant_id to ${table}`);
    }
  },
};

// ===================
// 2. BACKFILL
// ===================

async function resolveBackfillTenant(context: SequencerContext): Promise<Pick<BackfillDecision, 'tenantId' | 'source'>> {
  const { db, backfillTenantId } = context;

  if (backfillTenantId !== undefined) {
    const { rows } = await sql<{ id: number }>`
      SELECT id FROM ${sql.table(TENANTS_TABLE)} WHERE id = ${backfillTenantId}
    `.execute(db);
    if (rows.length === 0) {
      throw new MigrationPreconditionError(
        `Backfill tenant ${backfillTenantId} does not exist`,
        { backfillTenantId }
      );
    }
    return { tenantId: backfillTenantId, source: 'explicit' };
  }

  const { rows } = await sql<{ id: number }>`
    SELECT id FROM ${sql.table(TENANTS_TABLE)} ORDER BY created_at, id LIMIT 1
  `.execute(db);
  const earliest = rows[0];
  if (!earliest) {
    throw new MigrationPreconditionError(
      'No tenant found to own existing rows. Create a tenant first or set MIGRATION_BACKFILL_TENANT_ID.'
    );
  }
  return { tenantId: earliest.id, source: 'earliest_tenant' };
}

export const backfillTenantIds: MigrationStep = {
  id: 'backfill_tenant_ids',
  description: 'Assign every existing row to the backfill tenant',

  async isApplied({ db }) {
    for (const table of LEGACY_TABLES) {
      if ((await countNullTenantRows(db, table)) > 0) {
        return false;
      }
    }
    return true;
  },

  async apply(context) {
    const { db, logger } = context;
    const { tenantId, source } = await resolveBackfillTenant(context);

    logger.warn(`Backfilling existing rows to tenant ${tenantId}`, { tenantId, source });

    const rowsUpdated: Record<string, number> = {};
    for (const table of LEGACY_TABLES) {
      const result = await sql`
        UPDATE ${sql.table(table)} SET tenant_id = ${tenantId} WHERE tenant_id IS NULL
      `.execute(db);
      rowsUpdated[table] = Number(result.numAffectedRows ?? 0n);
    }

    context.outcome.backfill = { tenantId, source, rowsUpdated };
    logger.info('Backfill complete', { tenantId, rowsUpdated });
  },
};

// ===================
// 3. REQUIRE TENANT COLUMNS
// ===================

export const requireTenantColumns: MigrationStep = {
  id: 'require_tenant_columns',
  description: 'Make tenant_id NOT NULL',

  async isApplied({ db }) {
    for (const table of LEGACY_TABLES) {
      const column = await columnState(db, table, 'tenant_id');
      if (!column.exists || column.nullable) {
        return false;
      }
    }
    return true;
  },

  async apply({ db }) {
    for (const table of LEGACY_TABLES) {
      await db.schema.alterTable(table).alterColumn('tenant_id', (col) => col.setNotNull()).execute();
    }
  },
};

// ===================
// 4. DROP LEGACY FOREIGN KEYS
// ===================

/**
 * Foreign keys on the bare note id, and unique constraints without tenant_id
 */
async function findLegacyConstraints(context: SequencerContext): Promise<ConstraintInfo[]> {
  const { db } = context;
  const legacy = await singleColumnReferencesTo(db, 'notes');

  for (const table of LEGACY_TABLES) {
    const uniques = await uniqueConstraints(db, table);
    legacy.push(...uniques.filter((constraint) => !constraint.columns.includes('tenant_id')));
  }
  return legacy;
}

export const dropLegacyForeignKeys: MigrationStep = {
  id: 'drop_legacy_foreign_keys',
  description: 'Drop foreign keys and unique constraints on single-column note ids',

  async isApplied(context) {
    return (await findLegacyConstraints(context)).length === 0;
  },

  async apply(context) {
    const { db, logger } = context;
    for (const constraint of await findLegacyConstraints(context)) {
      await sql`
        ALTER TABLE ${sql.table(constraint.table)} DROP CONSTRAINT IF EXISTS ${sql.id(constraint.name)}
      `.execute(db);
      logger.info(`Dropped ${constraint.table}.${constraint.name} (${constraint.columns.join(', ')})`);
    }
  },
};

// ===================
// 5. REBUILD PRIMARY KEYS
// ===================

export const rebuildPrimaryKeys: MigrationStep = {
  id: 'rebuild_primary_keys',
  description: 'Replace single-column primary keys with (tenant_id, local id)',

  async isApplied({ db }) {
    for (const table of LEGACY_TABLES) {
      const key = await primaryKey(db, table);
      if (!sameColumns(key?.columns, COMPOSITE_PRIMARY_KEYS[table])) {
        return false;
      }
    }
    return true;
  },

  async apply({ db, logger }) {
    for (const table of LEGACY_TABLES) {
      const expected = COMPOSITE_PRIMARY_KEYS[table];
      const key = await primaryKey(db, table);
      if (sameColumns(key?.columns, expected)) {
        continue;
      }
      if (key) {
        await db.schema.alterTable(table).dropConstraint(key.name).execute();
      }
      await sql`
        ALTER TABLE ${sql.table(table)}
        ADD CONSTRAINT ${sql.id(`${table}_pkey`)}
        PRIMARY KEY (${sql.join(expected.map((column) => sql.id(column)))})
      `.execute(db);
      logger.info(`Primary key of ${table} is now (${expected.join(', ')})`);
    }
  },
};

// ===================
// 6. COMPOSITE REFERENCES
// ===================

export const createCompositeReferences: MigrationStep = {
  id: 'create_composite_references',
  description: 'Create composite foreign keys and tenant-scoped unique constraints',

  async isApplied({ db }) {
    for (const reference of COMPOSITE_REFERENCES) {
      if ((await foreignKeyDeleteAction(db, reference.table, reference.name)) !== CASCADE) {
        return false;
      }
    }
    for (const unique of TENANT_UNIQUE_CONSTRAINTS) {
      if (!(await constraintExists(db, unique.table, unique.name))) {
        return false;
      }
    }
    return true;
  },

  async apply({ db, logger }) {
    for (const reference of COMPOSITE_REFERENCES) {
      const action = await foreignKeyDeleteAction(db, reference.table, reference.name);
      if (action === CASCADE) {
        continue;
      }
      if (action !== undefined) {
        // Links and tags have to go with their note
        await sql`
          ALTER TABLE ${sql.table(reference.table)} DROP CONSTRAINT ${sql.id(reference.name)}
        `.execute(db);
        logger.info(`Recreating ${reference.table}.${reference.name} with ON DELETE CASCADE`);
      }
      await db.schema
        .alterTable(reference.table)
        .addForeignKeyConstraint(
          reference.name,
          [...reference.columns],
          reference.referencedTable,
          [...reference.referencedColumns]
        )
        .onDelete('cascade')
        .execute();
    }

    for (const unique of TENANT_UNIQUE_CONSTRAINTS) {
      if (await constraintExists(db, unique.table, unique.name)) {
        continue;
      }
      await db.schema.alterTable(unique.table).addUniqueConstraint(unique.name, [...unique.columns]).execute();
    }
  },
};

// ===================
// 7. REBUILD INDEXES
// ===================

export const rebuildIndexes: MigrationStep = {
  id: 'rebuild_indexes',
  description: 'Replace local-id indexes with tenant-first composite indexes',

  async isApplied({ db }) {
    for (const name of LEGACY_INDEXES) {
      if (await indexExists(db, name)) {
        return false;
      }
    }
    for (const index of TENANT_INDEXES) {
      if (!(await indexExists(db, index.name))) {
        return false;
      }
    }
    return true;
  },

  async apply({ db }) {
    for (const name of LEGACY_INDEXES) {
      await db.schema.dropIndex(name).ifExists().execute();
    }
    for (const index of TENANT_INDEXES) {
      await db.schema.createIndex(index.name).ifNotExists().on(index.table).columns([...index.columns]).execute();
    }
  },
};

// ===================
// 8. TENANT GUARDS
// ===================

export const installGuards: MigrationStep = {
  id: 'install_tenant_guards',
  description: 'Install identity resolution, stamping triggers, RLS policies and grants',

  async isApplied({ db }) {
    return (await inspectTenantGuards(db, LEGACY_TABLES)).length === 0;
  },

  async apply({ db, logger }) {
    await installTenantGuards(db, LEGACY_TABLES);
    logger.info(`Tenant guards installed on ${LEGACY_TABLES.join(', ')}`);
  },
};

export const TENANT_ISOLATION_STEPS: readonly MigrationStep[] = [
  addTenantColumns,
  backfillTenantIds,
  requireTenantColumns,
  dropLegacyForeignKeys,
  rebuildPrimaryKeys,
  createCompositeReferences,
  rebuildIndexes,
  installGuards,
];
