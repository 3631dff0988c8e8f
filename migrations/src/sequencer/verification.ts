import { MigrationPostconditionError } from '../errors.js';
import {
  columnState,
  constraintExists,
  countNullTenantRows,
  foreignKeyDeleteAction,
  primaryKey,
  type SchemaExecutor,
} from './catalog.js';
import { COMPOSITE_PRIMARY_KEYS, COMPOSITE_REFERENCES, LEGACY_TABLES, TENANT_UNIQUE_CONSTRAINTS } from './schema-plan.js';
import { inspectTenantGuards } from './tenant-guards.js';

/**
 * Everything that must hold once the tenant-isolation steps have run.
 * Returns the failures instead of stopping at the first one.
 */
export async function collectIsolationFailures(db: SchemaExecutor): Promise<string[]> {
  const failures: string[] = [];

  for (const table of LEGACY_TABLES) {
    const column = await columnState(db, table, 'tenant_id');
    if (!column.exists) {
      failures.push(`${table}.tenant_id does not exist`);
      continue;
    }
    if (column.nullable) {
      failures.push(`${table}.tenant_id is nullable`);
    }

    const orphans = await countNullTenantRows(db, table);
    if (orphans > 0) {
      failures.push(`${table} has ${orphans} rows without a tenant`);
    }

    const expected = COMPOSITE_PRIMARY_KEYS[table];
    const key = await primaryKey(db, table);
    const actual = key?.columns.join(', ') ?? 'none';
    if (actual !== expected.join(', ')) {
      failures.push(`${table} primary key is (${actual}), expected (${expected.join(', ')})`);
    }
  }

  for (const reference of COMPOSITE_REFERENCES) {
    const action = await foreignKeyDeleteAction(db, reference.table, reference.name);
    if (action === undefined) {
      failures.push(`constraint ${reference.table}.${reference.name} is missing`);
    } else if (action !== 'c') {
      failures.push(`constraint ${reference.table}.${reference.name} does not cascade on delete`);
    }
  }

  for (const constraint of TENANT_UNIQUE_CONSTRAINTS) {
    if (!(await constraintExists(db, constraint.table, constraint.name))) {
      failures.push(`constraint ${constraint.table}.${constraint.name} is missing`);
    }
  }

  failures.push(...(await inspectTenantGuards(db, LEGACY_TABLES)));
  return failures;
}

export async function verifyTenantIsolation(db: SchemaExecutor): Promise<void> {
  const failures = await collectIsolationFailures(db);
  if (failures.length > 0) {
    throw new MigrationPostconditionError(failures);
  }
}
