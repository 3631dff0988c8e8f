import { describe, expect, it } from 'vitest';
import {
  DummyDriver,
  Kysely,
  PostgresAdapter,
  PostgresIntrospector,
  PostgresQueryCompiler,
  type Migration,
} from 'kysely';
import {
  buildMigrationRegistry,
  getMigrationNames,
  IrreversibleMigrationError,
  MigrationError,
  validateMigrationRegistry,
} from '@zettl/migrations';

const noop: Migration = {
  async up() {},
  async down() {},
};

describe('migration registry', () => {
  it('should list the migrations in order', () => {
    expect(getMigrationNames(buildMigrationRegistry())).toEqual([
      '001_initial_schema',
      '002_tenant_isolation',
      '003_chat_schema',
      '004_derived_views',
      '005_admin_override_audit',
    ]);
    expect(() => validateMigrationRegistry(buildMigrationRegistry())).not.toThrow();
  });

  it('should reject names outside the convention', () => {
    expect(() => validateMigrationRegistry({ '1_first': noop })).toThrow(
      'Migration 1_first does not follow naming convention: 001_migration_name'
    );
  });

  it('should reject gaps in the numbering', () => {
    expect(() => validateMigrationRegistry({ '001_first': noop, '003_third': noop })).toThrow(
      'Migration 003_third should be numbered 002_'
    );
  });

  it('should require both directions', () => {
    const upOnly: Migration = { async up() {} };

    expect(() => validateMigrationRegistry({ '001_first': upOnly })).toThrow(MigrationError);
    expect(() => validateMigrationRegistry({ '001_first': upOnly })).toThrow(
      "Migration 001_first is missing required 'down' method"
    );
  });

  it('should refuse to reverse the tenant isolation migration', async () => {
    const db = new Kysely<unknown>({
      dialect: {
        createAdapter: () => new PostgresAdapter(),
        createDriver: () => new DummyDriver(),
        createIntrospector: (instance) => new PostgresIntrospector(instance),
        createQueryCompiler: () => new PostgresQueryCompiler(),
      },
    });

    await expect(buildMigrationRegistry()['002_tenant_isolation']?.down?.(db)).rejects.toBeInstanceOf(
      IrreversibleMigrationError
    );
    await db.destroy();
  });
});
