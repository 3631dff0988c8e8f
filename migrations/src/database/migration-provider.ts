/**
 * Custom migration provider that loads migrations from code
 * instead of files, so the registry is fixed at build time
 */

import type { Migration, MigrationProvider } from 'kysely';
import { logger } from '../utils/logger.js';
import { MigrationError } from '../errors.js';

import { initialSchema } from '../migrations/001_initial_schema.js';
import {
  createTenantIsolationMigration,
  type TenantIsolationMigrationOptions,
} from '../migrations/002_tenant_isolation.js';
import { chatSchema } from '../migrations/003_chat_schema.js';
import { derivedViews } from '../migrations/004_derived_views.js';
import { adminOverrideAudit } from '../migrations/005_admin_override_audit.js';

export type MigrationRegistry = Record<string, Migration>;

export type MigrationRegistryOptions = TenantIsolationMigrationOptions;

/**
 * Migration registry that maps migration names to their implementations.
 * The tenant-isolation migration takes the backfill tenant from `options`.
 */
export function buildMigrationRegistry(options: MigrationRegistryOptions = {}): MigrationRegistry {
  return {
    '001_initial_schema': initialSchema,
    '002_tenant_isolation': createTenantIsolationMigration(options),
    '003_chat_schema': chatSchema,
    '004_derived_views': derivedViews,
    '005_admin_override_audit': adminOverrideAudit,
  };
}

/**
 * Custom migration provider that serves a registry from memory
 */
export class CodeMigrationProvider implements MigrationProvider {
  constructor(private readonly registry: MigrationRegistry = buildMigrationRegistry()) {}

  async getMigrations(): Promise<Record<string, Migration>> {
    logger.info(`Loading ${Object.keys(this.registry).length} migrations from registry`);
    validateMigrationRegistry(this.registry);
    return this.registry;
  }
}

/**
 * Factory function to create migration provider instance
 */
export function createMigrationProvider(options: MigrationRegistryOptions = {}): MigrationProvider {
  return new CodeMigrationProvider(buildMigrationRegistry(options));
}

/**
 * Get list of migration names in execution order
 */
export function getMigrationNames(registry: MigrationRegistry): string[] {
  return Object.keys(registry).sort();
}

/**
 * Validate migration registry integrity: naming, sequential numbering and
 * both directions present
 */
export function validateMigrationRegistry(registry: MigrationRegistry): void {
  const names = getMigrationNames(registry);

  for (const name of names) {
    if (!/^\d{3}_[a-z_]+$/.test(name)) {
      throw new MigrationError(
        'MIGRATION_REGISTRY_INVALID',
        `Migration ${name} does not follow naming convention: 001_migration_name`,
        { migration: name }
      );
    }
  }

  names.forEach((name, index) => {
    const expectedNumber = String(index + 1).padStart(3, '0');
    if (!name.startsWith(`${expectedNumber}_`)) {
      throw new MigrationError(
        'MIGRATION_REGISTRY_INVALID',
        `Migration ${name} should be numbered ${expectedNumber}_`,
        { migration: name, expectedNumber }
      );
    }
  });

  for (const name of names) {
    const migration = registry[name];
    if (typeof migration?.up !== 'function') {
      throw new MigrationError('MIGRATION_REGISTRY_INVALID', `Migration ${name} is missing required 'up' method`, {
        migration: name,
      });
    }
    if (typeof migration.down !== 'function') {
      throw new MigrationError('MIGRATION_REGISTRY_INVALID', `Migration ${name} is missing required 'down' method`, {
        migration: name,
      });
    }
  }

  logger.debug(`Migration registry validated: ${names.length} migrations ready for execution`);
}
