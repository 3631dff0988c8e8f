/**
 * Zettl Storage Migrations
 *
 * Schema history, the tenant-isolation sequencer and the backup-gated runner
 */

export {
  buildMigrationRegistry,
  CodeMigrationProvider,
  createMigrationProvider,
  getMigrationNames,
  validateMigrationRegistry,
} from './database/migration-provider.js';
export type { MigrationRegistry, MigrationRegistryOptions } from './database/migration-provider.js';
export { MigrationRunner } from './database/migration-runner.js';
export type { MigrationRunnerOptions, MigrationRunResult } from './database/migration-runner.js';
export { ensurePrerequisites, ensureClientRole } from './database/prerequisites.js';

export {
  PgDumpBackupService,
  buildPgDumpArgs,
  redactConnectionString,
  restoreCommandFor,
  backupFileName,
} from './backup/pg-dump-backup.js';
export type { BackupResult, BackupService, CommandRunner, CommandResult } from './backup/pg-dump-backup.js';

export { TenantIsolationSequencer } from './sequencer/tenant-isolation-sequencer.js';
export type { SequencerOptions } from './sequencer/tenant-isolation-sequencer.js';
export { TENANT_ISOLATION_STEPS } from './sequencer/steps.js';
export { collectIsolationFailures, verifyTenantIsolation } from './sequencer/verification.js';
export { installTenantGuards, inspectTenantGuards, policyNameFor, stampTriggerNameFor } from './sequencer/tenant-guards.js';
export type { BackfillDecision, MigrationStep, SequencerContext, SequencerReport } from './sequencer/types.js';

export * from './errors.js';
