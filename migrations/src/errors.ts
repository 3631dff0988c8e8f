/**
 * Migration Error Classes
 */

export type MigrationErrorDetails = Record<string, unknown>;

export class MigrationError extends Error {
  public readonly code: string;
  public readonly details?: MigrationErrorDetails;

  constructor(code: string, message: string, details?: MigrationErrorDetails) {
    super(message);
    this.name = 'MigrationError';
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MigrationError);
    }
  }
}

/**
 * A prerequisite (table, role or backfill tenant) is missing. Raised before
 * anything is changed, or inside the migration transaction so it rolls back.
 */
export class MigrationPreconditionError extends MigrationError {
  constructor(message: string, details?: MigrationErrorDetails) {
    super('MIGRATION_PRECONDITION_FAILED', message, details);
    this.name = 'MigrationPreconditionError';
  }
}

/**
 * Verification found the schema in an unexpected state after the steps ran
 */
export class MigrationPostconditionError extends MigrationError {
  public readonly failures: string[];

  constructor(failures: string[]) {
    super(
      'MIGRATION_POSTCONDITION_FAILED',
      `Tenant isolation verification failed: ${failures.join('; ')}`,
      { failures }
    );
    this.name = 'MigrationPostconditionError';
    this.failures = failures;
  }
}

export class IrreversibleMigrationError extends MigrationError {
  constructor(migration: string) {
    super(
      'MIGRATION_IRREVERSIBLE',
      `Migration ${migration} cannot be reversed step by step. Restore the pre-migration backup with pg_restore instead.`,
      { migration }
    );
    this.name = 'IrreversibleMigrationError';
  }
}

export class BackupError extends MigrationError {
  constructor(message: string, details?: MigrationErrorDetails) {
    super('BACKUP_FAILED', message, details);
    this.name = 'BackupError';
  }
}
