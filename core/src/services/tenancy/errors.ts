/**
 * Tenancy Error Classes
 *
 * Statement-level failures raised by the database (stamping trigger, composite
 * foreign keys, row-level security) are translated into these classes so that
 * callers can branch on `code` instead of SQLSTATE values.
 */

import { ZodError } from 'zod';

export type ErrorDetails = Record<string, unknown>;

/**
 * Base error class for all tenancy related errors
 */
export class TenancyError extends Error {
  public readonly code: string;
  public readonly details?: ErrorDetails;
  public readonly statusCode?: number;

  constructor(
    code: string,
    message: string,
    details?: ErrorDetails,
    statusCode?: number
  ) {
    super(message);
    this.name = 'TenancyError';
    this.code = code;
    this.details = details;
    this.statusCode = statusCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TenancyError);
    }
  }
}

/**
 * No tenant identity could be resolved for a write
 */
export class IdentityMissingError extends TenancyError {
  constructor(message = 'Cannot determine tenant from session claims. Authentication required.', details?: ErrorDetails) {
    super('IDENTITY_MISSING', message, details, 401);
    this.name = 'IdentityMissingError';
  }
}

/**
 * A composite foreign key pointed at a row the tenant does not own
 */
export class CrossTenantReferenceError extends TenancyError {
  constructor(constraint: string | undefined, details?: ErrorDetails) {
    super(
      'CROSS_TENANT_REFERENCE',
      constraint
        ? `Referenced row does not exist for this tenant (${constraint})`
        : 'Referenced row does not exist for this tenant',
      { constraint, ...details },
      409
    );
    this.name = 'CrossTenantReferenceError';
  }
}

/**
 * A tenant-scoped unique constraint was violated
 */
export class DuplicateEntityError extends TenancyError {
  constructor(constraint: string | undefined, details?: ErrorDetails) {
    super(
      'DUPLICATE_ENTITY',
      constraint ? `Entity already exists (${constraint})` : 'Entity already exists',
      { constraint, ...details },
      409
    );
    this.name = 'DuplicateEntityError';
  }
}

/**
 * A row-level security check rejected the statement
 */
export class RowSecurityViolationError extends TenancyError {
  constructor(message: string, details?: ErrorDetails) {
    super('ROW_SECURITY_VIOLATION', message, details, 403);
    this.name = 'RowSecurityViolationError';
  }
}

export class EntityNotFoundError extends TenancyError {
  constructor(entity: string, key: ErrorDetails) {
    super('NOT_FOUND', `${entity} not found`, { entity, ...key }, 404);
    this.name = 'EntityNotFoundError';
  }
}

export class ValidationError extends TenancyError {
  constructor(message: string, details?: ErrorDetails) {
    super('VALIDATION_ERROR', message, details, 400);
    this.name = 'ValidationError';
  }
}

export class DatabaseError extends TenancyError {
  constructor(message: string, details?: ErrorDetails) {
    super('DATABASE_ERROR', message, details, 500);
    this.name = 'DatabaseError';
  }
}

// ===================
// SQLSTATE TRANSLATION
// ===================

export const SQLSTATE = {
  invalidAuthorization: '28000',
  foreignKeyViolation: '23503',
  uniqueViolation: '23505',
  insufficientPrivilege: '42501',
} as const;

export interface PostgresErrorLike {
  code: string;
  message: string;
  constraint?: string;
  table?: string;
  detail?: string;
}

export function isPostgresError(error: unknown): error is Error & PostgresErrorLike {
  if (!(error instanceof Error)) {
    return false;
  }
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' && /^[0-9A-Z]{5}$/.test(code);
}

function optionalString(error: Error, field: string): string | undefined {
  const value: unknown = Reflect.get(error, field);
  return typeof value === 'string' ? value : undefined;
}

/**
 * Map a driver error onto the tenancy taxonomy. Errors that already belong to
 * the taxonomy pass through unchanged.
 */
export function translateDatabaseError(error: unknown): TenancyError {
  if (error instanceof TenancyError) {
    return error;
  }

  if (error instanceof ZodError) {
    return new ValidationError('Invalid input', { issues: error.issues });
  }

  if (isPostgresError(error)) {
    const constraint = optionalString(error, 'constraint');
    const details: ErrorDetails = {
      sqlState: error.code,
      table: optionalString(error, 'table'),
      detail: optionalString(error, 'detail'),
    };

    switch (error.code) {
      case SQLSTATE.invalidAuthorization:
        return new IdentityMissingError(error.message, details);
      case SQLSTATE.foreignKeyViolation:
        return new CrossTenantReferenceError(constraint, details);
      case SQLSTATE.uniqueViolation:
        return new DuplicateEntityError(constraint, details);
      case SQLSTATE.insufficientPrivilege:
        return new RowSecurityViolationError(error.message, details);
      default:
        return new DatabaseError(error.message, details);
    }
  }

  return new DatabaseError(error instanceof Error ? error.message : String(error));
}
