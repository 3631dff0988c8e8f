/**
 * Identity resolution on the client side of the session boundary.
 *
 * The database resolves identity with `auth.tenant_id()`; these helpers apply
 * the same rules to a claims object before it is placed in the session, so a
 * request without a usable `sub` never reaches the database with one.
 */

import {
  MAX_TENANT_ID,
  TenantClaimsSchema,
  validateTenantContext,
  type TenantClaims,
  type TenantContext,
} from '../../shared/types/tenancy.js';
import { IdentityMissingError } from './errors.js';

const TENANT_ID_PATTERN = /^[1-9][0-9]{0,9}$/;

/**
 * Resolve the tenant id carried by verified claims, or null when the claims
 * carry none. Zero, negative, fractional and out-of-range subjects are
 * treated as absent.
 */
export function resolveTenantId(claims: unknown): number | null {
  const parsed = TenantClaimsSchema.safeParse(claims);
  if (!parsed.success) {
    return null;
  }

  const subject = String(parsed.data.sub);
  if (!TENANT_ID_PATTERN.test(subject)) {
    return null;
  }

  const tenantId = Number(subject);
  return tenantId <= MAX_TENANT_ID ? tenantId : null;
}

/**
 * Build the tenant context for a request, failing closed without an identity
 */
export function tenantContextFromClaims(claims: unknown): TenantContext {
  const tenantId = resolveTenantId(claims);
  if (tenantId === null) {
    throw new IdentityMissingError();
  }
  const parsed = TenantClaimsSchema.parse(claims);
  return validateTenantContext({ tenantId, subject: parsed.username });
}

/**
 * Claims placed in the session for a context. Only `sub` is read by the
 * database.
 */
export function sessionClaimsFor(context: TenantContext): TenantClaims {
  return { sub: String(context.tenantId), role: 'authenticated' };
}
