/**
 * Tenancy Services Index
 *
 * Identity resolution, the per-request tenant scope and the audited
 * administrative override.
 */

export { resolveTenantId, tenantContextFromClaims, sessionClaimsFor } from './identity.js';
export { TenantScope } from './tenant-scope.js';
export type { ScopedTransaction, ScopedWork } from './tenant-scope.js';
export {
  AdministrativeOverride,
  OverrideRequestSchema,
  LinkNotesByTagSchema,
} from './admin-override.js';
export type {
  OverrideRequest,
  OverrideResult,
  OverrideWork,
  LinkNotesByTagRequest,
} from './admin-override.js';
export * from './errors.js';
