/**
 * Tenancy Types
 *
 * A tenant is the authenticated owner of every note, link, tag and
 * conversation. Identity is an opaque positive integer supplied by the auth
 * service; every entity is addressed by the pair (tenant id, local id).
 */

import { z } from 'zod';

// ===================
// ROLES AND SESSION KEYS
// ===================

/** Database roles recognised by the row-level security policies */
export const CLIENT_ROLES = {
  anonymous: 'web_anon',
  authenticated: 'authenticated',
} as const;

export type ClientRole = (typeof CLIENT_ROLES)[keyof typeof CLIENT_ROLES];

/** Transaction-local setting carrying the verified token claims */
export const CLAIMS_SETTING = 'request.jwt.claims';

/** Transaction-local flag honoured by the stamping trigger for privileged roles */
export const ADMIN_OVERRIDE_SETTING = 'zettl.admin_override';

// ===================
// IDENTITY
// ===================

// Upper bound of a PostgreSQL integer column
export const MAX_TENANT_ID = 2147483647;

export const TenantIdSchema = z.number().int().positive().max(MAX_TENANT_ID);
export type TenantId = z.infer<typeof TenantIdSchema>;

export const TenantContextSchema = z.object({
  tenantId: TenantIdSchema,
  subject: z.string().optional(),
});

export type TenantContext = Readonly<z.infer<typeof TenantContextSchema>>;

/** Claims as issued by the auth service; only `sub` is consulted here */
export const TenantClaimsSchema = z.object({
  sub: z.union([z.string(), z.number()]),
  username: z.string().optional(),
  role: z.string().optional(),
  iat: z.number().optional(),
  exp: z.number().optional(),
}).passthrough();

export type TenantClaims = z.infer<typeof TenantClaimsSchema>;

// ===================
// COMPOSITE KEYS
// ===================

export const NoteIdSchema = z.string().trim().min(1).max(10);

export interface NoteKey {
  tenantId: TenantId;
  noteId: string;
}

export const TagSchema = z.string()
  .transform((tag) => tag.trim().toLowerCase())
  .pipe(z.string().min(1).max(255));

export function validateTenantContext(data: unknown): TenantContext {
  return Object.freeze(TenantContextSchema.parse(data));
}
