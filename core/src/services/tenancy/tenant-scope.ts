/**
 * Tenant Scope Executor
 *
 * Every client request runs as one transaction in which the verified claims
 * are placed in the transaction-local `request.jwt.claims` setting and the
 * session drops to a client role. Row-level security and the stamping trigger
 * read the identity from there. Before the transaction commits, the role and
 * the resolved identity are checked again; work that switched either is
 * rolled back.
 */

import { sql, type Kysely, type Transaction } from 'kysely';
import type { ZettlDatabase } from '../../shared/types/database.js';
import {
  CLAIMS_SETTING,
  CLIENT_ROLES,
  validateTenantContext,
  type ClientRole,
  type TenantContext,
} from '../../shared/types/tenancy.js';
import { createLogger } from '../../utils/logger.js';
import { RowSecurityViolationError, translateDatabaseError } from './errors.js';
import { sessionClaimsFor } from './identity.js';

const logger = createLogger('tenant-scope');

export type ScopedTransaction = Transaction<ZettlDatabase>;
export type ScopedWork<T> = (trx: ScopedTransaction) => Promise<T>;

export class TenantScope {
  constructor(private readonly db: Kysely<ZettlDatabase>) {}

  /**
   * Run `work` as the authenticated role on behalf of one tenant
   */
  async run<T>(context: TenantContext, work: ScopedWork<T>): Promise<T> {
    const scope = validateTenantContext(context);
    const claims = JSON.stringify(sessionClaimsFor(scope));

    return this.execute(CLIENT_ROLES.authenticated, scope.tenantId, work, async (trx) => {
      await sql`SELECT set_config(${CLAIMS_SETTING}, ${claims}, true)`.execute(trx);
    });
  }

  /**
   * Run `work` as the anonymous role with no claims in the session
   */
  async runAnonymous<T>(work: ScopedWork<T>): Promise<T> {
    return this.execute(CLIENT_ROLES.anonymous, null, work);
  }

  private async execute<T>(
    role: ClientRole,
    tenantId: number | null,
    work: ScopedWork<T>,
    prepare?: (trx: ScopedTransaction) => Promise<void>
  ): Promise<T> {
    try {
      return await this.db.transaction().execute(async (trx) => {
        if (prepare) {
          await prepare(trx);
        }
        await sql`SET LOCAL ROLE ${sql.id(role)}`.execute(trx);
        const result = await work(trx);
        await assertSessionUnchanged(trx, role, tenantId);
        return result;
      });
    } catch (error) {
      const translated = translateDatabaseError(error);
      logger.debug('Scoped transaction failed', { role, code: translated.code, message: translated.message });
      throw translated;
    }
  }
}

/**
 * The anonymous role cannot call `auth.tenant_id()`, so only the role is
 * compared for it.
 */
async function assertSessionUnchanged(
  trx: ScopedTransaction,
  role: ClientRole,
  tenantId: number | null
): Promise<void> {
  const { rows } = await sql<{ role: string }>`SELECT current_user AS role`.execute(trx);
  const currentRole = rows[0]?.role;
  if (currentRole !== role) {
    throw new RowSecurityViolationError('Session role changed inside a tenant-scoped transaction', {
      expected: role,
      actual: currentRole,
    });
  }

  if (tenantId === null) {
    return;
  }

  const identity = await sql<{ tenant_id: number | null }>`SELECT auth.tenant_id() AS tenant_id`.execute(trx);
  const resolved = identity.rows[0]?.tenant_id ?? null;
  if (resolved !== tenantId) {
    throw new RowSecurityViolationError('Session identity changed inside a tenant-scoped transaction', {
      expected: tenantId,
      actual: resolved,
    });
  }
}
