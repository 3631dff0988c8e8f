/**
 * Administrative Override
 *
 * Bulk fix-up work (for example linking every note with a tag to a hub note)
 * has to write rows for a tenant without a client session. Instead of
 * disabling the stamping trigger, the work runs on the privileged connection
 * with the transaction-local `zettl.admin_override` flag, which the trigger
 * honours only for non-client roles. Every use leaves an audit row.
 */

import { sql, type Kysely, type Transaction } from 'kysely';
import { z } from 'zod';
import type { ZettlDatabase } from '../../shared/types/database.js';
import {
  ADMIN_OVERRIDE_SETTING,
  CLIENT_ROLES,
  NoteIdSchema,
  TagSchema,
  TenantIdSchema,
} from '../../shared/types/tenancy.js';
import { createLogger } from '../../utils/logger.js';
import {
  EntityNotFoundError,
  RowSecurityViolationError,
  translateDatabaseError,
} from './errors.js';

const logger = createLogger('admin-override');

export const OverrideRequestSchema = z.object({
  actor: z.string().trim().min(1),
  reason: z.string().trim().min(1),
  tenantId: TenantIdSchema,
  operation: z.string().trim().min(1),
});

export type OverrideRequest = z.infer<typeof OverrideRequestSchema>;

export const LinkNotesByTagSchema = z.object({
  tag: TagSchema,
  targetNoteId: NoteIdSchema,
  tenantId: TenantIdSchema,
  actor: z.string().trim().min(1),
  reason: z.string().trim().min(1),
  context: z.string().optional(),
});

export type LinkNotesByTagRequest = z.input<typeof LinkNotesByTagSchema>;

/** Work run under the override; resolves to the number of rows it changed */
export type OverrideWork = (trx: Transaction<ZettlDatabase>, tenantId: number) => Promise<number>;

export interface OverrideResult {
  auditId: number;
  rowsAffected: number;
}

const CLIENT_ROLE_NAMES: readonly string[] = Object.values(CLIENT_ROLES);

export class AdministrativeOverride {
  constructor(private readonly db: Kysely<ZettlDatabase>) {}

  async run(request: OverrideRequest, work: OverrideWork): Promise<OverrideResult> {
    const parsed = OverrideRequestSchema.safeParse(request);
    if (!parsed.success) {
      throw translateDatabaseError(parsed.error);
    }
    const { actor, reason, tenantId, operation } = parsed.data;

    try {
      const result = await this.db.transaction().execute(async (trx) => {
        const { rows } = await sql<{ role: string }>`SELECT current_user AS role`.execute(trx);
        const role = rows[0]?.role ?? '';
        if (CLIENT_ROLE_NAMES.includes(role)) {
          throw new RowSecurityViolationError(
            'Administrative override requires a privileged connection',
            { role }
          );
        }

        const tenant = await trx
          .selectFrom('tenants')
          .select('id')
          .where('id', '=', tenantId)
          .executeTakeFirst();
        if (!tenant) {
          throw new EntityNotFoundError('Tenant', { tenantId });
        }

        await sql`SELECT set_config(${ADMIN_OVERRIDE_SETTING}, 'on', true)`.execute(trx);

        const audit = await trx
          .insertInto('admin_override_audit')
          .values({ tenant_id: tenantId, actor, reason, operation })
          .returning('id')
          .executeTakeFirstOrThrow();

        const rowsAffected = await work(trx, tenantId);

        await trx
          .updateTable('admin_override_audit')
          .set({ rows_affected: rowsAffected, finished_at: sql`now()` })
          .where('id', '=', audit.id)
          .execute();

        return { auditId: audit.id, rowsAffected };
      });

      logger.info('Administrative override applied', {
        actor,
        reason,
        tenantId,
        operation,
        auditId: result.auditId,
        rowsAffected: result.rowsAffected,
      });
      return result;
    } catch (error) {
      const translated = translateDatabaseError(error);
      logger.error('Administrative override failed', {
        actor,
        tenantId,
        operation,
        code: translated.code,
        message: translated.message,
      });
      throw translated;
    }
  }

  /**
   * Link the target note to every note of the tenant carrying `tag`.
   * Self-loops are skipped and existing links are left alone.
   */
  async linkNotesByTag(request: LinkNotesByTagRequest): Promise<OverrideResult> {
    const parsed = LinkNotesByTagSchema.safeParse(request);
    if (!parsed.success) {
      throw translateDatabaseError(parsed.error);
    }
    const { tag, targetNoteId, tenantId, actor, reason, context } = parsed.data;

    return this.run(
      { actor, reason, tenantId, operation: `link_notes_by_tag:${tag}->${targetNoteId}` },
      async (trx) => {
        const target = await trx
          .selectFrom('notes')
          .select('note_id')
          .where('tenant_id', '=', tenantId)
          .where('note_id', '=', targetNoteId)
          .executeTakeFirst();
        if (!target) {
          throw new EntityNotFoundError('Note', { tenantId, noteId: targetNoteId });
        }

        const result = await sql`
          INSERT INTO links (tenant_id, source_id, target_id, context)
          SELECT t.tenant_id, ${targetNoteId}, t.note_id, ${context ?? null}::text
          FROM tags t
          WHERE t.tenant_id = ${tenantId}
            AND t.tag = ${tag}
            AND t.note_id <> ${targetNoteId}
          ON CONFLICT (tenant_id, source_id, target_id) DO NOTHING
        `.execute(trx);

        return Number(result.numAffectedRows ?? 0n);
      }
    );
  }
}
