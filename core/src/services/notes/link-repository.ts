import type { Link, Note } from '../../shared/types/database.js';
import { NoteIdSchema, type TenantContext } from '../../shared/types/tenancy.js';
import { EntityNotFoundError } from '../tenancy/errors.js';
import type { TenantScope } from '../tenancy/tenant-scope.js';
import { parseInput } from '../../utils/input-validation.js';

/**
 * Directed links between notes of one tenant.
 *
 * Both ends are checked by the composite foreign keys on
 * (tenant_id, source_id) and (tenant_id, target_id); a note id that exists
 * only for another tenant is rejected with CrossTenantReferenceError.
 */
export class LinkRepository {
  constructor(private readonly scope: TenantScope) {}

  /**
   * Create a link, or return the existing one for the same pair
   */
  async createLink(context: TenantContext, sourceId: string, targetId: string, linkContext = ''): Promise<Link> {
    const source = parseInput(NoteIdSchema, sourceId);
    const target = parseInput(NoteIdSchema, targetId);

    return this.scope.run(context, async (trx) => {
      const inserted = await trx
        .insertInto('links')
        .values({ source_id: source, target_id: target, context: linkContext })
        .onConflict((oc) => oc.columns(['tenant_id', 'source_id', 'target_id']).doNothing())
        .returningAll()
        .executeTakeFirst();

      if (inserted) {
        return inserted;
      }

      return trx
        .selectFrom('links')
        .selectAll()
        .where('source_id', '=', source)
        .where('target_id', '=', target)
        .executeTakeFirstOrThrow();
    });
  }

  /**
   * Notes linked from and to `noteId`: outgoing targets first, then incoming
   * sources, each note once.
   */
  async getRelatedNotes(context: TenantContext, noteId: string): Promise<Note[]> {
    return this.scope.run(context, async (trx) => {
      const outgoing = await trx
        .selectFrom('links')
        .select('target_id as related_id')
        .where('source_id', '=', noteId)
        .orderBy('created_at')
        .orderBy('id')
        .execute();

      const incoming = await trx
        .selectFrom('links')
        .select('source_id as related_id')
        .where('target_id', '=', noteId)
        .orderBy('created_at')
        .orderBy('id')
        .execute();

      const relatedIds = [...new Set([...outgoing, ...incoming].map((row) => row.related_id))];
      if (relatedIds.length === 0) {
        return [];
      }

      const notes = await trx
        .selectFrom('notes')
        .selectAll()
        .where('note_id', 'in', relatedIds)
        .execute();

      const byId = new Map(notes.map((note) => [note.note_id, note]));
      return relatedIds.flatMap((id) => {
        const note = byId.get(id);
        return note ? [note] : [];
      });
    });
  }

  async deleteLink(context: TenantContext, sourceId: string, targetId: string): Promise<void> {
    const deleted = await this.scope.run(context, (trx) =>
      trx
        .deleteFrom('links')
        .where('source_id', '=', sourceId)
        .where('target_id', '=', targetId)
        .returning('id')
        .executeTakeFirst()
    );

    if (!deleted) {
      throw new EntityNotFoundError('Link', { tenantId: context.tenantId, sourceId, targetId });
    }
  }

  /**
   * Remove every incoming and outgoing link of a note. Returns the number
   * of links removed.
   */
  async deleteNoteLinks(context: TenantContext, noteId: string): Promise<number> {
    const result = await this.scope.run(context, (trx) =>
      trx
        .deleteFrom('links')
        .where((eb) => eb.or([eb('source_id', '=', noteId), eb('target_id', '=', noteId)]))
        .executeTakeFirst()
    );
    return Number(result.numDeletedRows);
  }
}
