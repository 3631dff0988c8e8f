import { sql } from 'kysely';
import type { NoteWithTags, Tag, TagCount } from '../../shared/types/database.js';
import { NoteIdSchema, TagSchema, type TenantContext } from '../../shared/types/tenancy.js';
import { EntityNotFoundError } from '../tenancy/errors.js';
import type { TenantScope } from '../tenancy/tenant-scope.js';
import { parseInput } from '../../utils/input-validation.js';
import { parseTextArray } from '../../utils/pg-array.js';

/**
 * Tags are stored trimmed and lower-cased; lookups normalise the same way.
 */
export class TagRepository {
  constructor(private readonly scope: TenantScope) {}

  async addTag(context: TenantContext, noteId: string, tag: string): Promise<Tag> {
    const note = parseInput(NoteIdSchema, noteId);
    const normalized = parseInput(TagSchema, tag);

    return this.scope.run(context, (trx) =>
      trx
        .insertInto('tags')
        .values({ note_id: note, tag: normalized })
        .returningAll()
        .executeTakeFirstOrThrow()
    );
  }

  async getTags(context: TenantContext, noteId: string): Promise<string[]> {
    const rows = await this.scope.run(context, (trx) =>
      trx.selectFrom('tags').select('tag').where('note_id', '=', noteId).orderBy('tag').execute()
    );
    return rows.map((row) => row.tag);
  }

  /**
   * Notes carrying `tag`, newest first, read through the notes_with_tags view
   */
  async getNotesByTag(context: TenantContext, tag: string): Promise<NoteWithTags[]> {
    const normalized = parseInput(TagSchema, tag);

    const rows = await this.scope.run(context, (trx) =>
      trx
        .selectFrom('notes_with_tags')
        .selectAll()
        .where(sql<boolean>`${normalized} = ANY(tag_list)`)
        .orderBy('created_at', 'desc')
        .orderBy('note_id')
        .execute()
    );

    return rows.map((row) => ({ ...row, tag_list: parseTextArray(row.tag_list) }));
  }

  async deleteTag(context: TenantContext, noteId: string, tag: string): Promise<void> {
    const normalized = parseInput(TagSchema, tag);

    const deleted = await this.scope.run(context, (trx) =>
      trx
        .deleteFrom('tags')
        .where('note_id', '=', noteId)
        .where('tag', '=', normalized)
        .returning('id')
        .executeTakeFirst()
    );

    if (!deleted) {
      throw new EntityNotFoundError('Tag', { tenantId: context.tenantId, noteId, tag: normalized });
    }
  }

  async deleteNoteTags(context: TenantContext, noteId: string): Promise<number> {
    const result = await this.scope.run(context, (trx) =>
      trx.deleteFrom('tags').where('note_id', '=', noteId).executeTakeFirst()
    );
    return Number(result.numDeletedRows);
  }

  /**
   * Per-tag note counts from the materialized aggregate. The figures are as
   * of the last refresh.
   */
  async getTagCounts(context: TenantContext): Promise<TagCount[]> {
    return this.scope.run(context, (trx) =>
      trx
        .selectFrom('tenant_tag_counts')
        .select(['tenant_id', 'tag', 'count'])
        .orderBy('count', 'desc')
        .orderBy('tag')
        .execute()
    );
  }
}
