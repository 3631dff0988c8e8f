/**
 * Note Repository
 *
 * Tenant-scoped CRUD for notes. Every call runs inside TenantScope, so the
 * queries below carry no tenant predicate of their own: row-level security
 * restricts them and the stamping trigger fills `tenant_id` on insert.
 */

import { sql } from 'kysely';
import { z } from 'zod';
import type { Note } from '../../shared/types/database.js';
import { NoteIdSchema, type TenantContext } from '../../shared/types/tenancy.js';
import { DuplicateEntityError, EntityNotFoundError } from '../tenancy/errors.js';
import type { TenantScope } from '../tenancy/tenant-scope.js';
import { generateNoteId } from '../../utils/local-id.js';
import { createLogger } from '../../utils/logger.js';
import { escapeLikePattern, parseInput } from '../../utils/input-validation.js';
import { parseTextArray } from '../../utils/pg-array.js';
import { NoteCache } from './note-cache.js';

const logger = createLogger('note-repository');

const ContentSchema = z.string().min(1, 'Note content cannot be empty');

const ListOptionsSchema = z.object({
  limit: z.number().int().positive().max(1000).default(10),
  offset: z.number().int().nonnegative().default(0),
});

export type ListNotesOptions = z.input<typeof ListOptionsSchema>;

export interface CreateNoteOptions {
  /** Explicit id; generated when omitted */
  noteId?: string;
}

export interface DuplicateNoteGroup {
  content: string;
  copyCount: number;
  keepId: string;
  deleteIds: string[];
}

export interface NoteRepositoryOptions {
  cache?: NoteCache;
  maxIdAttempts?: number;
  generateId?: () => string;
}

export class NoteRepository {
  private readonly cache: NoteCache;
  private readonly maxIdAttempts: number;
  private readonly generateId: () => string;

  constructor(private readonly scope: TenantScope, options: NoteRepositoryOptions = {}) {
    this.cache = options.cache ?? new NoteCache();
    this.maxIdAttempts = options.maxIdAttempts ?? 10;
    this.generateId = options.generateId ?? (() => generateNoteId());
  }

  async createNote(context: TenantContext, content: string, options: CreateNoteOptions = {}): Promise<Note> {
    const body = parseInput(ContentSchema, content);
    const explicitId = options.noteId === undefined ? undefined : parseInput(NoteIdSchema, options.noteId);

    const note = await this.scope.run(context, async (trx) => {
      if (explicitId !== undefined) {
        return trx
          .insertInto('notes')
          .values({ note_id: explicitId, content: body })
          .returningAll()
          .executeTakeFirstOrThrow();
      }

      // Generated ids are short, so collisions within a tenant are expected.
      // The conflict is resolved by the insert itself, which also covers a
      // concurrent writer taking the same id.
      for (let attempt = 0; attempt < this.maxIdAttempts; attempt++) {
        const inserted = await trx
          .insertInto('notes')
          .values({ note_id: this.generateId(), content: body })
          .onConflict((oc) => oc.columns(['tenant_id', 'note_id']).doNothing())
          .returningAll()
          .executeTakeFirst();
        if (inserted) {
          return inserted;
        }
      }

      throw new DuplicateEntityError('notes_pkey', {
        reason: `No free note id after ${this.maxIdAttempts} attempts`,
      });
    });

    this.cache.set(note);
    logger.debug('Note created', { tenantId: note.tenant_id, noteId: note.note_id });
    return note;
  }

  async getNote(context: TenantContext, noteId: string): Promise<Note> {
    const cached = this.cache.get({ tenantId: context.tenantId, noteId });
    if (cached) {
      return cached;
    }

    const note = await this.scope.run(context, (trx) =>
      trx.selectFrom('notes').selectAll().where('note_id', '=', noteId).executeTakeFirst()
    );
    if (!note) {
      throw new EntityNotFoundError('Note', { tenantId: context.tenantId, noteId });
    }

    this.cache.set(note);
    return note;
  }

  /**
   * Most recent notes first
   */
  async listNotes(context: TenantContext, options: ListNotesOptions = {}): Promise<Note[]> {
    const { limit, offset } = parseInput(ListOptionsSchema, options);

    const notes = await this.scope.run(context, (trx) =>
      trx
        .selectFrom('notes')
        .selectAll()
        .orderBy('created_at', 'desc')
        .orderBy('note_id', 'desc')
        .limit(limit)
        .offset(offset)
        .execute()
    );

    for (const note of notes) {
      this.cache.set(note);
    }
    return notes;
  }

  /**
   * Case-insensitive substring match on content
   */
  async searchNotes(context: TenantContext, query: string): Promise<Note[]> {
    const pattern = `%${escapeLikePattern(query)}%`;

    return this.scope.run(context, (trx) =>
      trx
        .selectFrom('notes')
        .selectAll()
        .where('content', 'ilike', pattern)
        .orderBy('created_at', 'desc')
        .orderBy('note_id', 'desc')
        .execute()
    );
  }

  async updateNote(context: TenantContext, noteId: string, content: string): Promise<Note> {
    const body = parseInput(ContentSchema, content);

    const note = await this.scope.run(context, (trx) =>
      trx
        .updateTable('notes')
        .set({ content: body })
        .where('note_id', '=', noteId)
        .returningAll()
        .executeTakeFirst()
    );
    if (!note) {
      throw new EntityNotFoundError('Note', { tenantId: context.tenantId, noteId });
    }

    this.cache.set(note);
    return note;
  }

  /**
   * Delete a note. Its links and tags go with it through the composite
   * foreign keys.
   */
  async deleteNote(context: TenantContext, noteId: string): Promise<void> {
    const deleted = await this.scope.run(context, (trx) =>
      trx.deleteFrom('notes').where('note_id', '=', noteId).returning('note_id').executeTakeFirst()
    );
    this.cache.delete({ tenantId: context.tenantId, noteId });

    if (!deleted) {
      throw new EntityNotFoundError('Note', { tenantId: context.tenantId, noteId });
    }
  }

  /**
   * Groups of notes with identical content. The oldest note of each group is
   * the one to keep.
   */
  async findDuplicateNotes(context: TenantContext): Promise<DuplicateNoteGroup[]> {
    const { rows } = await this.scope.run(context, (trx) =>
      sql<{ content: string; copy_count: number; keep_id: string; delete_ids: unknown }>`
        SELECT
          content,
          count(*)::int AS copy_count,
          (array_agg(note_id ORDER BY created_at, note_id))[1] AS keep_id,
          (array_agg(note_id ORDER BY created_at, note_id))[2:] AS delete_ids
        FROM notes
        GROUP BY tenant_id, content
        HAVING count(*) > 1
        ORDER BY copy_count DESC, min(created_at)
      `.execute(trx)
    );

    return rows.map((row) => ({
      content: row.content,
      copyCount: row.copy_count,
      keepId: row.keep_id,
      deleteIds: parseTextArray(row.delete_ids),
    }));
  }

  /**
   * Delete every duplicate except the oldest of its group. Returns the ids
   * that were removed.
   */
  async deleteDuplicateNotes(context: TenantContext): Promise<string[]> {
    const { rows } = await this.scope.run(context, (trx) =>
      sql<{ note_id: string }>`
        DELETE FROM notes n
        USING (
          SELECT
            tenant_id,
            note_id,
            row_number() OVER (PARTITION BY tenant_id, content ORDER BY created_at, note_id) AS rn
          FROM notes
        ) ranked
        WHERE n.tenant_id = ranked.tenant_id
          AND n.note_id = ranked.note_id
          AND ranked.rn > 1
        RETURNING n.note_id
      `.execute(trx)
    );

    const deleted = rows.map((row) => row.note_id).sort();
    for (const noteId of deleted) {
      this.cache.delete({ tenantId: context.tenantId, noteId });
    }
    logger.info('Duplicate notes deleted', { tenantId: context.tenantId, count: deleted.length });
    return deleted;
  }
}
