/**
 * notes_with_tags, tag_counts and tenant_tag_counts
 */

import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { sql } from 'kysely';
import {
  NoteRepository,
  RowSecurityViolationError,
  TagCountsService,
  TagRepository,
  TenantScope,
} from '@zettl/core';
import { relationOwner } from '../../migrations/src/sequencer/catalog.js';
import { createMigratedDatabase, tenant, type TestDatabase } from '../support/test-database.js';

describe('derived views', () => {
  let database: TestDatabase & { alice: number; bob: number };
  let scope: TenantScope;
  let notes: NoteRepository;
  let tags: TagRepository;

  beforeAll(async () => {
    database = await createMigratedDatabase();
    scope = new TenantScope(database.db);
    tags = new TagRepository(scope);
  });

  afterAll(async () => {
    await database.close();
  });

  beforeEach(async () => {
    notes = new NoteRepository(scope);
    await sql`TRUNCATE notes, links, tags CASCADE`.execute(database.schemaDb);
    await sql`REFRESH MATERIALIZED VIEW tag_counts`.execute(database.schemaDb);
  });

  describe('notes_with_tags', () => {
    it('is owned by the authenticated role', async () => {
      expect(await relationOwner(database.schemaDb, 'notes_with_tags')).toBe('authenticated');
    });

    it('aggregates a note\'s tags in order', async () => {
      const alice = tenant(database.alice);
      await notes.createNote(alice, 'Plan the garden', { noteId: 'ab' });
      await tags.addTag(alice, 'ab', 'Project');
      await tags.addTag(alice, 'ab', ' idea ');

      const [note] = await tags.getNotesByTag(alice, 'project');

      expect(note?.note_id).toBe('ab');
      expect(note?.tag_list).toEqual(['idea', 'project']);
      expect(note?.all_tags_str).toBe('idea,project');
    });

    it('keeps two tenants\' notes with the same id and tag apart', async () => {
      const alice = tenant(database.alice);
      const bob = tenant(database.bob);
      await notes.createNote(alice, 'alice content', { noteId: 'ab' });
      await tags.addTag(alice, 'ab', 'project');
      await notes.createNote(bob, 'bob content', { noteId: 'ab' });
      await tags.addTag(bob, 'ab', 'project');
      await tags.addTag(bob, 'ab', 'private');

      const aliceNotes = await tags.getNotesByTag(alice, 'project');
      const bobNotes = await tags.getNotesByTag(bob, 'project');

      expect(aliceNotes.map((note) => [note.tenant_id, note.content, note.tag_list])).toEqual([
        [database.alice, 'alice content', ['project']],
      ]);
      expect(bobNotes.map((note) => [note.tenant_id, note.content, note.tag_list])).toEqual([
        [database.bob, 'bob content', ['private', 'project']],
      ]);
    });

    it('lists notes without tags with an empty tag list', async () => {
      const alice = tenant(database.alice);
      await notes.createNote(alice, 'untagged', { noteId: 'ef' });

      const rows = await scope.run(alice, (trx) =>
        trx.selectFrom('notes_with_tags').select(['note_id', 'all_tags_str']).execute()
      );

      expect(rows).toEqual([{ note_id: 'ef', all_tags_str: '' }]);
    });

    it('would leak rows if a privileged role owned it', async () => {
      await notes.createNote(tenant(database.alice), 'alice content', { noteId: 'ab' });
      await notes.createNote(tenant(database.bob), 'bob content', { noteId: 'cd' });

      await sql`CREATE VIEW leaky_notes AS SELECT tenant_id, note_id FROM notes`.execute(database.schemaDb);
      await sql`GRANT SELECT ON leaky_notes TO authenticated`.execute(database.schemaDb);

      try {
        const { rows } = await scope.run(tenant(database.bob), (trx) =>
          sql<{ note_id: string }>`SELECT note_id FROM leaky_notes ORDER BY note_id`.execute(trx)
        );
        const guarded = await scope.run(tenant(database.bob), (trx) =>
          trx.selectFrom('notes_with_tags').select('note_id').execute()
        );

        expect(rows.map((row) => row.note_id)).toEqual(['ab', 'cd']);
        expect(guarded.map((row) => row.note_id)).toEqual(['cd']);
      } finally {
        await sql`DROP VIEW leaky_notes`.execute(database.schemaDb);
      }
    });
  });

  describe('tag counts', () => {
    async function tagNotes(): Promise<void> {
      const alice = tenant(database.alice);
      const bob = tenant(database.bob);
      await notes.createNote(alice, 'one', { noteId: 'a1' });
      await notes.createNote(alice, 'two', { noteId: 'a2' });
      await notes.createNote(bob, 'three', { noteId: 'b1' });
      await tags.addTag(alice, 'a1', 'project');
      await tags.addTag(alice, 'a2', 'project');
      await tags.addTag(alice, 'a2', 'garden');
      await tags.addTag(bob, 'b1', 'project');
    }

    it('serves the figures of the last refresh', async () => {
      await tagNotes();

      expect(await tags.getTagCounts(tenant(database.alice))).toEqual([]);

      const result = await new TagCountsService(database.db).refreshTagCounts();

      expect(result.mode).toBe('concurrent');
      expect(await tags.getTagCounts(tenant(database.alice))).toEqual([
        { tenant_id: database.alice, tag: 'project', count: 2 },
        { tenant_id: database.alice, tag: 'garden', count: 1 },
      ]);
      expect(await tags.getTagCounts(tenant(database.bob))).toEqual([
        { tenant_id: database.bob, tag: 'project', count: 1 },
      ]);
    });

    it('changes only the counts of the tenant whose tags changed', async () => {
      await tagNotes();
      const service = new TagCountsService(database.db);
      await service.refreshTagCounts();
      const bobBefore = await tags.getTagCounts(tenant(database.bob));

      const alice = tenant(database.alice);
      await tags.addTag(alice, 'a1', 'garden');
      await tags.addTag(alice, 'a1', 'reading');
      await tags.addTag(alice, 'a2', 'reading');
      await service.refreshTagCounts();

      expect(await tags.getTagCounts(alice)).toEqual([
        { tenant_id: database.alice, tag: 'garden', count: 2 },
        { tenant_id: database.alice, tag: 'project', count: 2 },
        { tenant_id: database.alice, tag: 'reading', count: 2 },
      ]);
      expect(await tags.getTagCounts(tenant(database.bob))).toEqual(bobBefore);
      expect(bobBefore).toEqual([{ tenant_id: database.bob, tag: 'project', count: 1 }]);
    });

    it('falls back to a plain refresh when concurrent refresh is disabled', async () => {
      const service = new TagCountsService(database.db, { refreshConcurrently: false });

      expect((await service.refreshTagCounts()).mode).toBe('plain');
    });

    it('uses a plain refresh while the aggregate has never been populated', async () => {
      await sql`REFRESH MATERIALIZED VIEW tag_counts WITH NO DATA`.execute(database.schemaDb);
      await tagNotes();

      const result = await new TagCountsService(database.db).refreshTagCounts();

      expect(result.mode).toBe('plain');
      expect(await tags.getTagCounts(tenant(database.bob))).toEqual([
        { tenant_id: database.bob, tag: 'project', count: 1 },
      ]);
    });

    it('is not readable by client roles directly', async () => {
      const read = scope.run(tenant(database.alice), (trx) => trx.selectFrom('tag_counts').selectAll().execute());

      await expect(read).rejects.toBeInstanceOf(RowSecurityViolationError);
    });
  });
});
