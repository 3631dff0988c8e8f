import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import { sql } from 'kysely';
import {
  CrossTenantReferenceError,
  DuplicateEntityError,
  EntityNotFoundError,
  LinkRepository,
  NoteRepository,
  TagRepository,
  TenantScope,
  ValidationError,
  type TenantContext,
} from '@zettl/core';
import { GENERATED_NOTE_ID_PATTERN } from '../../core/src/utils/local-id.js';
import { createMigratedDatabase, tenant, type TestDatabase } from '../support/test-database.js';

function sequence(...ids: string[]): () => string {
  let index = 0;
  return () => ids[Math.min(index++, ids.length - 1)] ?? '';
}

describe('tenant-scoped repositories', () => {
  let database: TestDatabase & { alice: number; bob: number };
  let scope: TenantScope;
  let notes: NoteRepository;
  let links: LinkRepository;
  let tags: TagRepository;
  let alice: TenantContext;
  let bob: TenantContext;

  beforeAll(async () => {
    database = await createMigratedDatabase();
    scope = new TenantScope(database.db);
    links = new LinkRepository(scope);
    tags = new TagRepository(scope);
    alice = tenant(database.alice);
    bob = tenant(database.bob);
  });

  afterAll(async () => {
    await database.close();
  });

  beforeEach(async () => {
    notes = new NoteRepository(scope);
    await sql`TRUNCATE notes, links, tags CASCADE`.execute(database.schemaDb);
  });

  describe('NoteRepository', () => {
    it('generates a short local id and stamps the tenant', async () => {
      const note = await notes.createNote(alice, 'A thought');

      expect(note.note_id).toMatch(GENERATED_NOTE_ID_PATTERN);
      expect(note.tenant_id).toBe(database.alice);
      expect(note.content).toBe('A thought');
    });

    it('draws another id when the generated one is taken', async () => {
      await notes.createNote(alice, 'existing', { noteId: 'aa' });
      const generateId = vi.fn(sequence('aa', 'bb'));
      const repository = new NoteRepository(scope, { generateId });

      const note = await repository.createNote(alice, 'fresh');

      expect(note.note_id).toBe('bb');
      expect(generateId).toHaveBeenCalledTimes(2);
      expect((await notes.getNote(alice, 'aa')).content).toBe('existing');
    });

    it('only counts collisions within the tenant', async () => {
      await notes.createNote(bob, 'bob owns aa', { noteId: 'aa' });
      const repository = new NoteRepository(scope, { generateId: sequence('aa') });

      expect((await repository.createNote(alice, 'alice gets aa too')).note_id).toBe('aa');
    });

    it('gives up after the configured number of attempts', async () => {
      await notes.createNote(alice, 'existing', { noteId: 'aa' });
      const generateId = vi.fn(sequence('aa'));
      const repository = new NoteRepository(scope, { generateId, maxIdAttempts: 3 });

      await expect(repository.createNote(alice, 'fresh')).rejects.toBeInstanceOf(DuplicateEntityError);
      expect(generateId).toHaveBeenCalledTimes(3);
    });

    it('rejects an explicit id that already exists', async () => {
      await notes.createNote(alice, 'existing', { noteId: 'aa' });

      await expect(notes.createNote(alice, 'again', { noteId: 'aa' })).rejects.toBeInstanceOf(DuplicateEntityError);
    });

    it('rejects empty content', async () => {
      await expect(notes.createNote(alice, '')).rejects.toBeInstanceOf(ValidationError);
    });

    it('lists the newest notes first with paging', async () => {
      await notes.createNote(alice, 'first', { noteId: 'n1' });
      await notes.createNote(alice, 'second', { noteId: 'n2' });
      await notes.createNote(alice, 'third', { noteId: 'n3' });

      const page = await notes.listNotes(alice, { limit: 2 });
      const next = await notes.listNotes(alice, { limit: 2, offset: 2 });

      expect(page.map((note) => note.note_id)).toEqual(['n3', 'n2']);
      expect(next.map((note) => note.note_id)).toEqual(['n1']);
    });

    it('searches content case-insensitively and literally', async () => {
      await notes.createNote(alice, '100% sure', { noteId: 's1' });
      await notes.createNote(alice, '100 percent', { noteId: 's2' });
      await notes.createNote(alice, 'under_score', { noteId: 's3' });
      await notes.createNote(alice, 'underXscore', { noteId: 's4' });

      expect((await notes.searchNotes(alice, '100%')).map((note) => note.note_id)).toEqual(['s1']);
      expect((await notes.searchNotes(alice, 'under_')).map((note) => note.note_id)).toEqual(['s3']);
      expect((await notes.searchNotes(alice, 'SURE')).map((note) => note.note_id)).toEqual(['s1']);
    });

    it('updates content and refreshes modified_at', async () => {
      const created = await notes.createNote(alice, 'draft', { noteId: 'ab' });

      const updated = await notes.updateNote(alice, 'ab', 'final');

      expect(updated.content).toBe('final');
      expect(updated.modified_at.getTime()).toBeGreaterThanOrEqual(created.modified_at.getTime());
      expect((await notes.getNote(alice, 'ab')).content).toBe('final');
    });

    it('reports updates of missing notes', async () => {
      await expect(notes.updateNote(alice, 'zz', 'text')).rejects.toBeInstanceOf(EntityNotFoundError);
    });

    it('cascades deletes to links and tags', async () => {
      await notes.createNote(alice, 'hub', { noteId: 'ab' });
      await notes.createNote(alice, 'leaf', { noteId: 'cd' });
      await links.createLink(alice, 'ab', 'cd');
      await tags.addTag(alice, 'ab', 'project');

      await notes.deleteNote(alice, 'ab');

      await expect(notes.getNote(alice, 'ab')).rejects.toBeInstanceOf(EntityNotFoundError);
      expect(await tags.getTags(alice, 'ab')).toEqual([]);
      expect(await links.getRelatedNotes(alice, 'cd')).toEqual([]);
    });

    it('finds and removes duplicate content within the tenant', async () => {
      await notes.createNote(alice, 'same', { noteId: 'x1' });
      await notes.createNote(alice, 'same', { noteId: 'x2' });
      await notes.createNote(alice, 'same', { noteId: 'x3' });
      await notes.createNote(alice, 'other', { noteId: 'x4' });
      await notes.createNote(bob, 'same', { noteId: 'y1' });

      expect(await notes.findDuplicateNotes(alice)).toEqual([
        { content: 'same', copyCount: 3, keepId: 'x1', deleteIds: ['x2', 'x3'] },
      ]);
      expect(await notes.findDuplicateNotes(bob)).toEqual([]);

      expect(await notes.deleteDuplicateNotes(alice)).toEqual(['x2', 'x3']);
      expect((await notes.listNotes(alice)).map((note) => note.note_id)).toEqual(['x4', 'x1']);
      expect((await notes.listNotes(bob)).map((note) => note.note_id)).toEqual(['y1']);
    });
  });

  describe('LinkRepository', () => {
    beforeEach(async () => {
      for (const noteId of ['ab', 'cd', 'ef', 'gh']) {
        await notes.createNote(alice, `note ${noteId}`, { noteId });
      }
    });

    it('returns the existing link for a repeated pair', async () => {
      const first = await links.createLink(alice, 'ab', 'cd', 'see also');
      const second = await links.createLink(alice, 'ab', 'cd', 'ignored');

      expect(second.id).toBe(first.id);
      expect(second.context).toBe('see also');
    });

    it('lists outgoing then incoming related notes once each', async () => {
      await links.createLink(alice, 'ab', 'cd');
      await links.createLink(alice, 'ab', 'ef');
      await links.createLink(alice, 'gh', 'ab');
      await links.createLink(alice, 'cd', 'ab');

      const related = await links.getRelatedNotes(alice, 'ab');

      expect(related.map((note) => note.note_id)).toEqual(['cd', 'ef', 'gh']);
    });

    it('deletes single links and every link of a note', async () => {
      await links.createLink(alice, 'ab', 'cd');
      await links.createLink(alice, 'ab', 'ef');
      await links.createLink(alice, 'gh', 'ab');

      await links.deleteLink(alice, 'ab', 'cd');
      await expect(links.deleteLink(alice, 'ab', 'cd')).rejects.toBeInstanceOf(EntityNotFoundError);

      expect(await links.deleteNoteLinks(alice, 'ab')).toBe(2);
      expect(await links.getRelatedNotes(alice, 'ab')).toEqual([]);
    });
  });

  describe('TagRepository', () => {
    beforeEach(async () => {
      await notes.createNote(alice, 'tagged', { noteId: 'ab' });
    });

    it('normalises tags and returns them sorted', async () => {
      await tags.addTag(alice, 'ab', '  Zettel ');
      await tags.addTag(alice, 'ab', 'archive');

      expect(await tags.getTags(alice, 'ab')).toEqual(['archive', 'zettel']);
    });

    it('rejects the same tag twice on a note', async () => {
      await tags.addTag(alice, 'ab', 'project');

      await expect(tags.addTag(alice, 'ab', 'PROJECT')).rejects.toBeInstanceOf(DuplicateEntityError);
    });

    it('rejects tagging a note of another tenant', async () => {
      await expect(tags.addTag(bob, 'ab', 'project')).rejects.toBeInstanceOf(CrossTenantReferenceError);
    });

    it('deletes one tag or all tags of a note', async () => {
      await tags.addTag(alice, 'ab', 'one');
      await tags.addTag(alice, 'ab', 'two');
      await tags.addTag(alice, 'ab', 'three');

      await tags.deleteTag(alice, 'ab', 'One');
      await expect(tags.deleteTag(alice, 'ab', 'one')).rejects.toBeInstanceOf(EntityNotFoundError);

      expect(await tags.deleteNoteTags(alice, 'ab')).toBe(2);
      expect(await tags.getTags(alice, 'ab')).toEqual([]);
    });
  });
});
