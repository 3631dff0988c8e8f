/**
 * Tenant isolation enforced by the database: identity resolution, the
 * stamping trigger, row-level security policies and composite references.
 */

import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { sql } from 'kysely';
import {
  CrossTenantReferenceError,
  EntityNotFoundError,
  LinkRepository,
  NoteRepository,
  RowSecurityViolationError,
  TenantScope,
} from '@zettl/core';
import { createMigratedDatabase, tenant, type TestDatabase } from '../support/test-database.js';

describe('row level security', () => {
  let database: TestDatabase & { alice: number; bob: number };
  let scope: TenantScope;
  let notes: NoteRepository;
  let links: LinkRepository;

  beforeAll(async () => {
    database = await createMigratedDatabase();
    scope = new TenantScope(database.db);
    links = new LinkRepository(scope);
  });

  afterAll(async () => {
    await database.close();
  });

  beforeEach(async () => {
    // A fresh repository per test keeps the cache out of the picture
    notes = new NoteRepository(scope);
    await sql`TRUNCATE notes, links, tags CASCADE`.execute(database.schemaDb);
  });

  describe('auth.tenant_id()', () => {
    async function resolve(claims: string): Promise<number | null> {
      return database.schemaDb.transaction().execute(async (trx) => {
        await sql`SELECT set_config('request.jwt.claims', ${claims}, true)`.execute(trx);
        const { rows } = await sql<{ id: number | null }>`SELECT auth.tenant_id() AS id`.execute(trx);
        return rows[0]?.id ?? null;
      });
    }

    it.each([
      ['an empty setting', ''],
      ['invalid JSON', 'not json'],
      ['claims without sub', '{"role":"authenticated"}'],
      ['a zero subject', '{"sub":"0"}'],
      ['a negative subject', '{"sub":"-3"}'],
      ['a non-numeric subject', '{"sub":"12abc"}'],
      ['an out-of-range subject', '{"sub":"2147483648"}'],
    ])('resolves no identity from %s', async (_label, claims) => {
      expect(await resolve(claims)).toBeNull();
    });

    it('resolves a string subject', async () => {
      expect(await resolve('{"sub":"42"}')).toBe(42);
    });

    it('resolves a numeric subject', async () => {
      expect(await resolve('{"sub":7}')).toBe(7);
    });
  });

  it('hides one tenant\'s notes from another', async () => {
    await notes.createNote(tenant(database.alice), 'alice private', { noteId: 'ab' });

    expect(await notes.listNotes(tenant(database.bob))).toEqual([]);
    await expect(notes.getNote(tenant(database.bob), 'ab')).rejects.toBeInstanceOf(EntityNotFoundError);
  });

  it('lets two tenants use the same local id', async () => {
    await notes.createNote(tenant(database.alice), 'alice version', { noteId: 'ab' });
    await notes.createNote(tenant(database.bob), 'bob version', { noteId: 'ab' });

    expect((await notes.getNote(tenant(database.alice), 'ab')).content).toBe('alice version');
    expect((await notes.getNote(tenant(database.bob), 'ab')).content).toBe('bob version');
  });

  it('stamps the session tenant over a spoofed tenant_id', async () => {
    await scope.run(tenant(database.alice), async (trx) => {
      await sql`INSERT INTO notes (tenant_id, note_id, content) VALUES (${database.bob}, 'zz', 'spoofed')`.execute(trx);
    });

    const { rows } = await sql<{ tenant_id: number }>`
      SELECT tenant_id FROM notes WHERE note_id = 'zz'
    `.execute(database.schemaDb);
    expect(rows).toEqual([{ tenant_id: database.alice }]);
  });

  it('ignores the override flag when a client role sets it', async () => {
    await scope.run(tenant(database.alice), async (trx) => {
      await sql`SELECT set_config('zettl.admin_override', 'on', true)`.execute(trx);
      await sql`INSERT INTO notes (tenant_id, note_id, content) VALUES (${database.bob}, 'yy', 'override attempt')`.execute(trx);
    });

    const { rows } = await sql<{ tenant_id: number }>`
      SELECT tenant_id FROM notes WHERE note_id = 'yy'
    `.execute(database.schemaDb);
    expect(rows).toEqual([{ tenant_id: database.alice }]);
  });

  it('rejects inserts from an authenticated session without claims', async () => {
    const insert = database.schemaDb.transaction().execute(async (trx) => {
      await sql`SET LOCAL ROLE authenticated`.execute(trx);
      await sql`INSERT INTO notes (note_id, content) VALUES ('qq', 'no identity')`.execute(trx);
    });

    await expect(insert).rejects.toMatchObject({ code: '28000' });
  });

  it('gives the anonymous role no access to tenant data', async () => {
    await notes.createNote(tenant(database.alice), 'alice private', { noteId: 'ab' });

    const read = scope.runAnonymous((trx) => trx.selectFrom('notes').selectAll().execute());

    await expect(read).rejects.toBeInstanceOf(RowSecurityViolationError);
  });

  it('refuses to move a row to another tenant', async () => {
    await notes.createNote(tenant(database.alice), 'alice private', { noteId: 'ab' });

    const move = scope.run(tenant(database.alice), (trx) =>
      sql`UPDATE notes SET tenant_id = ${database.bob} WHERE note_id = 'ab'`.execute(trx)
    );

    await expect(move).rejects.toBeInstanceOf(RowSecurityViolationError);
  });

  it('does not let a tenant delete another tenant\'s note', async () => {
    await notes.createNote(tenant(database.alice), 'alice private', { noteId: 'ab' });

    await expect(notes.deleteNote(tenant(database.bob), 'ab')).rejects.toBeInstanceOf(EntityNotFoundError);
    expect((await notes.getNote(tenant(database.alice), 'ab')).content).toBe('alice private');
  });

  it('grants the client role only the sequences of tenant-scoped tables', async () => {
    const { rows } = await sql<{ tenants: boolean; links: boolean; tags: boolean }>`
      SELECT has_sequence_privilege('authenticated', 'tenants_id_seq', 'USAGE') AS tenants,
             has_sequence_privilege('authenticated', 'links_id_seq', 'USAGE') AS links,
             has_sequence_privilege('authenticated', 'tags_id_seq', 'USAGE') AS tags
    `.execute(database.schemaDb);

    expect(rows).toEqual([{ tenants: false, links: true, tags: true }]);
  });

  it('rolls back work that switches the session to another tenant', async () => {
    await notes.createNote(tenant(database.alice), 'alice secret', { noteId: 'ab' });
    const aliceClaims = JSON.stringify({ sub: String(database.alice) });

    const run = scope.run(tenant(database.bob), async (trx) => {
      await sql`SELECT set_config('request.jwt.claims', ${aliceClaims}, true)`.execute(trx);
      await sql`INSERT INTO notes (note_id, content) VALUES ('zz', 'written as alice')`.execute(trx);
      return trx.selectFrom('notes').select(['tenant_id', 'content']).execute();
    });

    await expect(run).rejects.toThrow('Session identity changed inside a tenant-scoped transaction');
    const { rows } = await sql<{ count: number }>`
      SELECT count(*)::int AS count FROM notes WHERE note_id = 'zz'
    `.execute(database.schemaDb);
    expect(rows[0]?.count).toBe(0);
  });

  it('rolls back work that leaves the client role', async () => {
    const run = scope.run(tenant(database.bob), async (trx) => {
      await sql`RESET ROLE`.execute(trx);
      return trx.selectFrom('notes').selectAll().execute();
    });

    await expect(run).rejects.toBeInstanceOf(RowSecurityViolationError);
    await expect(run).rejects.toThrow('Session role changed inside a tenant-scoped transaction');
  });

  it('rejects a link to a note that only another tenant owns', async () => {
    await notes.createNote(tenant(database.alice), 'alice private', { noteId: 'ab' });
    await notes.createNote(tenant(database.bob), 'bob note', { noteId: 'cd' });

    const link = links.createLink(tenant(database.bob), 'cd', 'ab');

    await expect(link).rejects.toBeInstanceOf(CrossTenantReferenceError);
    const { rows } = await sql<{ count: number }>`SELECT count(*)::int AS count FROM links`.execute(database.schemaDb);
    expect(rows[0]?.count).toBe(0);
  });
});
