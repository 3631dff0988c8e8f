/**
 * Derived Views Migration
 *
 * - notes_with_tags: live join of notes and their tags. Owned by the
 *   authenticated role so the base-table policies are evaluated for the
 *   querying session instead of being bypassed by a privileged owner.
 * - tag_counts: materialized per-tenant tag frequencies. Materialized views
 *   cannot carry row-level security, so clients get no grant on it.
 * - tenant_tag_counts: the tenant-filtered projection clients read.
 */

import { Kysely, sql } from 'kysely';
import type { Migration } from 'kysely';
import { CLIENT_ROLES } from '@zettl/core';
import { MigrationPostconditionError } from '../errors.js';
import { relationOwner } from '../sequencer/catalog.js';
import { logger } from '../utils/logger.js';

const authenticated = sql.id(CLIENT_ROLES.authenticated);
const anonymous = sql.id(CLIENT_ROLES.anonymous);

export const derivedViews: Migration = {
  async up(db: Kysely<any>): Promise<void> {
    logger.info('Running migration: 004_derived_views (up)');

    // ===================
    // NOTES WITH TAGS
    // ===================

    await sql`
      CREATE VIEW notes_with_tags WITH (security_barrier = true) AS
      SELECT
        n.tenant_id,
        n.note_id,
        n.content,
        n.created_at,
        n.modified_at,
        coalesce(string_agg(t.tag, ',' ORDER BY t.tag), '') AS all_tags_str,
        coalesce(array_agg(t.tag::text ORDER BY t.tag) FILTER (WHERE t.tag IS NOT NULL), ARRAY[]::text[]) AS tag_list
      FROM notes n
      LEFT JOIN tags t ON t.tenant_id = n.tenant_id AND t.note_id = n.note_id
      GROUP BY n.tenant_id, n.note_id
    `.execute(db);

    await sql`ALTER VIEW notes_with_tags OWNER TO ${authenticated}`.execute(db);
    await sql`REVOKE ALL ON notes_with_tags FROM PUBLIC, ${anonymous}`.execute(db);
    await sql`GRANT SELECT ON notes_with_tags TO ${authenticated}`.execute(db);

    const owner = await relationOwner(db, 'notes_with_tags');
    if (owner !== CLIENT_ROLES.authenticated) {
      throw new MigrationPostconditionError([
        `notes_with_tags is owned by ${owner ?? 'nobody'}, expected ${CLIENT_ROLES.authenticated}`,
      ]);
    }

    // ===================
    // TAG COUNTS
    // ===================

    await sql`
      CREATE MATERIALIZED VIEW tag_counts AS
      SELECT tenant_id, tag, count(*)::int AS count
      FROM tags
      GROUP BY tenant_id, tag
      WITH DATA
    `.execute(db);

    // Required by REFRESH ... CONCURRENTLY
    await db.schema
      .createIndex('idx_tag_counts_tenant_tag')
      .unique()
      .on('tag_counts')
      .columns(['tenant_id', 'tag'])
      .execute();

    await sql`REVOKE ALL ON tag_counts FROM PUBLIC, ${authenticated}, ${anonymous}`.execute(db);

    await sql`
      CREATE VIEW tenant_tag_counts WITH (security_barrier = true) AS
      SELECT tenant_id, tag, count
      FROM tag_counts
      WHERE tenant_id = auth.tenant_id()
    `.execute(db);

    await sql`REVOKE ALL ON tenant_tag_counts FROM PUBLIC, ${anonymous}`.execute(db);
    await sql`GRANT SELECT ON tenant_tag_counts TO ${authenticated}`.execute(db);

    logger.info('Migration 004_derived_views completed');
  },

  async down(db: Kysely<any>): Promise<void> {
    logger.info('Running migration: 004_derived_views (down)');

    await sql`DROP VIEW IF EXISTS tenant_tag_counts`.execute(db);
    await sql`DROP MATERIALIZED VIEW IF EXISTS tag_counts`.execute(db);
    await sql`DROP VIEW IF EXISTS notes_with_tags`.execute(db);
  },
};
