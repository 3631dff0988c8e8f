/**
 * Initial Schema Migration
 *
 * The single-tenant note store: notes keyed by a short local id, links and
 * tags referencing them directly. 002 converts it to the tenant-scoped shape.
 */

import { Kysely, sql } from 'kysely';
import type { Migration } from 'kysely';
import { logger } from '../utils/logger.js';

export const initialSchema: Migration = {
  async up(db: Kysely<any>): Promise<void> {
    logger.info('Running migration: 001_initial_schema (up)');

    await db.schema
      .createTable('notes')
      .addColumn('note_id', 'varchar(10)', (col) => col.primaryKey())
      .addColumn('content', 'text', (col) => col.notNull())
      .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
      .addColumn('modified_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
      .execute();

    await db.schema
      .createTable('links')
      .addColumn('id', 'serial', (col) => col.primaryKey())
      .addColumn('source_id', 'varchar(10)', (col) => col.notNull().references('notes.note_id').onDelete('cascade'))
      .addColumn('target_id', 'varchar(10)', (col) => col.notNull().references('notes.note_id').onDelete('cascade'))
      .addColumn('context', 'text')
      .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
      .addUniqueConstraint('unique_link', ['source_id', 'target_id'])
      .execute();

    await db.schema
      .createTable('tags')
      .addColumn('id', 'serial', (col) => col.primaryKey())
      .addColumn('note_id', 'varchar(10)', (col) => col.notNull().references('notes.note_id').onDelete('cascade'))
      .addColumn('tag', 'varchar(255)', (col) => col.notNull())
      .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
      .addUniqueConstraint('unique_tag', ['note_id', 'tag'])
      .execute();

    // ===================
    // INDEXES
    // ===================

    await db.schema.createIndex('idx_notes_created_at').on('notes').column('created_at desc').execute();
    await db.schema.createIndex('idx_links_source').on('links').column('source_id').execute();
    await db.schema.createIndex('idx_links_target').on('links').column('target_id').execute();
    await db.schema.createIndex('idx_tags_note_id').on('tags').column('note_id').execute();
    await db.schema.createIndex('idx_tags_tag').on('tags').column('tag').execute();

    await db.schema
      .createIndex('idx_notes_content_fts')
      .on('notes')
      .using('gin')
      .expression(sql`to_tsvector('english', content)`)
      .execute();

    // ===================
    // MODIFIED TIMESTAMP
    // ===================

    await sql`
      CREATE OR REPLACE FUNCTION set_modified_at()
      RETURNS trigger
      LANGUAGE plpgsql
      AS $$
      BEGIN
        NEW.modified_at := now();
        RETURN NEW;
      END;
      $$
    `.execute(db);

    await sql`
      CREATE TRIGGER notes_set_modified_at
      BEFORE UPDATE ON notes
      FOR EACH ROW
      EXECUTE FUNCTION set_modified_at()
    `.execute(db);

    logger.info('Migration 001_initial_schema completed');
  },

  async down(db: Kysely<any>): Promise<void> {
    logger.info('Running migration: 001_initial_schema (down)');

    await db.schema.dropTable('tags').ifExists().execute();
    await db.schema.dropTable('links').ifExists().execute();
    await db.schema.dropTable('notes').ifExists().execute();
    await sql`DROP FUNCTION IF EXISTS set_modified_at()`.execute(db);
  },
};
