/**
 * Chat Schema Migration
 *
 * Conversations and their messages, created tenant-scoped from the start.
 */

import { Kysely, sql } from 'kysely';
import type { Migration } from 'kysely';
import { installTenantGuards } from '../sequencer/tenant-guards.js';
import { logger } from '../utils/logger.js';

const CHAT_TABLES = ['conversations', 'messages'] as const;

export const chatSchema: Migration = {
  async up(db: Kysely<any>): Promise<void> {
    logger.info('Running migration: 003_chat_schema (up)');

    await db.schema
      .createTable('conversations')
      .addColumn('tenant_id', 'integer', (col) => col.notNull().references('tenants.id').onDelete('cascade'))
      .addColumn('conversation_id', 'varchar(20)', (col) => col.notNull())
      .addColumn('title', 'text')
      .addColumn('context_note_ids', sql`text[]`, (col) => col.notNull().defaultTo(sql`'{}'::text[]`))
      .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
      .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
      .addPrimaryKeyConstraint('conversations_pkey', ['tenant_id', 'conversation_id'])
      .execute();

    await db.schema
      .createTable('messages')
      .addColumn('tenant_id', 'integer', (col) => col.notNull().references('tenants.id').onDelete('cascade'))
      .addColumn('message_id', 'varchar(20)', (col) => col.notNull())
      .addColumn('conversation_id', 'varchar(20)', (col) => col.notNull())
      .addColumn('role', 'text', (col) => col.notNull())
      .addColumn('content', 'text', (col) => col.notNull())
      .addColumn('tool_calls', 'jsonb')
      .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
      .addPrimaryKeyConstraint('messages_pkey', ['tenant_id', 'message_id'])
      .addForeignKeyConstraint(
        'messages_conversation_fkey',
        ['tenant_id', 'conversation_id'],
        'conversations',
        ['tenant_id', 'conversation_id'],
        (cb) => cb.onDelete('cascade')
      )
      .addCheckConstraint('messages_role_check', sql`role IN ('user', 'assistant')`)
      .execute();

    await db.schema
      .createIndex('idx_conversations_tenant_updated')
      .on('conversations')
      .columns(['tenant_id', 'updated_at desc'])
      .execute();
    await db.schema
      .createIndex('idx_messages_tenant_conversation')
      .on('messages')
      .columns(['tenant_id', 'conversation_id', 'created_at'])
      .execute();

    // A new message moves its conversation to the top of the list
    await sql`
      CREATE OR REPLACE FUNCTION touch_conversation()
      RETURNS trigger
      LANGUAGE plpgsql
      AS $$
      BEGIN
        UPDATE conversations
        SET updated_at = now()
        WHERE tenant_id = NEW.tenant_id AND conversation_id = NEW.conversation_id;
        RETURN NEW;
      END;
      $$
    `.execute(db);

    await sql`
      CREATE TRIGGER messages_touch_conversation
      AFTER INSERT ON messages
      FOR EACH ROW
      EXECUTE FUNCTION touch_conversation()
    `.execute(db);

    await installTenantGuards(db, CHAT_TABLES);

    logger.info('Migration 003_chat_schema completed');
  },

  async down(db: Kysely<any>): Promise<void> {
    logger.info('Running migration: 003_chat_schema (down)');

    await db.schema.dropTable('messages').ifExists().execute();
    await db.schema.dropTable('conversations').ifExists().execute();
    await sql`DROP FUNCTION IF EXISTS touch_conversation()`.execute(db);
  },
};
