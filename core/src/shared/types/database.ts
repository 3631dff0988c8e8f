/**
 * Kysely table interfaces for the tenant-scoped note store.
 *
 * Column names follow the database; every tenant-scoped table carries
 * `tenant_id`, which the stamping trigger fills on insert.
 */

import type { ColumnType, Generated, Insertable, Selectable, Updateable } from 'kysely';

type Timestamp = ColumnType<Date, Date | string | undefined, Date | string>;

export interface TenantsTable {
  id: Generated<number>;
  handle: string;
  created_at: ColumnType<Date, Date | string | undefined, never>;
  is_active: ColumnType<boolean, boolean | undefined, boolean>;
}

export interface NotesTable {
  // Stamped server-side; an explicit value is overwritten for client roles
  tenant_id: ColumnType<number, number | undefined, never>;
  note_id: string;
  content: string;
  created_at: Timestamp;
  modified_at: Timestamp;
}

export interface LinksTable {
  id: Generated<number>;
  tenant_id: ColumnType<number, number | undefined, never>;
  source_id: string;
  target_id: string;
  context: string | null;
  created_at: Timestamp;
}

export interface TagsTable {
  id: Generated<number>;
  tenant_id: ColumnType<number, number | undefined, never>;
  note_id: string;
  tag: string;
  created_at: Timestamp;
}

export interface ConversationsTable {
  tenant_id: ColumnType<number, number | undefined, never>;
  conversation_id: string;
  title: string | null;
  context_note_ids: string[] | null;
  created_at: Timestamp;
  updated_at: Timestamp;
}

export type MessageRole = 'user' | 'assistant';

export interface MessagesTable {
  tenant_id: ColumnType<number, number | undefined, never>;
  message_id: string;
  conversation_id: string;
  role: MessageRole;
  content: string;
  tool_calls: ColumnType<unknown, string | null | undefined, string | null>;
  created_at: Timestamp;
}

export interface AdminOverrideAuditTable {
  id: Generated<number>;
  tenant_id: number;
  actor: string;
  reason: string;
  operation: string;
  rows_affected: number | null;
  started_at: ColumnType<Date, Date | string | undefined, never>;
  finished_at: ColumnType<Date | null, Date | string | null | undefined, Date | string | null>;
}

/** Live view: notes joined with their aggregated tags */
export interface NotesWithTagsView {
  tenant_id: number;
  note_id: string;
  content: string;
  created_at: Date;
  modified_at: Date;
  all_tags_str: string;
  tag_list: string[];
}

/** Tenant-filtered projection of the materialized tag counts */
export interface TenantTagCountsView {
  tenant_id: number;
  tag: string;
  count: number;
}

export interface ZettlDatabase {
  tenants: TenantsTable;
  notes: NotesTable;
  links: LinksTable;
  tags: TagsTable;
  conversations: ConversationsTable;
  messages: MessagesTable;
  admin_override_audit: AdminOverrideAuditTable;
  notes_with_tags: NotesWithTagsView;
  tag_counts: TenantTagCountsView;
  tenant_tag_counts: TenantTagCountsView;
}

export type Note = Selectable<NotesTable>;
export type NewNote = Insertable<NotesTable>;
export type NoteUpdate = Updateable<NotesTable>;
export type Link = Selectable<LinksTable>;
export type Tag = Selectable<TagsTable>;
export type Conversation = Selectable<ConversationsTable>;
export type Message = Selectable<MessagesTable>;
export type NoteWithTags = Selectable<NotesWithTagsView>;
export type TagCount = Selectable<TenantTagCountsView>;
export type AdminOverrideAudit = Selectable<AdminOverrideAuditTable>;
