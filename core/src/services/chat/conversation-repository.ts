/**
 * Conversation Repository
 *
 * Chat conversations and their messages, stored with the same composite-key
 * pattern as notes: a message references its conversation through
 * (tenant_id, conversation_id), so it can never attach to another tenant's
 * conversation.
 */

import { z } from 'zod';
import type { Conversation, Message } from '../../shared/types/database.js';
import type { TenantContext } from '../../shared/types/tenancy.js';
import { EntityNotFoundError } from '../tenancy/errors.js';
import type { TenantScope } from '../tenancy/tenant-scope.js';
import { parseInput } from '../../utils/input-validation.js';
import { generateChatId } from '../../utils/local-id.js';
import { parseTextArray } from '../../utils/pg-array.js';

export const DEFAULT_CONVERSATION_TITLE = 'New Conversation';

const ChatIdSchema = z.string().trim().min(1).max(20);

const CreateConversationSchema = z.object({
  title: z.string().trim().min(1).optional(),
  contextNoteIds: z.array(z.string().trim().min(1).max(10)).default([]),
});

export type CreateConversationInput = z.input<typeof CreateConversationSchema>;

const AddMessageSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string().min(1),
  toolCalls: z.array(z.record(z.unknown())).optional(),
});

export type AddMessageInput = z.input<typeof AddMessageSchema>;

export interface ConversationRepositoryOptions {
  generateId?: () => string;
}

function normalizeConversation(row: Conversation): Conversation {
  return { ...row, context_note_ids: parseTextArray(row.context_note_ids) };
}

export class ConversationRepository {
  private readonly generateId: () => string;

  constructor(private readonly scope: TenantScope, options: ConversationRepositoryOptions = {}) {
    this.generateId = options.generateId ?? (() => generateChatId());
  }

  async createConversation(context: TenantContext, input: CreateConversationInput = {}): Promise<Conversation> {
    const { title, contextNoteIds } = parseInput(CreateConversationSchema, input);

    const row = await this.scope.run(context, (trx) =>
      trx
        .insertInto('conversations')
        .values({
          conversation_id: this.generateId(),
          title: title ?? DEFAULT_CONVERSATION_TITLE,
          context_note_ids: contextNoteIds,
        })
        .returningAll()
        .executeTakeFirstOrThrow()
    );
    return normalizeConversation(row);
  }

  async getConversation(context: TenantContext, conversationId: string): Promise<Conversation> {
    const row = await this.scope.run(context, (trx) =>
      trx
        .selectFrom('conversations')
        .selectAll()
        .where('conversation_id', '=', conversationId)
        .executeTakeFirst()
    );
    if (!row) {
      throw new EntityNotFoundError('Conversation', { tenantId: context.tenantId, conversationId });
    }
    return normalizeConversation(row);
  }

  /**
   * Most recently active conversations first
   */
  async listConversations(context: TenantContext, limit = 20): Promise<Conversation[]> {
    const rows = await this.scope.run(context, (trx) =>
      trx
        .selectFrom('conversations')
        .selectAll()
        .orderBy('updated_at', 'desc')
        .orderBy('conversation_id', 'desc')
        .limit(limit)
        .execute()
    );
    return rows.map(normalizeConversation);
  }

  async updateConversationTitle(context: TenantContext, conversationId: string, title: string): Promise<void> {
    const updated = await this.scope.run(context, (trx) =>
      trx
        .updateTable('conversations')
        .set({ title })
        .where('conversation_id', '=', conversationId)
        .returning('conversation_id')
        .executeTakeFirst()
    );
    if (!updated) {
      throw new EntityNotFoundError('Conversation', { tenantId: context.tenantId, conversationId });
    }
  }

  /**
   * Append a message. The conversation's `updated_at` is bumped by trigger.
   */
  async addMessage(context: TenantContext, conversationId: string, input: AddMessageInput): Promise<Message> {
    const conversation = parseInput(ChatIdSchema, conversationId);
    const { role, content, toolCalls } = parseInput(AddMessageSchema, input);

    return this.scope.run(context, (trx) =>
      trx
        .insertInto('messages')
        .values({
          message_id: this.generateId(),
          conversation_id: conversation,
          role,
          content,
          tool_calls: toolCalls === undefined ? null : JSON.stringify(toolCalls),
        })
        .returningAll()
        .executeTakeFirstOrThrow()
    );
  }

  /**
   * Messages of a conversation in the order they were written
   */
  async getMessages(context: TenantContext, conversationId: string): Promise<Message[]> {
    return this.scope.run(context, (trx) =>
      trx
        .selectFrom('messages')
        .selectAll()
        .where('conversation_id', '=', conversationId)
        .orderBy('created_at')
        .orderBy('message_id')
        .execute()
    );
  }

  /**
   * Delete a conversation; its messages cascade
   */
  async deleteConversation(context: TenantContext, conversationId: string): Promise<void> {
    const deleted = await this.scope.run(context, (trx) =>
      trx
        .deleteFrom('conversations')
        .where('conversation_id', '=', conversationId)
        .returning('conversation_id')
        .executeTakeFirst()
    );
    if (!deleted) {
      throw new EntityNotFoundError('Conversation', { tenantId: context.tenantId, conversationId });
    }
  }
}
