import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { sql } from 'kysely';
import {
  ConversationRepository,
  CrossTenantReferenceError,
  DEFAULT_CONVERSATION_TITLE,
  EntityNotFoundError,
  TenantScope,
  ValidationError,
  type TenantContext,
} from '@zettl/core';
import { GENERATED_CHAT_ID_PATTERN } from '../../core/src/utils/local-id.js';
import { createMigratedDatabase, tenant, type TestDatabase } from '../support/test-database.js';

describe('ConversationRepository', () => {
  let database: TestDatabase & { alice: number; bob: number };
  let conversations: ConversationRepository;
  let alice: TenantContext;
  let bob: TenantContext;

  beforeAll(async () => {
    database = await createMigratedDatabase();
    conversations = new ConversationRepository(new TenantScope(database.db));
    alice = tenant(database.alice);
    bob = tenant(database.bob);
  });

  afterAll(async () => {
    await database.close();
  });

  beforeEach(async () => {
    await sql`TRUNCATE conversations, messages CASCADE`.execute(database.schemaDb);
  });

  it('creates a conversation with a default title', async () => {
    const conversation = await conversations.createConversation(alice);

    expect(conversation.conversation_id).toMatch(GENERATED_CHAT_ID_PATTERN);
    expect(conversation.tenant_id).toBe(database.alice);
    expect(conversation.title).toBe(DEFAULT_CONVERSATION_TITLE);
    expect(conversation.context_note_ids).toEqual([]);
  });

  it('keeps the context note ids', async () => {
    const created = await conversations.createConversation(alice, {
      title: 'Garden plans',
      contextNoteIds: ['ab', 'cd'],
    });

    const loaded = await conversations.getConversation(alice, created.conversation_id);

    expect(loaded.title).toBe('Garden plans');
    expect(loaded.context_note_ids).toEqual(['ab', 'cd']);
  });

  it('stores messages in order with their tool calls', async () => {
    const { conversation_id } = await conversations.createConversation(alice);

    await conversations.addMessage(alice, conversation_id, { role: 'user', content: 'Find my garden notes' });
    await conversations.addMessage(alice, conversation_id, {
      role: 'assistant',
      content: 'Found two notes',
      toolCalls: [{ name: 'search_notes', query: 'garden' }],
    });

    const messages = await conversations.getMessages(alice, conversation_id);

    expect(messages.map((message) => [message.role, message.content])).toEqual([
      ['user', 'Find my garden notes'],
      ['assistant', 'Found two notes'],
    ]);
    expect(messages[0]?.tool_calls).toBeNull();
    expect(messages[1]?.tool_calls).toEqual([{ name: 'search_notes', query: 'garden' }]);
  });

  it('moves a conversation to the top when a message arrives', async () => {
    const older = await conversations.createConversation(alice, { title: 'older' });
    const newer = await conversations.createConversation(alice, { title: 'newer' });

    expect((await conversations.listConversations(alice)).map((c) => c.title)).toEqual(['newer', 'older']);

    await conversations.addMessage(alice, older.conversation_id, { role: 'user', content: 'bump' });

    expect((await conversations.listConversations(alice)).map((c) => c.conversation_id)).toEqual([
      older.conversation_id,
      newer.conversation_id,
    ]);
  });

  it('renames a conversation', async () => {
    const { conversation_id } = await conversations.createConversation(alice);

    await conversations.updateConversationTitle(alice, conversation_id, 'Renamed');

    expect((await conversations.getConversation(alice, conversation_id)).title).toBe('Renamed');
  });

  it('rejects empty messages', async () => {
    const { conversation_id } = await conversations.createConversation(alice);

    await expect(
      conversations.addMessage(alice, conversation_id, { role: 'user', content: '' })
    ).rejects.toBeInstanceOf(ValidationError);
  });

  it('isolates conversations between tenants', async () => {
    const { conversation_id } = await conversations.createConversation(alice);

    await expect(conversations.getConversation(bob, conversation_id)).rejects.toBeInstanceOf(EntityNotFoundError);
    expect(await conversations.listConversations(bob)).toEqual([]);
    await expect(
      conversations.addMessage(bob, conversation_id, { role: 'user', content: 'intrusion' })
    ).rejects.toBeInstanceOf(CrossTenantReferenceError);
  });

  it('deletes a conversation with its messages', async () => {
    const { conversation_id } = await conversations.createConversation(alice);
    await conversations.addMessage(alice, conversation_id, { role: 'user', content: 'hello' });

    await conversations.deleteConversation(alice, conversation_id);

    expect(await conversations.getMessages(alice, conversation_id)).toEqual([]);
    await expect(conversations.deleteConversation(alice, conversation_id)).rejects.toBeInstanceOf(
      EntityNotFoundError
    );
  });
});
