export { ConversationRepository, DEFAULT_CONVERSATION_TITLE } from './conversation-repository.js';
export type {
  AddMessageInput,
  ConversationRepositoryOptions,
  CreateConversationInput,
} from './conversation-repository.js';
