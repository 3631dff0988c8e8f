/**
 * Zettl Storage Core Library
 *
 * Tenant-scoped data access over the row-level-security schema
 */

// Export all service modules
export * from './services/tenancy/index.js';
export * from './services/notes/index.js';
export * from './services/chat/index.js';
export * from './services/views/index.js';

// Export shared types
export * from './shared/types/index.js';

// Export shared utilities
export { loadConfig, getConnectionString } from './utils/config.js';
export type { Config } from './utils/config.js';
export { logger, createLogger } from './utils/logger.js';
export type { Logger } from './utils/logger.js';
export {
  DatabaseConnectionPool,
  createDatabaseConnectionPool,
  poolConfigFrom,
} from './utils/database-pool.js';
export { generateNoteId, generateChatId, generateLocalId } from './utils/local-id.js';
export { parseTextArray } from './utils/pg-array.js';
export { escapeLikePattern, parseInput } from './utils/input-validation.js';
