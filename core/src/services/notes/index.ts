/**
 * Notes Services Index
 */

export { NoteRepository } from './note-repository.js';
export type {
  CreateNoteOptions,
  DuplicateNoteGroup,
  ListNotesOptions,
  NoteRepositoryOptions,
} from './note-repository.js';
export { LinkRepository } from './link-repository.js';
export { TagRepository } from './tag-repository.js';
export { NoteCache } from './note-cache.js';
export type { NoteCacheConfig } from './note-cache.js';
