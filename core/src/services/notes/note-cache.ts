import { LRUCache } from 'lru-cache';
import type { Note } from '../../shared/types/database.js';
import type { NoteKey } from '../../shared/types/tenancy.js';
import { loadConfig } from '../../utils/config.js';

export interface NoteCacheConfig {
  maxEntries: number;
  ttlMs: number;
}

/**
 * Read-through cache for single notes.
 *
 * Note ids are only unique within a tenant, so every entry is keyed by the
 * (tenant id, note id) pair; a bare note id would let one tenant read another
 * tenant's cached row.
 */
export class NoteCache {
  private readonly cache: LRUCache<string, Note>;

  constructor(config: NoteCacheConfig = loadConfig().noteCache) {
    this.cache = new LRUCache({
      max: config.maxEntries,
      ttl: config.ttlMs,
    });
  }

  static keyFor({ tenantId, noteId }: NoteKey): string {
    return `${tenantId}:${noteId}`;
  }

  get(key: NoteKey): Note | undefined {
    return this.cache.get(NoteCache.keyFor(key));
  }

  set(note: Note): void {
    this.cache.set(NoteCache.keyFor({ tenantId: note.tenant_id, noteId: note.note_id }), note);
  }

  delete(key: NoteKey): void {
    this.cache.delete(NoteCache.keyFor(key));
  }

  get size(): number {
    return this.cache.size;
  }
}
