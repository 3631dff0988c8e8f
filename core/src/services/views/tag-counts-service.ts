/**
 * Tag Counts Service
 *
 * Administrative refresh of the `tag_counts` materialized aggregate. Clients
 * read it through `tenant_tag_counts` and see figures as of the last refresh.
 */

import { sql, type Kysely } from 'kysely';
import type { ZettlDatabase } from '../../shared/types/database.js';
import { DatabaseError, translateDatabaseError } from '../tenancy/errors.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('tag-counts');

export const TAG_COUNTS_VIEW = 'tag_counts';

export type RefreshMode = 'concurrent' | 'plain';

export interface TagCountsServiceOptions {
  /** Refresh without blocking readers once the view has been populated */
  refreshConcurrently: boolean;
}

export interface RefreshResult {
  mode: RefreshMode;
  durationMs: number;
}

export class TagCountsService {
  constructor(
    private readonly db: Kysely<ZettlDatabase>,
    private readonly options: TagCountsServiceOptions = { refreshConcurrently: true }
  ) {}

  async refreshTagCounts(): Promise<RefreshResult> {
    const startedAt = Date.now();

    try {
      const { rows } = await sql<{ ispopulated: boolean }>`
        SELECT ispopulated
        FROM pg_matviews
        WHERE schemaname = current_schema() AND matviewname = ${TAG_COUNTS_VIEW}
      `.execute(this.db);

      const view = rows[0];
      if (!view) {
        throw new DatabaseError(`Materialized view ${TAG_COUNTS_VIEW} does not exist`);
      }

      // CONCURRENTLY is rejected on a view that has never been populated
      const mode: RefreshMode = this.options.refreshConcurrently && view.ispopulated ? 'concurrent' : 'plain';
      const keyword = mode === 'concurrent' ? sql.raw('CONCURRENTLY ') : sql.raw('');

      await sql`REFRESH MATERIALIZED VIEW ${keyword}${sql.table(TAG_COUNTS_VIEW)}`.execute(this.db);

      const result = { mode, durationMs: Date.now() - startedAt };
      logger.info('Tag counts refreshed', result);
      return result;
    } catch (error) {
      const translated = translateDatabaseError(error);
      logger.error('Tag counts refresh failed', { code: translated.code, message: translated.message });
      throw translated;
    }
  }
}
