/**
 * Refresh the materialized tag counts
 *
 * Meant for a scheduler; readers see the previous figures until it finishes.
 *
 * Usage:
 *   npm run refresh:tag-counts -- [--plain]
 */

import { TagCountsService, createDatabaseConnectionPool, loadConfig, type RefreshResult } from '@zettl/core';
import { logger } from '../utils/logger.js';

export async function refreshTagCounts(forcePlain = false): Promise<RefreshResult> {
  const config = loadConfig();
  const pool = createDatabaseConnectionPool(config);

  try {
    const service = new TagCountsService(pool.getKyselyDatabase(), {
      refreshConcurrently: config.tagCounts.refreshConcurrently && !forcePlain,
    });
    return await service.refreshTagCounts();
  } finally {
    await pool.close();
  }
}

// CLI execution if run directly
if (import.meta.url === `file://${process.argv[1]}`) {
  refreshTagCounts(process.argv.slice(2).includes('--plain'))
    .then((result) => {
      console.log(`Tag counts refreshed (${result.mode}) in ${result.durationMs}ms`);
      process.exit(0);
    })
    .catch((error: unknown) => {
      logger.error('Tag counts refresh failed', { error });
      process.exit(1);
    });
}
