/**
 * Link a hub note to every note of a tenant carrying a tag
 *
 * Runs under the administrative override and leaves an audit row.
 *
 * Usage:
 *   npm run link:tag -- --tenant <id> --tag <tag> --target <note id>
 *     --actor <name> --reason <text> [--context <text>]
 */

import {
  AdministrativeOverride,
  createDatabaseConnectionPool,
  type LinkNotesByTagRequest,
  type OverrideResult,
} from '@zettl/core';
import { MigrationError } from '../errors.js';
import { logger } from '../utils/logger.js';

const REQUIRED_FLAGS = ['--tenant', '--tag', '--target', '--actor', '--reason'] as const;

export function parseLinkArgs(args: string[]): LinkNotesByTagRequest {
  const values = new Map<string, string>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const value = args[i + 1];
    if (arg?.startsWith('--') && value !== undefined && !value.startsWith('--')) {
      values.set(arg, value);
      i++;
    }
  }

  const missing = REQUIRED_FLAGS.filter((flag) => !values.has(flag));
  if (missing.length > 0) {
    throw new MigrationError('INVALID_ARGUMENT', `Missing required options: ${missing.join(', ')}`);
  }

  return {
    tenantId: Number(values.get('--tenant')),
    tag: values.get('--tag') ?? '',
    targetNoteId: values.get('--target') ?? '',
    actor: values.get('--actor') ?? '',
    reason: values.get('--reason') ?? '',
    context: values.get('--context'),
  };
}

export async function linkNotesByTag(request: LinkNotesByTagRequest): Promise<OverrideResult> {
  const pool = createDatabaseConnectionPool();

  try {
    return await new AdministrativeOverride(pool.getKyselyDatabase()).linkNotesByTag(request);
  } finally {
    await pool.close();
  }
}

// CLI execution if run directly
if (import.meta.url === `file://${process.argv[1]}`) {
  Promise.resolve()
    .then(() => linkNotesByTag(parseLinkArgs(process.argv.slice(2))))
    .then((result) => {
      console.log(`Created ${result.rowsAffected} links (audit #${result.auditId})`);
      process.exit(0);
    })
    .catch((error: unknown) => {
      logger.error('Linking notes by tag failed', { error });
      process.exit(1);
    });
}
