import type { Logger } from '@zettl/core';
import type { SchemaExecutor } from './catalog.js';

export interface SequencerContext {
  /** Executor bound to the migration transaction */
  db: SchemaExecutor;
  logger: Logger;
  /** Explicit tenant that receives pre-existing rows */
  backfillTenantId?: number;
  /** Decisions taken by steps, surfaced in the report */
  outcome: { backfill?: BackfillDecision };
}

/**
 * One ordered step of the tenant-isolation migration. `isApplied` inspects
 * the catalog so a re-run can skip work that is already done.
 */
export interface MigrationStep {
  id: string;
  description: string;
  isApplied(context: SequencerContext): Promise<boolean>;
  apply(context: SequencerContext): Promise<void>;
}

export interface BackfillDecision {
  tenantId: number;
  source: 'explicit' | 'earliest_tenant';
  rowsUpdated: Record<string, number>;
}

export interface SequencerReport {
  applied: string[];
  skipped: string[];
  backfill?: BackfillDecision;
  verified: boolean;
}
