/**
 * Input validation helpers shared by the repositories
 */

import type { z } from 'zod';
import { translateDatabaseError } from '../services/tenancy/errors.js';

/**
 * Parse repository input, raising ValidationError instead of a bare ZodError
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw translateDatabaseError(parsed.error);
  }
  return parsed.data;
}

/**
 * Escape LIKE metacharacters so user input matches literally
 */
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}
