/**
 * Request validation helpers (zod).
 */

import { z } from 'zod';
import { isIsoDate } from './dates.js';
import { ValidationError } from './errors.js';

/**
 * Parses `input` with `schema` or throws a ValidationError listing the issues.
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message));
    throw new ValidationError(issues.join('; '));
  }
  return parsed.data;
}

/** A real calendar day as `YYYY-MM-DD`; `2024-02-30` is rejected. */
export const IsoDateSchema = z.string().refine(isIsoDate, 'must be an ISO date (YYYY-MM-DD)');
