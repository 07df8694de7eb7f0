/**
 * backend/src/shared/http/request-schemas.ts
 *
 * WHY:
 * - Path ids and pagination look the same on every resource; each module's
 *   *.schemas.ts composes these instead of redefining them.
 *
 * RULES:
 * - Query strings arrive as strings, so numbers are coerced.
 * - skip is capped so it always fits the database's OFFSET.
 */

import { z } from 'zod';

export const idParamsSchema = z.object({
  id: z.string().uuid(),
});

export const MAX_SKIP = 1_000_000;

export function paginationSchema(opts: { defaultLimit: number; maxLimit: number }) {
  return z.object({
    skip: z.coerce.number().int().min(0).max(MAX_SKIP).default(0),
    limit: z.coerce.number().int().min(1).max(opts.maxLimit).default(opts.defaultLimit),
  });
}

export type Pagination = {
  skip: number;
  limit: number;
};
