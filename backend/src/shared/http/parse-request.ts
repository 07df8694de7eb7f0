/**
 * backend/src/shared/http/parse-request.ts
 *
 * Shorthand for the controller pattern "safeParse, else 400 with the issues".
 */

import type { z } from 'zod';
import { AppError } from './errors';

export function parseOrThrow<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  message: string,
): z.infer<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw AppError.invalidInput(message, parsed.error.issues);
  }
  return parsed.data;
}
