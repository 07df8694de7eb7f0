/**
 * backend/src/shared/db/db-errors.ts
 *
 * Unique violations surface differently per driver:
 * - pg: SQLSTATE 23505
 * - better-sqlite3 (tests): SQLITE_CONSTRAINT_UNIQUE / SQLITE_CONSTRAINT_PRIMARYKEY
 */

const UNIQUE_VIOLATION_CODES = new Set([
  '23505',
  'SQLITE_CONSTRAINT_UNIQUE',
  'SQLITE_CONSTRAINT_PRIMARYKEY',
]);

export function isUniqueViolation(err: unknown): boolean {
  if (typeof err !== 'object' || err === null || !('code' in err)) return false;
  return typeof err.code === 'string' && UNIQUE_VIOLATION_CODES.has(err.code);
}
