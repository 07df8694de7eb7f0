/**
 * backend/src/modules/users/dal/user.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for users (raw SQL access).
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - No transactions started here.
 * - Soft-deleted users are invisible: every read filters deleted_at, except
 *   the uniqueness probe (the unique indexes still hold deleted rows).
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { UsersTable } from '../../../shared/db/schema';

export type UserRow = Selectable<UsersTable>;

export async function selectUserByEmailSql(
  db: DbExecutor,
  email: string,
): Promise<UserRow | undefined> {
  return db
    .selectFrom('users')
    .selectAll()
    .where('email', '=', email.toLowerCase())
    .where('deleted_at', 'is', null)
    .executeTakeFirst();
}

export async function selectUserByIdSql(
  db: DbExecutor,
  userId: string,
): Promise<UserRow | undefined> {
  return db
    .selectFrom('users')
    .selectAll()
    .where('id', '=', userId)
    .where('deleted_at', 'is', null)
    .executeTakeFirst();
}

export async function selectUsersByIdsSql(
  db: DbExecutor,
  userIds: readonly string[],
): Promise<UserRow[]> {
  if (userIds.length === 0) return [];

  return db
    .selectFrom('users')
    .selectAll()
    .where('id', 'in', [...userIds])
    .where('deleted_at', 'is', null)
    .execute();
}

export async function findUserConflictsSql(
  db: DbExecutor,
  params: { email: string; username: string },
): Promise<{ emailTaken: boolean; usernameTaken: boolean }> {
  const email = params.email.toLowerCase();

  const rows = await db
    .selectFrom('users')
    .select(['email', 'username'])
    .where((eb) => eb.or([eb('email', '=', email), eb('username', '=', params.username)]))
    .execute();

  return {
    emailTaken: rows.some((r) => r.email === email),
    usernameTaken: rows.some((r) => r.username === params.username),
  };
}
