/**
 * backend/src/modules/users/queries/user.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape DB rows into User domain types.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { lifecycleFromDeletedAt } from '../../../shared/db/lifecycle';
import {
  findUserConflictsSql,
  selectUserByEmailSql,
  selectUserByIdSql,
  selectUsersByIdsSql,
} from '../dal/user.query-sql';
import type { UserRow } from '../dal/user.query-sql';
import type { User, UserCredentials } from '../user.types';

function toUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    username: row.username,
    fullName: row.full_name ?? null,
    isActive: row.is_active,
    isVerified: row.is_verified,
    bio: row.bio ?? null,
    profileImageUrl: row.profile_image_url ?? null,
    passwordVersion: row.password_version,
    lifecycle: lifecycleFromDeletedAt(row.deleted_at),
    dateAdded: row.date_added,
    dateUpdated: row.date_updated,
    addedBy: row.added_by,
    updatedBy: row.updated_by,
  };
}

export async function getUserByEmail(db: DbExecutor, email: string): Promise<User | undefined> {
  const row = await selectUserByEmailSql(db, email);
  if (!row) return undefined;
  return toUser(row);
}

/** Includes soft-deleted users: their email and username stay reserved. */
export async function findUserConflicts(
  db: DbExecutor,
  params: { email: string; username: string },
): Promise<{ emailTaken: boolean; usernameTaken: boolean }> {
  return findUserConflictsSql(db, params);
}

export async function getUserById(db: DbExecutor, userId: string): Promise<User | undefined> {
  const row = await selectUserByIdSql(db, userId);
  if (!row) return undefined;
  return toUser(row);
}

export async function getUsersByIds(
  db: DbExecutor,
  userIds: readonly string[],
): Promise<Map<string, User>> {
  const rows = await selectUsersByIdsSql(db, userIds);
  return new Map(rows.map((row) => [row.id, toUser(row)]));
}

export async function getUserCredentialsByEmail(
  db: DbExecutor,
  email: string,
): Promise<UserCredentials | undefined> {
  const row = await selectUserByEmailSql(db, email);
  if (!row) return undefined;
  return { user: toUser(row), passwordHash: row.password_hash };
}

export async function getUserCredentialsById(
  db: DbExecutor,
  userId: string,
): Promise<UserCredentials | undefined> {
  const row = await selectUserByIdSql(db, userId);
  if (!row) return undefined;
  return { user: toUser(row), passwordHash: row.password_hash };
}
