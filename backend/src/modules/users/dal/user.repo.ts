/**
 * backend/src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for users (mutations).
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError.
 * - No policies.
 * - Supports withDb() for transaction binding.
 */

import { randomUUID } from 'node:crypto';
import { sql } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';

export class UserRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): UserRepo {
    return new UserRepo(db);
  }

  /**
   * Creates a new user. Email and username are unique (DB constraints);
   * callers map a unique violation that slips past their probes.
   */
  async insertUser(params: {
    email: string;
    username: string;
    passwordHash: string;
    fullName: string | null;
    bio: string | null;
    profileImageUrl: string | null;
    now: Date;
  }): Promise<{ id: string }> {
    const id = randomUUID();

    await this.db
      .insertInto('users')
      .values({
        id,
        email: params.email.toLowerCase(),
        username: params.username,
        full_name: params.fullName,
        password_hash: params.passwordHash,
        is_active: true,
        is_verified: false,
        bio: params.bio,
        profile_image_url: params.profileImageUrl,
        password_version: 0,
        date_added: params.now,
        date_updated: params.now,
        added_by: null,
        updated_by: null,
        deleted_at: null,
      })
      .execute();

    return { id };
  }

  /**
   * Overwrites the password hash and bumps password_version, which
   * invalidates every outstanding reset token for the user.
   *
   * With `expectedPasswordVersion`, the row only changes while its version
   * still matches. Returns false when no row was updated.
   */
  async updatePassword(params: {
    userId: string;
    passwordHash: string;
    actorId: string;
    now: Date;
    expectedPasswordVersion?: number;
  }): Promise<boolean> {
    let query = this.db
      .updateTable('users')
      .set({
        password_hash: params.passwordHash,
        password_version: sql<number>`password_version + 1`,
        updated_by: params.actorId,
        date_updated: params.now,
      })
      .where('id', '=', params.userId)
      .where('deleted_at', 'is', null);

    if (params.expectedPasswordVersion !== undefined) {
      query = query.where('password_version', '=', params.expectedPasswordVersion);
    }

    const result = await query.executeTakeFirst();
    return result.numUpdatedRows > 0n;
  }
}
