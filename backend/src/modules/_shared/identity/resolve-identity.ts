/**
 * backend/src/modules/_shared/identity/resolve-identity.ts
 *
 * WHY:
 * - A valid access token only proves who signed in; the user may have been
 *   soft-deleted since. Services resolve the subject before acting for it.
 *
 * RULES:
 * - A missing user is 404 "User not found", not 401: the token itself was valid.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { AuthClaims } from '../../../shared/http/require-auth-context';
import { AppError } from '../../../shared/http/errors';
import { getUserById } from '../../users';
import type { User } from '../../users';

export async function resolveIdentity(db: DbExecutor, claims: AuthClaims): Promise<User> {
  const user = await getUserById(db, claims.userId);
  if (!user) {
    throw AppError.notFound('User not found', { userId: claims.userId });
  }
  return user;
}
