/**
 * backend/src/modules/users/index.ts
 *
 * Public surface of the users module. Other modules import from here, never
 * from /queries or /dal directly.
 */

export { getUserById, getUsersByIds } from './queries/user.queries';
export { toAuthorSummary, toUserResponse } from './user.types';
export type { AuthorSummary, User, UserId, UserResponse } from './user.types';
