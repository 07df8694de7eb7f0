/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module.
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 * - password_hash never leaves the DAL except through UserCredentials.
 */

import type { Audit, Lifecycle } from '../../shared/db/lifecycle';

export type UserId = string;

export type User = Audit & {
  id: UserId;
  email: string;
  username: string;
  fullName: string | null;
  isActive: boolean;
  isVerified: boolean;
  bio: string | null;
  profileImageUrl: string | null;
  passwordVersion: number;
  lifecycle: Lifecycle;
};

export type UserCredentials = {
  user: User;
  passwordHash: string;
};

/** What the API returns for a user (own profile, post/comment authors). */
export type UserResponse = {
  id: UserId;
  email: string;
  username: string;
  fullName: string | null;
  bio: string | null;
  profileImageUrl: string | null;
  isActive: boolean;
  isVerified: boolean;
  dateAdded: Date;
  dateUpdated: Date;
};

export function toUserResponse(user: User): UserResponse {
  return {
    id: user.id,
    email: user.email,
    username: user.username,
    fullName: user.fullName,
    bio: user.bio,
    profileImageUrl: user.profileImageUrl,
    isActive: user.isActive,
    isVerified: user.isVerified,
    dateAdded: user.dateAdded,
    dateUpdated: user.dateUpdated,
  };
}

/** Public byline for posts and comments: no email, no account flags. */
export type AuthorSummary = {
  id: UserId;
  username: string;
  fullName: string | null;
  profileImageUrl: string | null;
};

export function toAuthorSummary(user: User): AuthorSummary {
  return {
    id: user.id,
    username: user.username,
    fullName: user.fullName,
    profileImageUrl: user.profileImageUrl,
  };
}
