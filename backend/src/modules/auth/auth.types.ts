/**
 * backend/src/modules/auth/auth.types.ts
 *
 * WHY:
 * - Response types for the Auth module endpoints.
 *
 * RULES:
 * - Never include raw passwords or hashes in response types.
 */

import type { UserResponse } from '../users';

export type AuthResult = {
  accessToken: string;
  tokenType: 'bearer';
  user: UserResponse;
};

export type MessageResult = {
  message: string;
};
