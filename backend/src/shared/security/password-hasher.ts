/**
 * backend/src/shared/security/password-hasher.ts
 *
 * WHY:
 * - Services depend on an interface (DIP), not bcrypt directly.
 *
 * RULES:
 * - verify() never throws: a malformed stored hash simply fails verification.
 */

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, hash: string): Promise<boolean>;
}
