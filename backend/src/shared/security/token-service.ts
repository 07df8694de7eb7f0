/**
 * backend/src/shared/security/token-service.ts
 *
 * WHY:
 * - Bearer tokens come in two kinds that must never be interchangeable:
 *   `access` (API calls) and `password_reset` (one email link).
 * - Verification returns a result instead of throwing, so callers map every
 *   failure to one external outcome and keep the reason for logs only.
 */

export type TokenKind = 'access' | 'password_reset';

export type TokenRejection = 'expired' | 'invalid_signature' | 'malformed' | 'wrong_kind';

export type AccessTokenClaims = Readonly<{
  sub: string;
  type: 'access';
  iat: number;
  exp: number;
}>;

export type PasswordResetTokenClaims = Readonly<{
  sub: string;
  type: 'password_reset';
  /** The user's password_version when the token was issued. */
  pwv: number;
  iat: number;
  exp: number;
}>;

export type TokenVerification<TClaims> =
  | { valid: true; claims: TClaims }
  | { valid: false; reason: TokenRejection };

export interface TokenService {
  createAccessToken(userId: string): string;
  verifyAccessToken(token: string): TokenVerification<AccessTokenClaims>;

  createPasswordResetToken(userId: string, passwordVersion: number): string;
  verifyPasswordResetToken(token: string): TokenVerification<PasswordResetTokenClaims>;
}
