/**
 * backend/src/modules/auth/auth.constants.ts
 *
 * RULES:
 * - Must not import from DB/HTTP/framework code.
 */

export const TOKEN_TYPE = 'bearer' as const;

export const AUTH_MESSAGES = {
  // Same text whether or not the account exists.
  forgotPassword: 'If the email exists, a password reset link has been sent',
  passwordReset: 'Password reset successfully',
  passwordChanged: 'Password changed successfully',
} as const;
