/**
 * backend/src/modules/auth/auth.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Auth module.
 * - Prevents invalid payloads from reaching services.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Password rules: 8+ chars for any new password.
 * - Email normalized to lowercase in service, not here.
 * - Reset tokens are only checked for presence here; the token service
 *   verifies them.
 */

import { z } from 'zod';

const newPassword = z.string().min(8, 'Password must be at least 8 characters');

export const signupSchema = z.object({
  email: z.string().email('Invalid email address'),
  username: z.string().min(3, 'Username must be at least 3 characters').max(100),
  password: newPassword,
  fullName: z.string().max(200).optional(),
  bio: z.string().optional(),
  profileImageUrl: z.string().url().optional(),
});

export type SignupInput = z.infer<typeof signupSchema>;

export const signinSchema = z.object({
  email: z.string().email('Invalid email address'),
  password: z.string().min(1, 'Password is required'),
});

export type SigninInput = z.infer<typeof signinSchema>;

export const forgotPasswordSchema = z.object({
  email: z.string().email('Invalid email address'),
});

export type ForgotPasswordInput = z.infer<typeof forgotPasswordSchema>;

export const resetPasswordSchema = z.object({
  token: z.string().min(1, 'Token is required'),
  newPassword,
});

export type ResetPasswordInput = z.infer<typeof resetPasswordSchema>;

export const changePasswordSchema = z.object({
  oldPassword: z.string().min(1, 'Current password is required'),
  newPassword,
});

export type ChangePasswordInput = z.infer<typeof changePasswordSchema>;
