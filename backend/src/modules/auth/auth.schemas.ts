/**
 * src/modules/auth/auth.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Auth module.
 * - Prevents invalid payloads from reaching services.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Password rules: 8+ chars on create/change; login only requires non-empty.
 * - Email normalized (trim + lowercase) in the flows, not here.
 * - Token fields are only checked for presence and size; the codec does the rest.
 */

import { z } from 'zod';

const tokenField = z.string().min(1, 'Token is required').max(4096, 'Invalid token');
const newPasswordField = z
  .string()
  .min(8, 'Password must be at least 8 characters')
  .max(200, 'Password is too long');

export const registerSchema = z.object({
  email: z.string().trim().email('Invalid email address'),
  password: newPasswordField,
});

export type RegisterInput = z.infer<typeof registerSchema>;

export const loginSchema = z.object({
  email: z.string().trim().email('Invalid email address'),
  password: z.string().min(1, 'Password is required'),
});

export type LoginInput = z.infer<typeof loginSchema>;

export const refreshTokenSchema = z.object({
  refreshToken: tokenField,
});

export type RefreshTokenInput = z.infer<typeof refreshTokenSchema>;

export const verifyEmailSchema = z.object({
  token: tokenField,
});

export type VerifyEmailInput = z.infer<typeof verifyEmailSchema>;

export const verifyEmailRequestSchema = z.object({
  email: z.string().trim().email('Invalid email address'),
});

export type VerifyEmailRequestInput = z.infer<typeof verifyEmailRequestSchema>;

export const changePasswordSchema = z.object({
  currentPassword: z.string().min(1, 'Current password is required'),
  newPassword: newPasswordField,
});

export type ChangePasswordInput = z.infer<typeof changePasswordSchema>;
