/**
 * backend/src/modules/auth/auth.constants.ts
 *
 * WHY:
 * - Central place for auth domain constants shared across flows.
 *
 * RULES:
 * - Must not import from DB/HTTP/framework code.
 * - Threshold/window values live in config (app/config.ts), not here.
 */

export const TOKEN_TYPE = 'Bearer';

/** Rate-limit scopes; the counter key is rl:{scope}:{id}. */
export const AUTH_RATE_LIMIT_SCOPES = {
  loginAccount: 'login:account',
  loginAddress: 'login:address',
  registerAddress: 'register:address',
  verifyRequest: 'verify-request:email',
} as const;

export const VERIFY_EMAIL_REQUEST_RESPONSE = {
  message: 'If an unverified account with that email exists, a verification link has been sent.',
} as const;

export const VERIFY_EMAIL_CONFIRMED_RESPONSE = {
  message: 'Email verified.',
} as const;

export const PASSWORD_CHANGED_RESPONSE = {
  message: 'Password updated. Please sign in again.',
} as const;
