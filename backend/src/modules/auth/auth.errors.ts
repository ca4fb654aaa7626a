/**
 * src/modules/auth/auth.errors.ts
 *
 * WHY:
 * - Auth module owns its domain-specific error semantics.
 * - Security-safe: every authentication failure reaches the client as the same
 *   401 "Authentication failed." The precise kind travels in `kind` / meta for logs only.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords, tokens, or hashes in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';
import type { TokenError } from '../../shared/security/token-codec';

export const AUTH_FAILURE_KINDS = [
  'INVALID_CREDENTIALS',
  'MALFORMED_TOKEN',
  'SIGNATURE_INVALID',
  'EXPIRED',
  'REVOKED',
  'WRONG_PURPOSE',
  'EMAIL_NOT_VERIFIED',
] as const;

export type AuthFailureKind = (typeof AUTH_FAILURE_KINDS)[number];

export const AUTH_FAILURE_MESSAGE = 'Authentication failed.';

export class AuthFailureError extends AppError {
  readonly kind: AuthFailureKind;

  constructor(kind: AuthFailureKind, meta?: AppErrorMeta) {
    super({
      code: 'UNAUTHORIZED',
      status: 401,
      message: AUTH_FAILURE_MESSAGE,
      meta: { ...meta, kind },
    });
    this.name = 'AuthFailureError';
    this.kind = kind;
  }
}

export const AuthErrors = {
  /** Login: unknown email or wrong password. Intentionally indistinguishable. */
  invalidCredentials(meta?: AppErrorMeta) {
    return new AuthFailureError('INVALID_CREDENTIALS', meta);
  },

  fromTokenError(err: TokenError) {
    switch (err.kind) {
      case 'MALFORMED':
        return new AuthFailureError('MALFORMED_TOKEN', { reason: err.message });
      case 'SIGNATURE_INVALID':
        return new AuthFailureError('SIGNATURE_INVALID', { reason: err.message });
      case 'EXPIRED':
        return new AuthFailureError('EXPIRED');
    }
  },

  revoked(meta?: AppErrorMeta) {
    return new AuthFailureError('REVOKED', meta);
  },

  wrongPurpose(meta?: AppErrorMeta) {
    return new AuthFailureError('WRONG_PURPOSE', meta);
  },

  emailNotVerified(meta?: AppErrorMeta) {
    return new AuthFailureError('EMAIL_NOT_VERIFIED', meta);
  },

  /** Registration: the normalized email already belongs to a principal. */
  emailTaken(meta?: AppErrorMeta) {
    return AppError.conflict('This email is already registered. Please sign in.', meta);
  },
} as const;
