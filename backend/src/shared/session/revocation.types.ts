/**
 * src/shared/session/revocation.types.ts
 *
 * WHY:
 * - Cache key layout for token revocation and verification-token staging,
 *   single-sourced so stores and tests agree.
 */

import type { TokenPurpose } from '../security/token-codec';

export const REVOKED_NONCE_PREFIX = 'revoked:jti';
export const REVOKED_SUBJECT_PREFIX = 'revoked:sub';
export const VERIFY_CURRENT_PREFIX = 'verify:current';

/** The fields of a verified token that revocation decisions need. */
export type RevocableToken = Readonly<{
  subject: string;
  purpose: TokenPurpose;
  nonce: string;
  issuedAtMs: number;
  expiresAt: number;
}>;

/** Outstanding email_verify token for a principal (nonce + expiry, never the raw token). */
export type VerificationPointer = Readonly<{
  nonce: string;
  expiresAt: number;
}>;
