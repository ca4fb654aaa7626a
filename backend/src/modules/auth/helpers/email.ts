/**
 * backend/src/modules/auth/helpers/email.ts
 *
 * WHY:
 * - One normalization for every read and write of an email (store lookups,
 *   rate-limit keys, uniqueness).
 * - emailDomain() is used for PII-minimized logging.
 *
 * RULES:
 * - Pure functions.
 * - Never throw.
 */

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export function emailDomain(email: string): string {
  const at = email.lastIndexOf('@');
  return at >= 0 ? email.slice(at + 1) : '';
}
