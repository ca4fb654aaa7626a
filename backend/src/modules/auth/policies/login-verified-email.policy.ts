/**
 * backend/src/modules/auth/policies/login-verified-email.policy.ts
 *
 * WHY:
 * - Deployments may require a confirmed email before login (REQUIRE_VERIFIED_EMAIL).
 * - Keep rule pure + unit-testable.
 *
 * RULE:
 * - Gate off → always allowed.
 * - Gate on + unverified principal → EMAIL_NOT_VERIFIED (still the uniform 401).
 */

import { AuthErrors } from '../auth.errors';

export type VerifiedEmailGatingFailure = {
  reason: 'email_not_verified';
  error: Error;
};

export function getLoginVerifiedEmailFailure(input: {
  requireVerifiedEmail: boolean;
  verified: boolean;
}): VerifiedEmailGatingFailure | null {
  if (input.requireVerifiedEmail && !input.verified) {
    return { reason: 'email_not_verified', error: AuthErrors.emailNotVerified() };
  }
  return null;
}
