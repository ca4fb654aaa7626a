/**
 * backend/src/modules/auth/flows/verification/confirm-verification-flow.ts
 *
 * WHY:
 * - Consumes an email_verify token: marks the principal verified, then makes the
 *   token unusable.
 *
 * RULES:
 * - Standard validation order (codec -> purpose -> revocation).
 * - The token must also be the principal's CURRENT verification token. A token
 *   superseded by a newer one is REVOKED even if its revocation entry was lost.
 *   Cache unreachable here => fail closed (REVOKED).
 * - Unknown principal => INVALID_CREDENTIALS.
 * - Confirming an already-verified principal succeeds (idempotent flag).
 */

import { CacheUnavailableError } from '../../../../shared/errors/infra-errors';
import type { VerificationStore } from '../../../../shared/session/verification.store';
import type { CredentialStore } from '../../../users';

import { AuthErrors } from '../../auth.errors';
import type { AuthenticatedPrincipal } from '../../auth.types';
import { validateToken, type TokenValidationDeps } from '../../helpers/validate-token';

export type ConfirmVerificationParams = {
  token: string;
  requestId: string;
  now: Date;
};

export async function confirmVerificationFlow(
  deps: TokenValidationDeps & {
    verifications: VerificationStore;
    credentialStore: CredentialStore;
  },
  params: ConfirmVerificationParams,
): Promise<AuthenticatedPrincipal> {
  const token = await validateToken(deps, params.token, 'email_verify', params.now);

  let isCurrent: boolean;
  try {
    isCurrent = await deps.verifications.isCurrent(token.subject, token.nonce);
  } catch (err) {
    if (!(err instanceof CacheUnavailableError)) throw err;
    throw AuthErrors.revoked({ reason: 'verification_pointer_unavailable' });
  }

  if (!isCurrent) {
    deps.logger.warn({
      msg: 'auth.verification.superseded',
      flow: 'auth.verification.confirm',
      requestId: params.requestId,
      userId: token.subject,
    });
    throw AuthErrors.revoked({ reason: 'superseded' });
  }

  const updated = await deps.credentialStore.setVerified(token.subject);
  if (!updated) throw AuthErrors.invalidCredentials({ reason: 'unknown_principal' });

  await deps.revocations.revokeToken(token, params.now);
  await deps.verifications.clear(token.subject);

  deps.logger.info({
    msg: 'auth.verification.confirmed',
    flow: 'auth.verification.confirm',
    requestId: params.requestId,
    userId: token.subject,
  });

  return { principalId: token.subject };
}
