/**
 * backend/src/modules/auth/flows/change-password/change-password-flow.ts
 *
 * WHY:
 * - An authenticated principal replaces their password by proving the current one.
 * - Every refresh and access token issued up to now is revoked in bulk
 *   (revoked:sub:{principalId}:{purpose}), so other devices are signed out.
 *
 * RULES:
 * - Wrong current password -> INVALID_CREDENTIALS.
 * - The marker is the change time in milliseconds (iat_ms <= now): a login right after
 *   the change gets tokens that work, even within the same second.
 * - No new tokens are returned.
 */

import type { Logger } from '../../../../shared/logger/logger';
import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { TokenCodec } from '../../../../shared/security/token-codec';
import type { RevocationStore } from '../../../../shared/session/revocation.store';
import type { CredentialStore } from '../../../users';

import { AuthErrors } from '../../auth.errors';

export type ChangePasswordParams = {
  principalId: string;
  currentPassword: string;
  newPassword: string;
  requestId: string;
  now: Date;
};

export async function changePasswordFlow(
  deps: {
    credentialStore: CredentialStore;
    passwordHasher: PasswordHasher;
    codec: TokenCodec;
    revocations: RevocationStore;
    logger: Logger;
  },
  params: ChangePasswordParams,
): Promise<void> {
  const principal = await deps.credentialStore.findById(params.principalId);
  if (!principal) throw AuthErrors.invalidCredentials({ reason: 'unknown_principal' });

  const valid = await deps.passwordHasher.verify(params.currentPassword, principal.passwordHash);
  if (!valid) {
    deps.logger.warn({
      msg: 'auth.password.change_failed',
      flow: 'auth.password.change',
      requestId: params.requestId,
      userId: principal.id,
      reason: 'wrong_password',
    });
    throw AuthErrors.invalidCredentials();
  }

  const passwordHash = await deps.passwordHasher.hash(params.newPassword);
  const updated = await deps.credentialStore.updatePasswordHash(principal.id, passwordHash);
  if (!updated) throw AuthErrors.invalidCredentials({ reason: 'unknown_principal' });

  await Promise.all([
    deps.revocations.revokeSubject(
      principal.id,
      'refresh',
      params.now,
      deps.codec.lifetimeOf('refresh'),
    ),
    deps.revocations.revokeSubject(
      principal.id,
      'access',
      params.now,
      deps.codec.lifetimeOf('access'),
    ),
  ]);

  deps.logger.info({
    msg: 'auth.password.changed',
    flow: 'auth.password.change',
    requestId: params.requestId,
    userId: principal.id,
  });
}
