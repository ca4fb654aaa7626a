/**
 * backend/src/modules/auth/flows/logout/execute-logout-flow.ts
 *
 * WHY:
 * - Logout revokes the presented refresh token for the rest of its lifetime.
 *
 * RULES:
 * - Idempotent: a token that is malformed, badly signed, expired, already revoked
 *   or not a refresh token leaves nothing to revoke, so logout succeeds as a no-op.
 * - Cache failure while reading or writing the revocation entry propagates
 *   (CacheUnavailableError -> 503) so the client knows to retry.
 */

import type { Logger } from '../../../../shared/logger/logger';
import { TokenError, type TokenCodec, type VerifiedToken } from '../../../../shared/security/token-codec';
import type { RevocationStore } from '../../../../shared/session/revocation.store';

export type LogoutParams = {
  refreshToken: string;
  requestId: string;
  now: Date;
};

export type LogoutOutcome = 'revoked' | 'noop';

export async function executeLogoutFlow(
  deps: { codec: TokenCodec; revocations: RevocationStore; logger: Logger },
  params: LogoutParams,
): Promise<LogoutOutcome> {
  const noop = (reason: string): LogoutOutcome => {
    deps.logger.info({
      msg: 'auth.logout.noop',
      flow: 'auth.logout',
      requestId: params.requestId,
      reason,
    });
    return 'noop';
  };

  let token: VerifiedToken;
  try {
    token = deps.codec.verify(params.refreshToken, params.now);
  } catch (err) {
    if (err instanceof TokenError) return noop(err.kind);
    throw err;
  }

  if (token.purpose !== 'refresh') return noop('wrong_purpose');
  if (await deps.revocations.isRevoked(token)) return noop('already_revoked');

  await deps.revocations.revokeToken(token, params.now);

  deps.logger.info({
    msg: 'auth.logout.success',
    flow: 'auth.logout',
    requestId: params.requestId,
    userId: token.subject,
  });

  return 'revoked';
}
