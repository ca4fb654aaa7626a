/**
 * backend/src/modules/auth/flows/refresh/execute-refresh-flow.ts
 *
 * WHY:
 * - Exchanges a valid refresh token for a new access token.
 * - With rotation on (REFRESH_TOKEN_ROTATION), the presented refresh token is
 *   revoked and a new one is returned: a stolen refresh token works at most once.
 *
 * RULES:
 * - Standard validation order (codec -> purpose -> revocation, fail closed).
 * - Rotation claims the presented token (atomic swap on revoked:jti:{nonce}) BEFORE
 *   issuing. Of concurrent refreshes with one token, only the claimant gets tokens;
 *   the others fail as REVOKED. A cache failure leaves the old token usable and the
 *   client simply retries.
 */

import type { TokenCodec } from '../../../../shared/security/token-codec';
import { TOKEN_TYPE } from '../../auth.constants';
import { AuthErrors } from '../../auth.errors';
import type { RefreshResult } from '../../auth.types';
import { validateToken, type TokenValidationDeps } from '../../helpers/validate-token';

export type RefreshParams = {
  refreshToken: string;
  requestId: string;
  now: Date;
};

export async function executeRefreshFlow(
  deps: TokenValidationDeps & { codec: TokenCodec; rotateRefreshTokens: boolean },
  params: RefreshParams,
): Promise<RefreshResult> {
  const token = await validateToken(deps, params.refreshToken, 'refresh', params.now);

  if (deps.rotateRefreshTokens) {
    const claimed = await deps.revocations.claimToken(token, params.now);
    if (!claimed) throw AuthErrors.revoked({ reason: 'already_rotated' });
  }

  const result: RefreshResult = {
    accessToken: deps.codec.issue(token.subject, 'access', params.now).token,
    tokenType: TOKEN_TYPE,
  };
  if (deps.rotateRefreshTokens) {
    result.refreshToken = deps.codec.issue(token.subject, 'refresh', params.now).token;
  }

  deps.logger.info({
    msg: 'auth.refresh.success',
    flow: 'auth.refresh',
    requestId: params.requestId,
    userId: token.subject,
    rotated: deps.rotateRefreshTokens,
  });

  return result;
}
