/**
 * backend/src/modules/auth/helpers/validate-token.ts
 *
 * WHY:
 * - Every token-consuming operation (authenticate, refresh, confirm verification)
 *   validates the same way, in the same order:
 *     1. codec: signature, claim shape, expiry
 *     2. purpose must match the operation
 *     3. revocation (nonce, then subject+purpose)
 *
 * RULES:
 * - Failures are AuthFailureError (uniform 401 at the edge).
 * - Cache unreachable during the revocation check => fail CLOSED (REVOKED).
 *   A token we cannot prove is live is not accepted.
 */

import type { Logger } from '../../../shared/logger/logger';
import { CacheUnavailableError } from '../../../shared/errors/infra-errors';
import {
  TokenError,
  type TokenCodec,
  type TokenPurpose,
  type VerifiedToken,
} from '../../../shared/security/token-codec';
import type { RevocationStore } from '../../../shared/session/revocation.store';
import { AuthErrors } from '../auth.errors';

export type TokenValidationDeps = {
  codec: TokenCodec;
  revocations: RevocationStore;
  logger: Logger;
};

export function decodeToken(codec: TokenCodec, raw: string, now: Date): VerifiedToken {
  try {
    return codec.verify(raw, now);
  } catch (err) {
    if (err instanceof TokenError) throw AuthErrors.fromTokenError(err);
    throw err;
  }
}

export async function validateToken(
  deps: TokenValidationDeps,
  raw: string,
  expectedPurpose: TokenPurpose,
  now: Date,
): Promise<VerifiedToken> {
  const token = decodeToken(deps.codec, raw, now);

  if (token.purpose !== expectedPurpose) {
    throw AuthErrors.wrongPurpose({ expected: expectedPurpose, actual: token.purpose });
  }

  let revoked: boolean;
  try {
    revoked = await deps.revocations.isRevoked(token);
  } catch (err) {
    if (!(err instanceof CacheUnavailableError)) throw err;

    deps.logger.warn({
      msg: 'auth.token.revocation_check_unavailable',
      flow: 'auth.token',
      purpose: token.purpose,
      policy: 'fail_closed',
      error: err.message,
    });
    throw AuthErrors.revoked({ reason: 'revocation_check_unavailable' });
  }

  if (revoked) throw AuthErrors.revoked();

  return token;
}
