/**
 * backend/src/modules/auth/flows/login/execute-login-flow.ts
 *
 * WHY:
 * - "Flow" = deep module for one end-to-end use-case (Ousterhout).
 * - Keeps AuthService thin while isolating the login orchestration.
 *
 * ORDER (each step only runs if the previous one passed):
 * 1. Throttle check on both axes (account, address) -> ThrottledError (429).
 *    Runs before the credential store is touched.
 * 2. Find principal by normalized email (StoreUnavailableError surfaces as 503).
 * 3. Unknown email or wrong password -> record failure on both axes -> INVALID_CREDENTIALS.
 * 4. Optional verified-email gate.
 * 5. Success -> clear the account counter, issue access + refresh tokens.
 *
 * RULES:
 * - No HTTP concerns here.
 * - Never log raw emails, passwords or tokens (emailDomain + emailKey only).
 */

import type { TokenHasher } from '../../../../shared/security/token-hasher';
import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { Logger } from '../../../../shared/logger/logger';
import type { TokenCodec } from '../../../../shared/security/token-codec';
import { ThrottledError } from '../../../../shared/security/rate-limit';
import type { CredentialStore } from '../../../users';

import { AuthErrors } from '../../auth.errors';
import type { TokenPair } from '../../auth.types';
import { emailDomain, normalizeEmail } from '../../helpers/email';
import { issueTokenPair } from '../../helpers/issue-token-pair';
import type { LoginThrottle } from '../../helpers/login-throttle';
import { getLoginVerifiedEmailFailure } from '../../policies/login-verified-email.policy';

export type LoginParams = {
  email: string;
  password: string;
  ip: string;
  requestId: string;
  now: Date;
};

export async function executeLoginFlow(
  deps: {
    credentialStore: CredentialStore;
    passwordHasher: PasswordHasher;
    tokenHasher: TokenHasher;
    throttle: LoginThrottle;
    codec: TokenCodec;
    logger: Logger;
    requireVerifiedEmail: boolean;
  },
  params: LoginParams,
): Promise<TokenPair> {
  const email = normalizeEmail(params.email);
  const emailKey = deps.tokenHasher.hash(email);
  const keys = { emailKey, ip: params.ip };

  deps.logger.info({
    msg: 'auth.login.start',
    flow: 'auth.login',
    requestId: params.requestId,
    emailDomain: emailDomain(email),
    emailKey,
  });

  const decision = await deps.throttle.check(keys);
  if (decision.status === 'throttled') {
    deps.logger.warn({
      msg: 'auth.login.throttled',
      flow: 'auth.login',
      requestId: params.requestId,
      emailKey,
      retryAfterSeconds: decision.retryAfterSeconds,
    });
    throw new ThrottledError(decision.retryAfterSeconds);
  }

  const principal = await deps.credentialStore.findByEmail(email);
  const passwordValid = principal
    ? await deps.passwordHasher.verify(params.password, principal.passwordHash)
    : false;

  if (!principal || !passwordValid) {
    await deps.throttle.recordFailure(keys);

    deps.logger.warn({
      msg: 'auth.login.failed',
      flow: 'auth.login',
      requestId: params.requestId,
      emailKey,
      reason: principal ? 'wrong_password' : 'user_not_found',
    });
    throw AuthErrors.invalidCredentials();
  }

  const gatingFailure = getLoginVerifiedEmailFailure({
    requireVerifiedEmail: deps.requireVerifiedEmail,
    verified: principal.verified,
  });
  if (gatingFailure) {
    deps.logger.warn({
      msg: 'auth.login.failed',
      flow: 'auth.login',
      requestId: params.requestId,
      userId: principal.id,
      reason: gatingFailure.reason,
    });
    throw gatingFailure.error;
  }

  await deps.throttle.recordSuccess(keys);

  const pair = issueTokenPair(deps.codec, principal.id, params.now);

  deps.logger.info({
    msg: 'auth.login.success',
    flow: 'auth.login',
    requestId: params.requestId,
    userId: principal.id,
  });

  return pair;
}
