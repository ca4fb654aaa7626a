/**
 * backend/src/modules/auth/flows/register/execute-register-flow.ts
 *
 * WHY:
 * - "Flow" = deep module for one end-to-end use-case (Ousterhout).
 * - Creates an unverified principal and sends the first verification email.
 *
 * RULES:
 * - Per-address limit first (every attempt counts), before any store work.
 * - Duplicate email -> 409, whether caught by the lookup or by the unique
 *   constraint (concurrent registrations).
 * - The principal exists once save() returns. If the cache is down when the
 *   verification token is staged, registration still succeeds; the user asks for
 *   a new email later (requestVerificationEmail).
 */

import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { TokenHasher } from '../../../../shared/security/token-hasher';
import { ThrottledError, type RateLimiter } from '../../../../shared/security/rate-limit';
import { CacheUnavailableError } from '../../../../shared/errors/infra-errors';
import {
  DuplicateEmailError,
  toProfile,
  type CredentialStore,
  type Principal,
  type PrincipalProfile,
} from '../../../users';

import { AuthErrors } from '../../auth.errors';
import { emailDomain, normalizeEmail } from '../../helpers/email';
import {
  sendVerificationFlow,
  type SendVerificationDeps,
} from '../verification/send-verification-flow';

export type RegisterParams = {
  email: string;
  password: string;
  ip: string;
  requestId: string;
  now: Date;
};

export async function executeRegisterFlow(
  deps: SendVerificationDeps & {
    credentialStore: CredentialStore;
    passwordHasher: PasswordHasher;
    tokenHasher: TokenHasher;
    registerLimiter: RateLimiter;
  },
  params: RegisterParams,
): Promise<PrincipalProfile> {
  const email = normalizeEmail(params.email);
  const emailKey = deps.tokenHasher.hash(email);

  deps.logger.info({
    msg: 'auth.register.start',
    flow: 'auth.register',
    requestId: params.requestId,
    emailDomain: emailDomain(email),
    emailKey,
  });

  const decision = await deps.registerLimiter.hit(params.ip);
  if (decision.status === 'throttled') throw new ThrottledError(decision.retryAfterSeconds);

  const existing = await deps.credentialStore.findByEmail(email);
  if (existing) throw AuthErrors.emailTaken();

  const passwordHash = await deps.passwordHasher.hash(params.password);

  let principal: Principal;
  try {
    principal = await deps.credentialStore.save({ email, passwordHash });
  } catch (err) {
    if (err instanceof DuplicateEmailError) throw AuthErrors.emailTaken();
    throw err;
  }

  try {
    await sendVerificationFlow(deps, { principal, requestId: params.requestId, now: params.now });
  } catch (err) {
    if (!(err instanceof CacheUnavailableError)) throw err;

    deps.logger.warn({
      msg: 'auth.register.verification_deferred',
      flow: 'auth.register',
      requestId: params.requestId,
      userId: principal.id,
      error: err.message,
    });
  }

  deps.logger.info({
    msg: 'auth.register.success',
    flow: 'auth.register',
    requestId: params.requestId,
    userId: principal.id,
  });

  return toProfile(principal);
}
