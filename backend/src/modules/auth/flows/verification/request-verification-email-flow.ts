/**
 * backend/src/modules/auth/flows/verification/request-verification-email-flow.ts
 *
 * WHY:
 * - "Resend verification email" by address, without a session.
 * - Anti-enumeration: the caller gets the same response whether the email is
 *   unknown, already verified, rate limited, or a mail was actually sent.
 *
 * RULES:
 * - Silent per-email limit (every attempt counts).
 * - Infra failures (store/cache) still surface as 503: that says nothing about the email.
 */

import type { TokenHasher } from '../../../../shared/security/token-hasher';
import type { RateLimiter } from '../../../../shared/security/rate-limit';
import type { CredentialStore } from '../../../users';

import { normalizeEmail } from '../../helpers/email';
import { sendVerificationFlow, type SendVerificationDeps } from './send-verification-flow';

export type RequestVerificationEmailParams = {
  email: string;
  requestId: string;
  now: Date;
};

export type RequestVerificationEmailOutcome =
  | 'sent'
  | 'rate_limited'
  | 'user_not_found'
  | 'already_verified';

export async function requestVerificationEmailFlow(
  deps: SendVerificationDeps & {
    credentialStore: CredentialStore;
    tokenHasher: TokenHasher;
    requestLimiter: RateLimiter;
  },
  params: RequestVerificationEmailParams,
): Promise<RequestVerificationEmailOutcome> {
  const email = normalizeEmail(params.email);
  const emailKey = deps.tokenHasher.hash(email);

  const outcome = await (async (): Promise<RequestVerificationEmailOutcome> => {
    const decision = await deps.requestLimiter.hit(emailKey);
    if (decision.status === 'throttled') return 'rate_limited';

    const principal = await deps.credentialStore.findByEmail(email);
    if (!principal) return 'user_not_found';
    if (principal.verified) return 'already_verified';

    await sendVerificationFlow(deps, { principal, requestId: params.requestId, now: params.now });
    return 'sent';
  })();

  deps.logger.info({
    msg: 'auth.verification.requested',
    flow: 'auth.verification.request',
    requestId: params.requestId,
    emailKey,
    outcome,
  });

  return outcome;
}
