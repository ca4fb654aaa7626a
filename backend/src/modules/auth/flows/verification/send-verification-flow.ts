/**
 * backend/src/modules/auth/flows/verification/send-verification-flow.ts
 *
 * WHY:
 * - Issues the one outstanding email_verify token for a principal and hands it to
 *   the mail collaborator.
 *
 * ORDER:
 * 1. Issue token.
 * 2. Swap the verification pointer (atomic SET ... GET) -> previous pointer.
 * 3. Revoke the previous token's nonce (it is also no longer "current", so it
 *    fails confirmation even if this write is lost).
 * 4. Enqueue the mail.
 *
 * RULES:
 * - Cache failures in 2/3 propagate (CacheUnavailableError): no token was handed out.
 * - Mail failure is logged and does NOT roll back issuance; the user can request
 *   another email.
 * - The raw token goes only to the queue, never to logs.
 */

import type { Logger } from '../../../../shared/logger/logger';
import type { Queue } from '../../../../shared/messaging/queue';
import type { TokenCodec } from '../../../../shared/security/token-codec';
import type { RevocationStore } from '../../../../shared/session/revocation.store';
import type { VerificationStore } from '../../../../shared/session/verification.store';
import type { VerificationPointer } from '../../../../shared/session/revocation.types';
import type { Principal } from '../../../users';

export type SendVerificationDeps = {
  codec: TokenCodec;
  revocations: RevocationStore;
  verifications: VerificationStore;
  queue: Queue;
  logger: Logger;
};

export type SendVerificationParams = {
  principal: Pick<Principal, 'id' | 'email'>;
  requestId: string;
  now: Date;
};

export async function sendVerificationFlow(
  deps: SendVerificationDeps,
  params: SendVerificationParams,
): Promise<VerificationPointer> {
  const { principal, now } = params;

  const issued = deps.codec.issue(principal.id, 'email_verify', now);
  const pointer: VerificationPointer = { nonce: issued.nonce, expiresAt: issued.expiresAt };

  const previous = await deps.verifications.swapCurrent(
    principal.id,
    pointer,
    deps.codec.acceptedUntil(issued.expiresAt) - issued.issuedAt,
  );

  if (previous && previous.nonce !== pointer.nonce) {
    await deps.revocations.revokeToken(previous, now);
  }

  try {
    await deps.queue.enqueue({
      type: 'auth.verify-email',
      principalId: principal.id,
      email: principal.email,
      verifyToken: issued.token,
    });
  } catch (err) {
    deps.logger.error({
      msg: 'auth.verification.mail_failed',
      flow: 'auth.verification.send',
      requestId: params.requestId,
      userId: principal.id,
      error: err instanceof Error ? err.message : String(err),
    });
    return pointer;
  }

  deps.logger.info({
    msg: 'auth.verification.sent',
    flow: 'auth.verification.send',
    requestId: params.requestId,
    userId: principal.id,
    superseded: previous !== null,
  });

  return pointer;
}
