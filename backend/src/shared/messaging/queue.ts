/**
 * src/shared/messaging/queue.ts
 *
 * WHY:
 * - Decouples "I need to send an email" from "here is how emails are sent".
 * - Auth service enqueues messages; the transport (SMTP, in-memory) is wired at the
 *   DI layer only. The service never changes when transport changes.
 *
 * RULES:
 * - Queue interface depends on nothing else in this codebase (shared → nothing).
 * - Message types are discriminated unions on the `type` field.
 * - Messages must be JSON-serializable.
 * - The raw verification token is allowed here: it travels to the email renderer so
 *   the link can be built. It is never stored or logged.
 * - Never put password hashes or access/refresh tokens in messages.
 */

// ── Message types ─────────────────────────────────────────────

export type VerifyEmailMessage = {
  type: 'auth.verify-email';
  principalId: string;
  email: string;
  /**
   * Raw email_verify token: goes into the email link only, never stored.
   */
  verifyToken: string;
};

// Union: add new message types as the system grows
export type QueueMessage = VerifyEmailMessage;

// ── Queue interface ───────────────────────────────────────────

export interface Queue {
  enqueue(message: QueueMessage): Promise<void>;
}
