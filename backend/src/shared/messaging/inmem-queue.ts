/**
 * src/shared/messaging/inmem-queue.ts
 *
 * WHY:
 * - Tests need to inspect what messages the service enqueued without running
 *   real email infrastructure.
 * - drain() is the test contract: call it after the request completes
 *   to get all enqueued messages, then assert on their contents.
 * - Local dev without SMTP_HOST also uses it (di.ts logs a warning).
 *
 * RULES:
 * - Implements Queue interface only: no extra methods visible to services.
 * - drain() is only used by test helpers; production code never calls it.
 */

import type { Logger } from '../logger/logger';
import type { Queue, QueueMessage } from './queue';

export class InMemQueue implements Queue {
  private readonly messages: QueueMessage[] = [];

  /** With a logger, each message is logged by type and principal (never the token). */
  constructor(private readonly logger?: Logger) {}

  enqueue(message: QueueMessage): Promise<void> {
    this.messages.push(message);
    this.logger?.info('queue.inmem.enqueued', {
      flow: 'messaging',
      type: message.type,
      principalId: message.principalId,
    });
    return Promise.resolve();
  }

  /**
   * Returns all enqueued messages and clears the queue.
   */
  drain(): QueueMessage[] {
    return this.messages.splice(0, this.messages.length);
  }
}
