/**
 * src/shared/messaging/inmem-queue.ts
 *
 * WHY:
 * - Tests need to inspect what messages a flow enqueued without running
 *   real email infrastructure.
 * - drain() is the test contract: call it after the flow completes
 *   to get all enqueued messages, then assert on their contents.
 * - Production: di.ts swaps this for a real transport adapter without
 *   touching any flow code.
 *
 * RULES:
 * - Implements Queue interface only; no extra methods visible to services.
 * - drain()/drainOfType() are only used by tests and local dev.
 */

import type { Queue, QueueMessage, QueueMessageType } from './queue';

export class InMemQueue implements Queue {
  private readonly messages: QueueMessage[] = [];

  enqueue(message: QueueMessage): Promise<void> {
    this.messages.push(message);
    return Promise.resolve();
  }

  /** Returns all enqueued messages and clears the queue. */
  drain(): QueueMessage[] {
    return this.messages.splice(0, this.messages.length);
  }

  /**
   * Returns (and removes) only messages of one type, narrowed:
   * const [reset] = queue.drainOfType('auth.password-reset');
   */
  drainOfType<K extends QueueMessageType>(type: K): Extract<QueueMessage, { type: K }>[] {
    const matched: Extract<QueueMessage, { type: K }>[] = [];
    const rest: QueueMessage[] = [];

    for (const message of this.messages) {
      if (isOfType(message, type)) matched.push(message);
      else rest.push(message);
    }

    this.messages.splice(0, this.messages.length, ...rest);
    return matched;
  }
}

function isOfType<K extends QueueMessageType>(
  message: QueueMessage,
  type: K,
): message is Extract<QueueMessage, { type: K }> {
  return message.type === type;
}
