/**
 * src/shared/messaging/enqueue-notice.ts
 *
 * WHY:
 * - Security notices ("your password was changed") are informational. The state
 *   change they describe has already been committed; a broken mail transport
 *   must not turn a successful password reset into an error.
 *
 * RULES:
 * - Only for informational messages. Messages the flow depends on (a two-factor
 *   code the user must type) are enqueued directly so failures propagate.
 * - Failures are logged with the message type and identity id only.
 */

import type { Logger } from '../logger/logger';
import type { Queue, SecurityNoticeKind } from './queue';

export async function enqueueSecurityNotice(
  deps: { queue: Queue; logger: Logger },
  input: { identityId: number; email: string; notice: SecurityNoticeKind },
): Promise<void> {
  try {
    await deps.queue.enqueue({
      type: 'auth.security-notice',
      identityId: input.identityId,
      email: input.email,
      notice: input.notice,
      occurredAt: new Date().toISOString(),
    });
  } catch (err) {
    deps.logger.warn('messaging.security_notice.enqueue_failed', {
      flow: 'messaging.security_notice',
      identityId: input.identityId,
      notice: input.notice,
      err,
    });
  }
}
