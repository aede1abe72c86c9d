import { describe, it, expect, afterEach, vi } from 'vitest';
import { logger } from '../../../../src/shared/logger/logger';
import { enqueueSecurityNotice } from '../../../../src/shared/messaging/enqueue-notice';
import { InMemQueue } from '../../../../src/shared/messaging/inmem-queue';
import type { Queue } from '../../../../src/shared/messaging/queue';
import { freezeClock, isoAt } from '../../../helpers/clock';

describe('enqueueSecurityNotice', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('enqueues a timestamped notice', async () => {
    freezeClock();
    const queue = new InMemQueue();

    await enqueueSecurityNotice(
      { queue, logger },
      { identityId: 3, email: 'a@example.com', notice: 'password_changed' },
    );

    expect(queue.drain()).toEqual([
      {
        type: 'auth.security-notice',
        identityId: 3,
        email: 'a@example.com',
        notice: 'password_changed',
        occurredAt: isoAt(0),
      },
    ]);
  });

  it('logs and swallows transport failures', async () => {
    const warn = vi.spyOn(logger, 'warn');
    const queue: Queue = { enqueue: () => Promise.reject(new Error('smtp down')) };

    await expect(
      enqueueSecurityNotice(
        { queue, logger },
        { identityId: 3, email: 'a@example.com', notice: 'totp_disabled' },
      ),
    ).resolves.toBeUndefined();

    expect(warn).toHaveBeenCalledWith(
      'messaging.security_notice.enqueue_failed',
      expect.objectContaining({ identityId: 3, notice: 'totp_disabled' }),
    );
  });
});
