/**
 * backend/src/modules/auth/flows/password-reset/request-password-reset-flow.ts
 *
 * WHY:
 * - Deep module for the password-reset request use-case.
 * - Preserves anti-enumeration behavior.
 *
 * RULES:
 * - Always returns void, whatever happened.
 * - Unknown email, OAuth-only and inactive identities are silent (logged only).
 * - A mail transport failure is logged, never surfaced (it would reveal that
 *   the address exists).
 */

import type { Logger } from '../../../../shared/logger/logger';
import type { Queue } from '../../../../shared/messaging/queue';
import type { IdentityStore } from '../../../identities';
import { emailDomain } from '../../helpers/email-domain';
import type { TokenService } from '../../tokens/token.service';

export async function requestPasswordResetFlow(params: {
  deps: {
    identities: IdentityStore;
    tokens: TokenService;
    queue: Queue;
    logger: Logger;
    appBaseUrl: string;
  };
  input: { email: string };
}): Promise<void> {
  const { deps, input } = params;
  const email = input.email.trim().toLowerCase();

  const identity = await deps.identities.findByEmail(email);
  if (!identity || identity.passwordHash === null || !identity.isActive) {
    deps.logger.info('auth.password_reset.skipped', {
      flow: 'auth.password-reset.request',
      emailDomain: emailDomain(email),
      reason: !identity ? 'not_found' : identity.passwordHash === null ? 'oauth_only' : 'inactive',
    });
    return;
  }

  const ttlSeconds = deps.tokens.defaultTtlSeconds('password_reset');
  const token = deps.tokens.issue('password_reset', { identityId: identity.id });

  try {
    await deps.queue.enqueue({
      type: 'auth.password-reset',
      identityId: identity.id,
      email: identity.email,
      username: identity.username,
      link: `${deps.appBaseUrl}/reset-password?token=${token}`,
      expiresInMinutes: Math.ceil(ttlSeconds / 60),
    });
  } catch (err) {
    deps.logger.error('auth.password_reset.enqueue_failed', {
      flow: 'auth.password-reset.request',
      identityId: identity.id,
      err,
    });
    return;
  }

  deps.logger.info('auth.password_reset.requested', {
    flow: 'auth.password-reset.request',
    identityId: identity.id,
  });
}
