/**
 * backend/src/modules/auth/flows/email-verification/email-verification-flows.ts
 *
 * WHY:
 * - Two-factor setup requires a verified email; this is how an address gets there.
 *
 * RULES:
 * - send: already verified → no-op. The verification message is what the user
 *   asked for, so a dispatch failure propagates.
 * - verify: token must be a live, unrevoked email_verification token. It is
 *   single use. Verifying an already-verified identity succeeds.
 */

import type { Logger } from '../../../../shared/logger/logger';
import type { Queue } from '../../../../shared/messaging/queue';
import type { IdentityStore } from '../../../identities';
import { AuthErrors } from '../../auth.errors';
import { requireIdentity } from '../../helpers/require-identity';
import type { RevocationRegistry } from '../../tokens/revocation.registry';
import type { TokenService } from '../../tokens/token.service';

export async function sendEmailVerificationFlow(params: {
  deps: {
    identities: IdentityStore;
    tokens: TokenService;
    queue: Queue;
    logger: Logger;
    appBaseUrl: string;
  };
  input: { identityId: number };
}): Promise<void> {
  const { deps, input } = params;

  const identity = await requireIdentity(deps.identities, input.identityId);
  if (identity.emailVerified) {
    deps.logger.info('auth.email_verification.skipped', {
      flow: 'auth.email-verification.send',
      identityId: identity.id,
      reason: 'already_verified',
    });
    return;
  }

  const token = deps.tokens.issue('email_verification', { identityId: identity.id });
  const ttlSeconds = deps.tokens.defaultTtlSeconds('email_verification');

  await deps.queue.enqueue({
    type: 'auth.email-verification',
    identityId: identity.id,
    email: identity.email,
    username: identity.username,
    link: `${deps.appBaseUrl}/verify-email?token=${token}`,
    expiresInHours: Math.ceil(ttlSeconds / 3600),
  });

  deps.logger.info('auth.email_verification.sent', {
    flow: 'auth.email-verification.send',
    identityId: identity.id,
  });
}

export async function verifyEmailFlow(params: {
  deps: {
    identities: IdentityStore;
    tokens: TokenService;
    revocations: RevocationRegistry;
    logger: Logger;
  };
  input: { token: string };
}): Promise<void> {
  const { deps, input } = params;

  const claims = deps.tokens.validate(input.token, 'email_verification');
  if (await deps.revocations.isRevoked(input.token)) throw AuthErrors.invalidOrExpiredToken();

  const identity = await deps.identities.findById(claims.identityId);
  if (!identity) throw AuthErrors.invalidOrExpiredToken();

  if (!identity.emailVerified) {
    await deps.identities.update(identity.id, { emailVerified: true });
  }
  await deps.revocations.revoke(input.token);

  deps.logger.info('auth.email_verification.completed', {
    flow: 'auth.email-verification.verify',
    identityId: identity.id,
  });
}
