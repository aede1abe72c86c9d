/**
 * backend/src/modules/auth/flows/password-reset/reset-password-flow.ts
 *
 * WHY:
 * - Deep module for consuming a password reset token and setting a new password.
 *
 * RULES:
 * - Token must be a live, unrevoked password_reset token; anything else is
 *   InvalidOrExpiredToken.
 * - The password policy runs BEFORE the token is consumed, so a rejected
 *   password does not burn the link.
 * - Token is one-time use: it is claimed (atomic SET NX on its revocation
 *   marker) before the password changes. Of two concurrent resets with the
 *   same link, only the claim winner writes; the other gets InvalidOrExpiredToken.
 * - Every session of the identity is dropped. No auto-login after reset.
 */

import type { Logger } from '../../../../shared/logger/logger';
import { enqueueSecurityNotice } from '../../../../shared/messaging/enqueue-notice';
import type { Queue } from '../../../../shared/messaging/queue';
import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { SessionRegistry } from '../../../../shared/session/session.registry';
import type { IdentityStore } from '../../../identities';
import { AuthErrors } from '../../auth.errors';
import { assertPasswordAllowed } from '../../policies/password.policy';
import type { RevocationRegistry } from '../../tokens/revocation.registry';
import type { TokenService } from '../../tokens/token.service';

export async function resetPasswordFlow(params: {
  deps: {
    identities: IdentityStore;
    tokens: TokenService;
    revocations: RevocationRegistry;
    passwordHasher: PasswordHasher;
    sessions: SessionRegistry;
    queue: Queue;
    logger: Logger;
  };
  input: { token: string; newPassword: string };
}): Promise<void> {
  const { deps, input } = params;

  const claims = deps.tokens.validate(input.token, 'password_reset');
  if (await deps.revocations.isRevoked(input.token)) throw AuthErrors.invalidOrExpiredToken();

  const identity = await deps.identities.findById(claims.identityId);
  if (!identity) throw AuthErrors.invalidOrExpiredToken();
  if (identity.passwordHash === null) throw AuthErrors.oauthOnlyAccount();

  assertPasswordAllowed(input.newPassword);

  if (!(await deps.revocations.claim(input.token))) throw AuthErrors.invalidOrExpiredToken();

  const passwordHash = await deps.passwordHasher.hash(input.newPassword);
  await deps.identities.update(identity.id, { passwordHash });

  const revokedSessions = await deps.sessions.revokeAll(identity.id);

  deps.logger.info('auth.password_reset.completed', {
    flow: 'auth.password-reset',
    identityId: identity.id,
    revokedSessions,
  });

  await enqueueSecurityNotice(deps, {
    identityId: identity.id,
    email: identity.email,
    notice: 'password_reset',
  });
}
