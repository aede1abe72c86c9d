/**
 * backend/src/modules/auth/flows/password/change-password-flow.ts
 *
 * RULES:
 * - OAuth-only identities have no password to change.
 * - Current password must match (InvalidCredentials otherwise); the new one
 *   must differ from it and pass the password policy.
 * - Other sessions are dropped; the caller's own session survives when its
 *   access token is passed as keepToken.
 */

import type { Logger } from '../../../../shared/logger/logger';
import { enqueueSecurityNotice } from '../../../../shared/messaging/enqueue-notice';
import type { Queue } from '../../../../shared/messaging/queue';
import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { SessionRegistry } from '../../../../shared/session/session.registry';
import type { IdentityStore } from '../../../identities';
import { AuthErrors } from '../../auth.errors';
import { requireIdentity } from '../../helpers/require-identity';
import { assertPasswordAllowed } from '../../policies/password.policy';

export async function changePasswordFlow(params: {
  deps: {
    identities: IdentityStore;
    passwordHasher: PasswordHasher;
    sessions: SessionRegistry;
    queue: Queue;
    logger: Logger;
  };
  input: {
    identityId: number;
    currentPassword: string;
    newPassword: string;
    keepToken?: string;
  };
}): Promise<void> {
  const { deps, input } = params;

  const identity = await requireIdentity(deps.identities, input.identityId);
  if (identity.passwordHash === null) throw AuthErrors.oauthOnlyAccount();

  const ok = await deps.passwordHasher.verify(input.currentPassword, identity.passwordHash);
  if (!ok) throw AuthErrors.invalidCredentials();

  if (input.newPassword === input.currentPassword) {
    throw AuthErrors.weakPassword('New password must be different from the current password.');
  }
  assertPasswordAllowed(input.newPassword);

  const passwordHash = await deps.passwordHasher.hash(input.newPassword);
  await deps.identities.update(identity.id, { passwordHash });

  const revokedSessions = await deps.sessions.revokeAll(identity.id, input.keepToken);

  deps.logger.info('auth.password.changed', {
    flow: 'auth.password.change',
    identityId: identity.id,
    revokedSessions,
  });

  await enqueueSecurityNotice(deps, {
    identityId: identity.id,
    email: identity.email,
    notice: 'password_changed',
  });
}
