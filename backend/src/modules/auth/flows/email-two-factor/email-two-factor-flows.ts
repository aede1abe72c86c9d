/**
 * backend/src/modules/auth/flows/email-two-factor/email-two-factor-flows.ts
 *
 * WHY:
 * - Email two-factor is a flag on the identity: no secret to stage, so
 *   enable and disable are single-step.
 *
 * RULES:
 * - Enable requires a verified email and is a conflict when already on.
 * - Disable requires the current password; OAuth-only identities are refused
 *   (they have no password to prove themselves with).
 * - Both send a security notice; notice failures never undo the change.
 */

import type { Logger } from '../../../../shared/logger/logger';
import { enqueueSecurityNotice } from '../../../../shared/messaging/enqueue-notice';
import type { Queue } from '../../../../shared/messaging/queue';
import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { IdentityStore } from '../../../identities';
import { AuthErrors } from '../../auth.errors';
import { requireIdentity } from '../../helpers/require-identity';
import { assertTwoFactorEnableAllowed } from '../../policies/two-factor.policy';

type EmailTwoFactorDeps = {
  identities: IdentityStore;
  queue: Queue;
  logger: Logger;
};

export async function enableEmailTwoFactorFlow(params: {
  deps: EmailTwoFactorDeps;
  input: { identityId: number };
}): Promise<void> {
  const { deps, input } = params;

  const identity = await requireIdentity(deps.identities, input.identityId);
  assertTwoFactorEnableAllowed(identity, 'email');

  await deps.identities.update(identity.id, { twoFaEnabled: true });

  deps.logger.info('auth.email_2fa.enabled', {
    flow: 'auth.email_2fa.enable',
    identityId: identity.id,
  });

  await enqueueSecurityNotice(deps, {
    identityId: identity.id,
    email: identity.email,
    notice: 'email_two_factor_enabled',
  });
}

export async function disableEmailTwoFactorFlow(params: {
  deps: EmailTwoFactorDeps & { passwordHasher: PasswordHasher };
  input: { identityId: number; password: string };
}): Promise<void> {
  const { deps, input } = params;

  const identity = await requireIdentity(deps.identities, input.identityId);
  if (!identity.twoFaEnabled) {
    throw AuthErrors.twoFactorNotEnabled('Email two-factor authentication is not enabled.');
  }
  if (identity.passwordHash === null) throw AuthErrors.oauthOnlyAccount();

  const ok = await deps.passwordHasher.verify(input.password, identity.passwordHash);
  if (!ok) throw AuthErrors.verificationFailed('Incorrect password.');

  await deps.identities.update(identity.id, { twoFaEnabled: false });

  deps.logger.info('auth.email_2fa.disabled', {
    flow: 'auth.email_2fa.disable',
    identityId: identity.id,
  });

  await enqueueSecurityNotice(deps, {
    identityId: identity.id,
    email: identity.email,
    notice: 'email_two_factor_disabled',
  });
}
