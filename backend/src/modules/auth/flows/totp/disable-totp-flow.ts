/**
 * backend/src/modules/auth/flows/totp/disable-totp-flow.ts
 *
 * WHY:
 * - Turning off the authenticator is a sensitive change: it needs proof.
 *
 * RULES:
 * - Proof is the current password OR a currently valid TOTP code (either suffices).
 * - Neither supplied → VerificationRequired.
 * - OAuth-only identities have no password, so only the code can prove them.
 * - Wrong proof → InvalidCode ("invalid password or authenticator code").
 * - Success clears the secret and the flag, then sends a security notice.
 */

import type { Logger } from '../../../../shared/logger/logger';
import { enqueueSecurityNotice } from '../../../../shared/messaging/enqueue-notice';
import type { Queue } from '../../../../shared/messaging/queue';
import type { EncryptionService } from '../../../../shared/security/encryption';
import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { TotpService } from '../../../../shared/security/totp';
import type { IdentityStore } from '../../../identities';
import { TOTP_VERIFY_WINDOW } from '../../auth.constants';
import { AuthErrors } from '../../auth.errors';
import { requireIdentity } from '../../helpers/require-identity';

export type DisableTotpProof = {
  password?: string;
  totpCode?: string;
};

export async function disableTotpFlow(params: {
  deps: {
    identities: IdentityStore;
    queue: Queue;
    totp: TotpService;
    encryption: EncryptionService;
    passwordHasher: PasswordHasher;
    logger: Logger;
  };
  input: { identityId: number } & DisableTotpProof;
}): Promise<void> {
  const { deps, input } = params;

  const identity = await requireIdentity(deps.identities, input.identityId);
  if (!identity.totpEnabled) {
    throw AuthErrors.twoFactorNotEnabled('Authenticator app is not enabled.');
  }

  if (!input.password && !input.totpCode) throw AuthErrors.verificationRequired();

  if (identity.passwordHash === null && !input.totpCode) {
    throw AuthErrors.verificationRequired(
      'Accounts without a password must confirm with an authenticator code.',
    );
  }

  let verified = false;

  if (input.password && identity.passwordHash !== null) {
    verified = await deps.passwordHasher.verify(input.password, identity.passwordHash);
  }

  if (!verified && input.totpCode && identity.totpSecret !== null) {
    const secret = deps.encryption.decrypt(identity.totpSecret);
    verified = deps.totp.verify(secret, input.totpCode, { window: TOTP_VERIFY_WINDOW });
  }

  if (!verified) {
    deps.logger.info('auth.totp.disable_failed', {
      flow: 'auth.totp.disable',
      identityId: identity.id,
    });
    throw AuthErrors.verificationFailed();
  }

  await deps.identities.update(identity.id, { totpSecret: null, totpEnabled: false });

  deps.logger.info('auth.totp.disabled', { flow: 'auth.totp.disable', identityId: identity.id });

  await enqueueSecurityNotice(deps, {
    identityId: identity.id,
    email: identity.email,
    notice: 'totp_disabled',
  });
}
