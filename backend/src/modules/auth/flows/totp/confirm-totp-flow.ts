/**
 * backend/src/modules/auth/flows/totp/confirm-totp-flow.ts
 *
 * WHY:
 * - Phase 2 of authenticator setup. Only a code generated from the staged
 *   secret proves the user actually captured it; only then is TOTP switched on.
 *
 * RULES:
 * - No staged secret → NoSetupInProgress.
 * - Wrong code → InvalidCode(remaining). Failures share the totp_fail counter
 *   with TOTP login; when it runs out the staged secret is dropped and setup
 *   must restart.
 * - Success: persist the ENCRYPTED secret + totpEnabled, drop the staged secret,
 *   clear the failure counter, send a security notice.
 */

import type { Cache } from '../../../../shared/cache/cache';
import { CacheKeys } from '../../../../shared/cache/cache-keys';
import type { Logger } from '../../../../shared/logger/logger';
import { enqueueSecurityNotice } from '../../../../shared/messaging/enqueue-notice';
import type { Queue } from '../../../../shared/messaging/queue';
import type { AttemptCounter } from '../../../../shared/security/attempt-counter';
import type { EncryptionService } from '../../../../shared/security/encryption';
import type { TotpService } from '../../../../shared/security/totp';
import type { IdentityStore } from '../../../identities';
import { TOTP_VERIFY_WINDOW } from '../../auth.constants';
import { AuthErrors } from '../../auth.errors';
import { requireIdentity } from '../../helpers/require-identity';

export async function confirmTotpFlow(params: {
  deps: {
    identities: IdentityStore;
    cache: Cache;
    queue: Queue;
    totp: TotpService;
    encryption: EncryptionService;
    totpFailures: AttemptCounter;
    logger: Logger;
  };
  input: { identityId: number; code: string };
}): Promise<void> {
  const { deps, input } = params;

  const identity = await requireIdentity(deps.identities, input.identityId);
  if (identity.totpEnabled) {
    throw AuthErrors.twoFactorAlreadyEnabled('Authenticator app is already enabled.');
  }

  const setupKey = CacheKeys.totpSetup(identity.id);
  const staged = await deps.cache.get(setupKey);
  if (staged === null) throw AuthErrors.noSetupInProgress();

  const failuresKey = CacheKeys.totpFailures(identity.id);
  if (await deps.totpFailures.isExhausted(failuresKey)) {
    await deps.cache.del(setupKey);
    throw AuthErrors.tooManyAttempts(await deps.totpFailures.retryAfterSeconds(failuresKey));
  }

  const secret = deps.encryption.decrypt(staged);
  if (!deps.totp.verify(secret, input.code, { window: TOTP_VERIFY_WINDOW })) {
    const hit = await deps.totpFailures.hit(failuresKey);
    deps.logger.info('auth.totp.confirm_failed', {
      flow: 'auth.totp.confirm',
      identityId: identity.id,
      remainingAttempts: hit.remaining,
    });
    throw AuthErrors.invalidCode(hit.remaining);
  }

  await deps.identities.update(identity.id, {
    totpSecret: deps.encryption.encrypt(secret),
    totpEnabled: true,
  });
  await deps.cache.del(setupKey);
  await deps.totpFailures.reset(failuresKey);

  deps.logger.info('auth.totp.enabled', { flow: 'auth.totp.confirm', identityId: identity.id });

  await enqueueSecurityNotice(deps, {
    identityId: identity.id,
    email: identity.email,
    notice: 'totp_enabled',
  });
}
