/**
 * backend/src/modules/auth/flows/totp/setup-totp-flow.ts
 *
 * WHY:
 * - Phase 1 of authenticator setup: hand the user a fresh secret to scan.
 * - qrCodePayload is a PNG data URL of the provisioning URI, ready for an <img>.
 *
 * RULES:
 * - The identity is NOT touched. The secret is staged (encrypted) under
 *   totp_setup:{id} until confirmTotpFlow proves the user captured it.
 * - Calling setup again replaces the staged secret (restarts the 10-minute clock).
 * - TOTP already on → TwoFactorAlreadyEnabled; email unverified → EmailNotVerified.
 */

import QRCode from 'qrcode';

import type { Cache } from '../../../../shared/cache/cache';
import { CacheKeys } from '../../../../shared/cache/cache-keys';
import type { Logger } from '../../../../shared/logger/logger';
import type { EncryptionService } from '../../../../shared/security/encryption';
import type { TotpService } from '../../../../shared/security/totp';
import type { IdentityStore } from '../../../identities';
import type { TotpSetup } from '../../auth.types';
import { requireIdentity } from '../../helpers/require-identity';
import { assertTwoFactorEnableAllowed } from '../../policies/two-factor.policy';

export async function setupTotpFlow(params: {
  deps: {
    identities: IdentityStore;
    cache: Cache;
    totp: TotpService;
    encryption: EncryptionService;
    logger: Logger;
    setupTtlSeconds: number;
  };
  input: { identityId: number };
}): Promise<TotpSetup> {
  const { deps, input } = params;

  const identity = await requireIdentity(deps.identities, input.identityId);
  assertTwoFactorEnableAllowed(identity, 'totp');

  const secret = deps.totp.generateSecret();
  const provisioningUri = deps.totp.buildUri(secret, identity.email);

  await deps.cache.set(CacheKeys.totpSetup(identity.id), deps.encryption.encrypt(secret), {
    ttlSeconds: deps.setupTtlSeconds,
  });

  deps.logger.info('auth.totp.setup_started', {
    flow: 'auth.totp.setup',
    identityId: identity.id,
  });

  const qrCodePayload = await QRCode.toDataURL(provisioningUri);

  return { secret, provisioningUri, qrCodePayload };
}
