/**
 * backend/src/modules/auth/policies/two-factor.policy.ts
 *
 * WHY:
 * - Which second factor applies, and who may turn factors on, are security rules.
 * - Keep them pure + unit-testable (no cache, no store, no clocks).
 *
 * RULES:
 * - TOTP takes priority over email when both are enabled.
 * - Enabling any second factor requires a verified email (codes and recovery
 *   notices go to that address).
 * - Enabling a factor that is already on is a conflict, not a silent no-op.
 */

import type { Identity } from '../../identities';
import { AuthErrors } from '../auth.errors';
import type { TwoFactorChannel } from '../auth.types';

type TwoFactorFlags = Pick<Identity, 'totpEnabled' | 'twoFaEnabled'>;

export function selectTwoFactorChannel(identity: TwoFactorFlags): TwoFactorChannel | null {
  if (identity.totpEnabled) return 'totp';
  if (identity.twoFaEnabled) return 'email';
  return null;
}

export type TwoFactorEnableFailure = {
  reason: 'email_not_verified' | 'already_enabled';
  error: Error;
};

export function getTwoFactorEnableFailure(
  identity: Pick<Identity, 'emailVerified' | 'totpEnabled' | 'twoFaEnabled'>,
  channel: TwoFactorChannel,
): TwoFactorEnableFailure | null {
  const alreadyOn = channel === 'totp' ? identity.totpEnabled : identity.twoFaEnabled;
  if (alreadyOn) {
    return {
      reason: 'already_enabled',
      error:
        channel === 'totp'
          ? AuthErrors.twoFactorAlreadyEnabled('Authenticator app is already enabled.')
          : AuthErrors.twoFactorAlreadyEnabled('Email two-factor authentication is already enabled.'),
    };
  }
  if (!identity.emailVerified) {
    return { reason: 'email_not_verified', error: AuthErrors.emailNotVerified() };
  }
  return null;
}

export function assertTwoFactorEnableAllowed(
  identity: Pick<Identity, 'emailVerified' | 'totpEnabled' | 'twoFaEnabled'>,
  channel: TwoFactorChannel,
): void {
  const failure = getTwoFactorEnableFailure(identity, channel);
  if (failure) throw failure.error;
}
