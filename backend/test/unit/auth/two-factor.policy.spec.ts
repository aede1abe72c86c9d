import { describe, it, expect } from 'vitest';
import {
  assertTwoFactorEnableAllowed,
  getTwoFactorEnableFailure,
  selectTwoFactorChannel,
} from '../../../src/modules/auth/policies/two-factor.policy';
import { captureAuthErrorSync } from '../../helpers/auth-error';

const base = { emailVerified: true, totpEnabled: false, twoFaEnabled: false };

describe('selectTwoFactorChannel', () => {
  it('prefers TOTP over email', () => {
    expect(selectTwoFactorChannel({ totpEnabled: true, twoFaEnabled: true })).toBe('totp');
    expect(selectTwoFactorChannel({ totpEnabled: false, twoFaEnabled: true })).toBe('email');
    expect(selectTwoFactorChannel({ totpEnabled: false, twoFaEnabled: false })).toBeNull();
  });
});

describe('getTwoFactorEnableFailure', () => {
  it('allows a verified identity without the factor', () => {
    expect(getTwoFactorEnableFailure(base, 'totp')).toBeNull();
    expect(getTwoFactorEnableFailure(base, 'email')).toBeNull();
  });

  it('requires a verified email', () => {
    expect(getTwoFactorEnableFailure({ ...base, emailVerified: false }, 'totp')?.reason).toBe(
      'email_not_verified',
    );
  });

  it('reports a factor that is already on', () => {
    expect(getTwoFactorEnableFailure({ ...base, totpEnabled: true }, 'totp')?.reason).toBe(
      'already_enabled',
    );
    expect(getTwoFactorEnableFailure({ ...base, twoFaEnabled: true }, 'email')?.reason).toBe(
      'already_enabled',
    );
    expect(getTwoFactorEnableFailure({ ...base, totpEnabled: true }, 'email')).toBeNull();
  });

  it('assert throws the matching AuthError', () => {
    const err = captureAuthErrorSync(() =>
      assertTwoFactorEnableAllowed({ ...base, emailVerified: false }, 'email'),
    );
    expect(err.kind).toBe('EMAIL_NOT_VERIFIED');
  });
});
