import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { buildTestDeps, seedIdentity, type TestDeps } from '../helpers/build-test-deps';
import { captureAuthError } from '../helpers/auth-error';
import { freezeClock } from '../helpers/clock';
import type { OAuthProfile } from '../../src/modules/auth';

const profile: OAuthProfile = {
  provider: 'github',
  providerId: 'gh-314',
  email: 'octo@example.com',
  emailVerified: true,
  firstName: 'Octo',
  lastName: null,
  avatarUrl: null,
};

describe('OAuth sign-in', () => {
  let deps: TestDeps;

  beforeEach(() => {
    freezeClock();
    deps = buildTestDeps();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('first sign-in creates the identity; later ones reuse it', async () => {
    const first = await deps.auth.authService.completeOAuthLogin(profile, { ip: '198.51.100.20' });
    const second = await deps.auth.authService.completeOAuthLogin(profile);

    expect(first.created).toBe(true);
    expect(second.created).toBe(false);

    const identity = await deps.auth.authService.authenticate(second.tokens.accessToken);
    expect(identity.username).toBe('octo');
    expect(identity.passwordHash).toBeNull();
    expect(await deps.auth.authService.listSessions(identity.id)).toHaveLength(2);
  });

  it('the created identity cannot sign in with a password', async () => {
    await deps.auth.authService.completeOAuthLogin(profile);
    const err = await captureAuthError(
      deps.auth.authService.login({ identifier: 'octo', password: 'password123' }),
    );
    expect(err.kind).toBe('OAUTH_ONLY_ACCOUNT');
  });

  it('refuses an inactive linked identity', async () => {
    await seedIdentity(deps, {
      email: 'octo@example.com',
      password: null,
      oauthProvider: 'github',
      oauthId: 'gh-314',
      isActive: false,
    });

    const err = await captureAuthError(deps.auth.authService.completeOAuthLogin(profile));
    expect(err.kind).toBe('ACCOUNT_INACTIVE');
  });

  it('provider sign-in does not ask for the email second factor', async () => {
    const identity = await seedIdentity(deps, {
      email: 'octo@example.com',
      emailVerified: true,
      twoFaEnabled: true,
    });

    const result = await deps.auth.authService.completeOAuthLogin(profile);

    expect(result.created).toBe(false);
    expect(deps.auth.tokens.validate(result.tokens.accessToken, 'access').identityId).toBe(identity.id);
    expect(deps.queue.drainOfType('auth.two-factor-code')).toEqual([]);
  });
});
