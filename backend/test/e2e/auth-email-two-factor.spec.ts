import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { buildTestDeps, seedIdentity, type TestDeps } from '../helpers/build-test-deps';
import { captureAuthError } from '../helpers/auth-error';
import { freezeClock } from '../helpers/clock';
import { expectAuthenticated, expectChallenge } from '../helpers/login-results';
import type { Identity } from '../../src/modules/identities';

describe('email two-factor', () => {
  let deps: TestDeps;
  let identity: Identity;

  beforeEach(async () => {
    freezeClock();
    deps = buildTestDeps();
    identity = await seedIdentity(deps, { username: 'mailer', emailVerified: true });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('enable → sign-in with an emailed code → disable', async () => {
    await deps.auth.twoFactor.enableEmailTwoFactor(identity.id);
    expect(deps.queue.drainOfType('auth.security-notice').map((m) => m.notice)).toEqual([
      'email_two_factor_enabled',
    ]);

    const challenge = expectChallenge(
      await deps.auth.authService.login({ identifier: 'mailer', password: 'password123' }),
    );
    expect(challenge.channel).toBe('email');
    const [codeMessage] = deps.queue.drainOfType('auth.two-factor-code');
    if (!codeMessage) throw new Error('no code enqueued');
    await deps.auth.twoFactor.verifyEmail(challenge.pendingToken, codeMessage.code);

    await deps.auth.twoFactor.disableEmailTwoFactor(identity.id, 'password123');
    expect((await deps.identities.findById(identity.id))?.twoFaEnabled).toBe(false);
    expectAuthenticated(
      await deps.auth.authService.login({ identifier: 'mailer', password: 'password123' }),
    );
  });

  it('enable requires a verified email', async () => {
    const unverified = await seedIdentity(deps);
    const err = await captureAuthError(deps.auth.twoFactor.enableEmailTwoFactor(unverified.id));
    expect(err.kind).toBe('EMAIL_NOT_VERIFIED');
  });

  it('enabling twice is a conflict', async () => {
    await deps.auth.twoFactor.enableEmailTwoFactor(identity.id);
    const err = await captureAuthError(deps.auth.twoFactor.enableEmailTwoFactor(identity.id));
    expect(err.kind).toBe('TWO_FACTOR_ALREADY_ENABLED');
  });

  it('disable checks the password', async () => {
    await deps.auth.twoFactor.enableEmailTwoFactor(identity.id);

    const err = await captureAuthError(
      deps.auth.twoFactor.disableEmailTwoFactor(identity.id, 'wrong-123'),
    );
    expect(err.kind).toBe('INVALID_CODE');
    expect(err.message).toBe('Incorrect password.');
    expect((await deps.identities.findById(identity.id))?.twoFaEnabled).toBe(true);
  });

  it('disable when not enabled is a conflict', async () => {
    const err = await captureAuthError(
      deps.auth.twoFactor.disableEmailTwoFactor(identity.id, 'password123'),
    );
    expect(err.kind).toBe('TWO_FACTOR_NOT_ENABLED');
  });

  it('a resent code replaces the previous one', async () => {
    await deps.auth.twoFactor.enableEmailTwoFactor(identity.id);
    const challenge = expectChallenge(
      await deps.auth.authService.login({ identifier: 'mailer', password: 'password123' }),
    );
    const [first] = deps.queue.drainOfType('auth.two-factor-code');

    await deps.auth.twoFactor.issueEmailCode(identity.id);
    const [second] = deps.queue.drainOfType('auth.two-factor-code');
    if (!first || !second) throw new Error('codes not enqueued');

    expect(await deps.cache.get(`2fa:${identity.id}`)).toBe(second.code);
    await deps.auth.twoFactor.verifyEmail(challenge.pendingToken, second.code);
  });
});
