import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { buildTestDeps, enableTotpFor, seedIdentity, type TestDeps } from '../helpers/build-test-deps';
import { captureAuthError } from '../helpers/auth-error';
import { freezeClock } from '../helpers/clock';
import { expectChallenge } from '../helpers/login-results';
import { wrongTotpCode } from '../helpers/totp-codes';
import type { Identity } from '../../src/modules/identities';

/**
 * E2E: authenticator app setup (two phases), sign-in with it, and disabling it.
 */

describe('authenticator app', () => {
  let deps: TestDeps;
  let identity: Identity;

  beforeEach(async () => {
    freezeClock();
    deps = buildTestDeps();
    identity = await seedIdentity(deps, {
      username: 'authy',
      email: 'authy@example.com',
      emailVerified: true,
    });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('setup + confirm', () => {
    it('renders the provisioning URI as a PNG data URL', async () => {
      const setup = await deps.auth.twoFactor.setupTotp(identity.id);

      const [header, body] = setup.qrCodePayload.split(',');
      expect(header).toBe('data:image/png;base64');
      const png = Buffer.from(body ?? '', 'base64');
      expect([...png.subarray(0, 8)]).toEqual([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
    });

    it('stages an encrypted secret without touching the identity', async () => {
      const setup = await deps.auth.twoFactor.setupTotp(identity.id);

      expect(setup.secret).toMatch(/^[A-Z2-7]+=*$/);
      expect(setup.provisioningUri.startsWith('otpauth://totp/')).toBe(true);
      expect(setup.provisioningUri).toContain(`secret=${setup.secret}`);
      expect(setup.qrCodePayload.startsWith('data:image/png;base64,')).toBe(true);
      expect(setup.qrCodePayload.length).toBeGreaterThan('data:image/png;base64,'.length);

      const staged = await deps.cache.get(`totp_setup:${identity.id}`);
      expect(staged).not.toBeNull();
      expect(staged).not.toBe(setup.secret);
      expect(await deps.cache.ttl(`totp_setup:${identity.id}`)).toBe(600);

      const stored = await deps.identities.findById(identity.id);
      expect(stored?.totpEnabled).toBe(false);
      expect(stored?.totpSecret).toBeNull();
    });

    it('requires a verified email', async () => {
      const unverified = await seedIdentity(deps);
      const err = await captureAuthError(deps.auth.twoFactor.setupTotp(unverified.id));
      expect(err.kind).toBe('EMAIL_NOT_VERIFIED');
    });

    it('confirm switches TOTP on and stores the secret encrypted', async () => {
      const setup = await deps.auth.twoFactor.setupTotp(identity.id);

      await deps.auth.twoFactor.confirmTotp(identity.id, deps.totp.generateCode(setup.secret));

      const stored = await deps.identities.findById(identity.id);
      expect(stored?.totpEnabled).toBe(true);
      if (!stored?.totpSecret) throw new Error('secret not stored');
      expect(stored.totpSecret).not.toBe(setup.secret);
      expect(deps.encryption.decrypt(stored.totpSecret)).toBe(setup.secret);
      expect(await deps.cache.get(`totp_setup:${identity.id}`)).toBeNull();

      const [notice] = deps.queue.drainOfType('auth.security-notice');
      expect(notice?.notice).toBe('totp_enabled');

      const again = await captureAuthError(deps.auth.twoFactor.setupTotp(identity.id));
      expect(again.kind).toBe('TWO_FACTOR_ALREADY_ENABLED');
    });

    it('confirm without a setup in progress', async () => {
      const err = await captureAuthError(deps.auth.twoFactor.confirmTotp(identity.id, '123456'));
      expect(err.kind).toBe('NO_SETUP_IN_PROGRESS');
    });

    it('wrong confirm codes count down and then discard the staged secret', async () => {
      const setup = await deps.auth.twoFactor.setupTotp(identity.id);
      const wrong = wrongTotpCode(deps.totp, setup.secret);

      const remaining: Array<number | undefined> = [];
      for (let i = 0; i < 5; i++) {
        const err = await captureAuthError(deps.auth.twoFactor.confirmTotp(identity.id, wrong));
        remaining.push(err.remainingAttempts);
      }
      expect(remaining).toEqual([4, 3, 2, 1, 0]);

      const locked = await captureAuthError(
        deps.auth.twoFactor.confirmTotp(identity.id, deps.totp.generateCode(setup.secret)),
      );
      expect(locked.kind).toBe('TOO_MANY_ATTEMPTS');

      const restart = await captureAuthError(
        deps.auth.twoFactor.confirmTotp(identity.id, deps.totp.generateCode(setup.secret)),
      );
      expect(restart.kind).toBe('NO_SETUP_IN_PROGRESS');
    });
  });

  describe('sign-in', () => {
    it('password then authenticator code', async () => {
      const secret = await enableTotpFor(deps, identity.id);

      const challenge = expectChallenge(
        await deps.auth.authService.login({ identifier: 'authy', password: 'password123' }),
      );
      expect(challenge.channel).toBe('totp');

      const session = await deps.auth.twoFactor.verifyTotp(
        challenge.pendingToken,
        ` ${deps.totp.generateCode(secret)} `,
      );
      expect((await deps.auth.authService.authenticate(session.tokens.accessToken)).id).toBe(identity.id);

      const replay = await captureAuthError(
        deps.auth.twoFactor.verifyTotp(challenge.pendingToken, deps.totp.generateCode(secret)),
      );
      expect(replay.kind).toBe('INVALID_OR_EXPIRED_SESSION');
    });
  });

  describe('disable', () => {
    let secret: string;

    beforeEach(async () => {
      secret = await enableTotpFor(deps, identity.id);
    });

    it('needs a password or a code', async () => {
      const err = await captureAuthError(deps.auth.twoFactor.disableTotp(identity.id, {}));
      expect(err.kind).toBe('VERIFICATION_REQUIRED');
    });

    it('a wrong password is an invalid code', async () => {
      const err = await captureAuthError(
        deps.auth.twoFactor.disableTotp(identity.id, { password: 'not-it-123' }),
      );
      expect(err.kind).toBe('INVALID_CODE');
      expect(err.message).toBe('Invalid password or authenticator code.');
      expect((await deps.identities.findById(identity.id))?.totpEnabled).toBe(true);
    });

    it('by password', async () => {
      await deps.auth.twoFactor.disableTotp(identity.id, { password: 'password123' });

      const stored = await deps.identities.findById(identity.id);
      expect(stored?.totpEnabled).toBe(false);
      expect(stored?.totpSecret).toBeNull();
      const [notice] = deps.queue.drainOfType('auth.security-notice');
      expect(notice?.notice).toBe('totp_disabled');
    });

    it('by current code, even when the notice cannot be sent', async () => {
      vi.spyOn(deps.queue, 'enqueue').mockRejectedValueOnce(new Error('smtp down'));

      await deps.auth.twoFactor.disableTotp(identity.id, { totpCode: deps.totp.generateCode(secret) });

      expect((await deps.identities.findById(identity.id))?.totpEnabled).toBe(false);
    });

    it('OAuth-only identities must use a code', async () => {
      const social = await seedIdentity(deps, {
        password: null,
        emailVerified: true,
        oauthProvider: 'google',
        oauthId: 'g-42',
      });
      await enableTotpFor(deps, social.id);

      const err = await captureAuthError(
        deps.auth.twoFactor.disableTotp(social.id, { password: 'password123' }),
      );
      expect(err.kind).toBe('VERIFICATION_REQUIRED');
    });

    it('is a conflict when TOTP is already off', async () => {
      await deps.auth.twoFactor.disableTotp(identity.id, { password: 'password123' });
      const err = await captureAuthError(
        deps.auth.twoFactor.disableTotp(identity.id, { password: 'password123' }),
      );
      expect(err.kind).toBe('TWO_FACTOR_NOT_ENABLED');
    });
  });
});
