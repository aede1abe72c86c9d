/**
 * src/modules/auth/login/login-guard.ts
 *
 * WHY:
 * - Password authentication with per-identity brute-force lockout.
 *
 * STATE MACHINE (per identity):
 *   Normal ──wrong password──▶ Warned(n) ──n reaches max──▶ Locked
 *   Locked ──lockout window elapses (marker TTL)──▶ Normal
 *
 * RULES:
 * - Lookup: username first, then email.
 * - Unknown identifier → InvalidCredentials, no counter touched. A dummy bcrypt
 *   compare still runs so the response time matches a wrong password.
 * - LockoutMarker present → AccountLocked, whatever the password. Checked before
 *   the hash so a locked account gives no password oracle.
 * - No password hash → OAuthOnlyAccount.
 * - Wrong password → INCR counter (window = lockout duration, started by the first
 *   failure). At max: set marker, clear counter, AccountLocked. Otherwise
 *   InvalidCredentials with remainingAttempts.
 * - Success → clear counter.
 * - Active/inactive is NOT decided here; the auth service gates that.
 */

import type { Cache } from '../../../shared/cache/cache';
import { CacheKeys } from '../../../shared/cache/cache-keys';
import type { Logger } from '../../../shared/logger/logger';
import { AttemptCounter } from '../../../shared/security/attempt-counter';
import type { PasswordHasher } from '../../../shared/security/password-hasher';
import type { Identity, IdentityStore } from '../../identities';
import { AuthErrors } from '../auth.errors';

export type LoginGuardPolicy = {
  maxAttempts: number;
  lockoutSeconds: number;
};

const TIMING_PLACEHOLDER_PASSWORD = 'timing-equalizer-placeholder';

export class LoginGuard {
  private readonly attempts: AttemptCounter;
  private dummyHash: Promise<string> | null = null;

  constructor(
    private readonly deps: {
      identities: IdentityStore;
      cache: Cache;
      passwordHasher: PasswordHasher;
      logger: Logger;
      policy: LoginGuardPolicy;
    },
  ) {
    this.attempts = new AttemptCounter(deps.cache, {
      maxAttempts: deps.policy.maxAttempts,
      windowSeconds: deps.policy.lockoutSeconds,
    });
  }

  async authenticate(identifier: string, secret: string): Promise<Identity> {
    const identity = await this.deps.identities.findByUsernameOrEmail(identifier);

    if (!identity) {
      await this.burnEquivalentTime(secret);
      this.deps.logger.info('auth.login.failed', {
        flow: 'auth.login',
        reason: 'unknown_identifier',
      });
      throw AuthErrors.invalidCredentials();
    }

    const lockoutKey = CacheKeys.loginLockout(identity.id);
    if ((await this.deps.cache.get(lockoutKey)) !== null) {
      const retryAfterSeconds =
        (await this.deps.cache.ttl(lockoutKey)) ?? this.deps.policy.lockoutSeconds;
      this.deps.logger.warn('auth.login.locked', {
        flow: 'auth.login',
        identityId: identity.id,
        retryAfterSeconds,
      });
      throw AuthErrors.accountLocked(retryAfterSeconds);
    }

    if (identity.passwordHash === null) {
      throw AuthErrors.oauthOnlyAccount();
    }

    const attemptsKey = CacheKeys.loginAttempts(identity.id);
    const ok = await this.deps.passwordHasher.verify(secret, identity.passwordHash);

    if (!ok) {
      const hit = await this.attempts.hit(attemptsKey);

      if (hit.exhausted) {
        await this.deps.cache.set(lockoutKey, '1', {
          ttlSeconds: this.deps.policy.lockoutSeconds,
        });
        await this.attempts.reset(attemptsKey);

        this.deps.logger.warn('auth.login.lockout_started', {
          flow: 'auth.login',
          identityId: identity.id,
          lockoutSeconds: this.deps.policy.lockoutSeconds,
        });
        throw AuthErrors.accountLocked(this.deps.policy.lockoutSeconds);
      }

      this.deps.logger.info('auth.login.failed', {
        flow: 'auth.login',
        reason: 'wrong_password',
        identityId: identity.id,
        remainingAttempts: hit.remaining,
      });
      throw AuthErrors.invalidCredentials({ remainingAttempts: hit.remaining });
    }

    await this.attempts.reset(attemptsKey);
    return identity;
  }

  private async burnEquivalentTime(secret: string): Promise<void> {
    this.dummyHash ??= this.deps.passwordHasher.hash(TIMING_PLACEHOLDER_PASSWORD);
    await this.deps.passwordHasher.verify(secret, await this.dummyHash);
  }
}
