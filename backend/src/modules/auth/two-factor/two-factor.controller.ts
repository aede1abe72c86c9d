/**
 * src/modules/auth/two-factor/two-factor.controller.ts
 *
 * WHY:
 * - Owns the second step of sign-in (email OTP or authenticator app) and the
 *   lifecycle of both factors (setup, confirm, enable, disable).
 *
 * CHALLENGE:
 * - beginChallenge(identity) after a correct password. TOTP wins over email.
 *   - email: 6-digit code at 2fa:{id} (TTL = code TTL) is dispatched through the
 *     queue; a dispatch failure aborts the login with CodeDeliveryFailed.
 *   - both: opaque pending token → identity id (email: code TTL, totp: 300 s).
 *
 * VERIFY (both channels):
 * - Pending token missing/expired → InvalidOrExpiredSession.
 * - Attempt counter already at max → pending token dropped, TooManyAttempts.
 * - Wrong code → counter +1, InvalidCode(remaining).
 * - Right code → code, counter and pending token consumed, then tokens are
 *   issued and a session registered.
 *
 * CONCURRENCY:
 * - The email code and the pending token are consumed with delIfEquals. Two
 *   parallel verifications of the same code cannot both succeed: the loser sees
 *   InvalidCode (code already gone) or InvalidOrExpiredSession (token gone).
 *
 * RULES:
 * - Issuing a new email code overwrites the previous one but never resets the
 *   attempt counter (requesting codes must not buy more guesses).
 * - Codes and pending tokens are never logged.
 */

import type { Cache } from '../../../shared/cache/cache';
import { CacheKeys } from '../../../shared/cache/cache-keys';
import type { Logger } from '../../../shared/logger/logger';
import type { Queue } from '../../../shared/messaging/queue';
import { AttemptCounter } from '../../../shared/security/attempt-counter';
import type { EncryptionService } from '../../../shared/security/encryption';
import type { PasswordHasher } from '../../../shared/security/password-hasher';
import { safeEqual } from '../../../shared/security/safe-equal';
import { generateNumericCode } from '../../../shared/security/token';
import type { TotpService } from '../../../shared/security/totp';
import type { SessionRegistry } from '../../../shared/session/session.registry';
import type { Identity, IdentityStore } from '../../identities';
import { EMAIL_CODE_DIGITS, TOTP_VERIFY_WINDOW } from '../auth.constants';
import { AuthErrors } from '../auth.errors';
import type {
  AuthSession,
  ClientInfo,
  TotpSetup,
  TwoFactorChallenge,
  TwoFactorChannel,
} from '../auth.types';
import {
  disableEmailTwoFactorFlow,
  enableEmailTwoFactorFlow,
} from '../flows/email-two-factor/email-two-factor-flows';
import { confirmTotpFlow } from '../flows/totp/confirm-totp-flow';
import { disableTotpFlow, type DisableTotpProof } from '../flows/totp/disable-totp-flow';
import { setupTotpFlow } from '../flows/totp/setup-totp-flow';
import { issueAuthSession } from '../helpers/issue-auth-session';
import { requireIdentity } from '../helpers/require-identity';
import { selectTwoFactorChannel } from '../policies/two-factor.policy';
import type { TokenService } from '../tokens/token.service';
import { PendingSessionStore } from './pending-session.store';

export type TwoFactorPolicy = {
  codeTtlSeconds: number;
  maxAttempts: number;
  lockoutSeconds: number;
  totpLoginTtlSeconds: number;
  totpSetupTtlSeconds: number;
};

export type TwoFactorControllerDeps = {
  identities: IdentityStore;
  cache: Cache;
  queue: Queue;
  logger: Logger;
  totp: TotpService;
  encryption: EncryptionService;
  passwordHasher: PasswordHasher;
  tokens: TokenService;
  sessions: SessionRegistry;
  policy: TwoFactorPolicy;
};

export class TwoFactorController {
  private readonly pending: PendingSessionStore;
  private readonly emailAttempts: AttemptCounter;
  private readonly totpFailures: AttemptCounter;

  constructor(private readonly deps: TwoFactorControllerDeps) {
    this.pending = new PendingSessionStore(deps.cache);
    this.emailAttempts = new AttemptCounter(deps.cache, {
      maxAttempts: deps.policy.maxAttempts,
      windowSeconds: deps.policy.lockoutSeconds,
    });
    this.totpFailures = new AttemptCounter(deps.cache, {
      maxAttempts: deps.policy.maxAttempts,
      windowSeconds: deps.policy.totpLoginTtlSeconds,
    });
  }

  /** null when the identity has no second factor enabled. */
  async beginChallenge(identity: Identity): Promise<TwoFactorChallenge | null> {
    const channel = selectTwoFactorChannel(identity);
    if (channel === null) return null;

    if (channel === 'email') {
      await this.sendEmailCode(identity);
    }

    const ttlSeconds =
      channel === 'totp' ? this.deps.policy.totpLoginTtlSeconds : this.deps.policy.codeTtlSeconds;
    const pendingToken = await this.pending.create(channel, identity.id, ttlSeconds);

    this.deps.logger.info('auth.2fa.challenge_started', {
      flow: 'auth.2fa.challenge',
      identityId: identity.id,
      channel,
    });

    return { channel, pendingToken };
  }

  /** Generates, stores and dispatches a fresh email code (replacing any previous one). */
  async issueEmailCode(identityId: number): Promise<void> {
    const identity = await requireIdentity(this.deps.identities, identityId);
    await this.sendEmailCode(identity);
  }

  /**
   * Single-use check of an email code for an identity. Succeeds at most once
   * per issued code.
   */
  async verifyEmailCode(identityId: number, code: string): Promise<void> {
    const attemptsKey = CacheKeys.twoFactorAttempts(identityId);
    if (await this.emailAttempts.isExhausted(attemptsKey)) {
      throw AuthErrors.tooManyAttempts(await this.emailAttempts.retryAfterSeconds(attemptsKey));
    }
    await this.consumeEmailCode(identityId, code);
  }

  async verifyEmail(pendingToken: string, code: string, client?: ClientInfo): Promise<AuthSession> {
    const identityId = await this.resolvePending('email', pendingToken);

    const attemptsKey = CacheKeys.twoFactorAttempts(identityId);
    await this.rejectIfExhausted('email', pendingToken, this.emailAttempts, attemptsKey);

    await this.consumeEmailCode(identityId, code);

    return this.complete('email', pendingToken, identityId, client);
  }

  async verifyTotp(pendingToken: string, code: string, client?: ClientInfo): Promise<AuthSession> {
    const identityId = await this.resolvePending('totp', pendingToken);

    const failuresKey = CacheKeys.totpFailures(identityId);
    await this.rejectIfExhausted('totp', pendingToken, this.totpFailures, failuresKey);

    const identity = await this.deps.identities.findById(identityId);
    if (!identity || !identity.totpEnabled || identity.totpSecret === null) {
      await this.pending.invalidate('totp', pendingToken);
      throw AuthErrors.invalidOrExpiredSession();
    }

    const secret = this.deps.encryption.decrypt(identity.totpSecret);
    if (!this.deps.totp.verify(secret, code, { window: TOTP_VERIFY_WINDOW })) {
      const hit = await this.totpFailures.hit(failuresKey);
      this.deps.logger.info('auth.2fa.verify_failed', {
        flow: 'auth.2fa.verify',
        identityId,
        channel: 'totp',
        remainingAttempts: hit.remaining,
      });
      throw AuthErrors.invalidCode(hit.remaining);
    }

    await this.totpFailures.reset(failuresKey);
    return this.complete('totp', pendingToken, identityId, client);
  }

  setupTotp(identityId: number): Promise<TotpSetup> {
    return setupTotpFlow({
      deps: { ...this.deps, setupTtlSeconds: this.deps.policy.totpSetupTtlSeconds },
      input: { identityId },
    });
  }

  confirmTotp(identityId: number, code: string): Promise<void> {
    return confirmTotpFlow({
      deps: { ...this.deps, totpFailures: this.totpFailures },
      input: { identityId, code },
    });
  }

  disableTotp(identityId: number, proof: DisableTotpProof): Promise<void> {
    return disableTotpFlow({ deps: this.deps, input: { identityId, ...proof } });
  }

  enableEmailTwoFactor(identityId: number): Promise<void> {
    return enableEmailTwoFactorFlow({ deps: this.deps, input: { identityId } });
  }

  disableEmailTwoFactor(identityId: number, password: string): Promise<void> {
    return disableEmailTwoFactorFlow({ deps: this.deps, input: { identityId, password } });
  }

  // ── internals ──────────────────────────────────────────────

  private async sendEmailCode(identity: Identity): Promise<void> {
    const codeKey = CacheKeys.emailCode(identity.id);
    const code = generateNumericCode(EMAIL_CODE_DIGITS);

    await this.deps.cache.set(codeKey, code, { ttlSeconds: this.deps.policy.codeTtlSeconds });

    try {
      await this.deps.queue.enqueue({
        type: 'auth.two-factor-code',
        identityId: identity.id,
        email: identity.email,
        username: identity.username,
        code,
        expiresInMinutes: Math.ceil(this.deps.policy.codeTtlSeconds / 60),
      });
    } catch (err) {
      await this.deps.cache.delIfEquals(codeKey, code);
      this.deps.logger.error('auth.2fa.code_delivery_failed', {
        flow: 'auth.2fa.challenge',
        identityId: identity.id,
        err,
      });
      throw AuthErrors.codeDeliveryFailed();
    }
  }

  private async consumeEmailCode(identityId: number, code: string): Promise<void> {
    const codeKey = CacheKeys.emailCode(identityId);
    const attemptsKey = CacheKeys.twoFactorAttempts(identityId);

    const stored = await this.deps.cache.get(codeKey);
    const matches = stored !== null && safeEqual(stored, code.trim());

    if (matches && (await this.deps.cache.delIfEquals(codeKey, stored))) {
      await this.emailAttempts.reset(attemptsKey);
      return;
    }

    const hit = await this.emailAttempts.hit(attemptsKey);
    this.deps.logger.info('auth.2fa.verify_failed', {
      flow: 'auth.2fa.verify',
      identityId,
      channel: 'email',
      remainingAttempts: hit.remaining,
    });
    throw AuthErrors.invalidCode(hit.remaining);
  }

  private async resolvePending(channel: TwoFactorChannel, pendingToken: string): Promise<number> {
    const identityId = await this.pending.resolve(channel, pendingToken);
    if (identityId === null) throw AuthErrors.invalidOrExpiredSession();
    return identityId;
  }

  private async rejectIfExhausted(
    channel: TwoFactorChannel,
    pendingToken: string,
    counter: AttemptCounter,
    key: string,
  ): Promise<void> {
    if (!(await counter.isExhausted(key))) return;

    await this.pending.invalidate(channel, pendingToken);
    const retryAfterSeconds = await counter.retryAfterSeconds(key);

    this.deps.logger.warn('auth.2fa.too_many_attempts', {
      flow: 'auth.2fa.verify',
      channel,
      retryAfterSeconds,
    });
    throw AuthErrors.tooManyAttempts(retryAfterSeconds);
  }

  private async complete(
    channel: TwoFactorChannel,
    pendingToken: string,
    identityId: number,
    client?: ClientInfo,
  ): Promise<AuthSession> {
    if (!(await this.pending.consume(channel, pendingToken, identityId))) {
      throw AuthErrors.invalidOrExpiredSession();
    }

    const identity = await this.deps.identities.findById(identityId);
    if (!identity) throw AuthErrors.invalidOrExpiredSession();
    if (!identity.isActive) throw AuthErrors.accountInactive();

    const session = await issueAuthSession(this.deps, identity, client);

    this.deps.logger.info('auth.2fa.verified', {
      flow: 'auth.2fa.verify',
      identityId,
      channel,
    });

    return session;
  }
}
