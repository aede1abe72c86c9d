/**
 * src/modules/auth/two-factor/pending-session.store.ts
 *
 * WHY:
 * - Between "password OK" and "second factor OK" the caller holds an opaque
 *   pending token, never the identity id.
 *
 * KEYS:
 * - email channel: 2fa_session:{token} → identity id
 * - totp channel:  totp_login:{token}  → identity id
 *
 * RULES:
 * - Tokens are 256-bit CSPRNG values, base64url.
 * - consume() is a compare-and-delete: of two concurrent verifications of the
 *   same pending token, exactly one gets true.
 */

import type { Cache } from '../../../shared/cache/cache';
import { CacheKeys } from '../../../shared/cache/cache-keys';
import { generateSecureToken } from '../../../shared/security/token';
import type { TwoFactorChannel } from '../auth.types';

function keyFor(channel: TwoFactorChannel, pendingToken: string): string {
  return channel === 'totp'
    ? CacheKeys.totpPendingSession(pendingToken)
    : CacheKeys.emailPendingSession(pendingToken);
}

export class PendingSessionStore {
  constructor(private readonly cache: Cache) {}

  async create(channel: TwoFactorChannel, identityId: number, ttlSeconds: number): Promise<string> {
    const pendingToken = generateSecureToken();
    await this.cache.set(keyFor(channel, pendingToken), String(identityId), { ttlSeconds });
    return pendingToken;
  }

  /** Identity id behind the token, or null when missing/expired/garbled. */
  async resolve(channel: TwoFactorChannel, pendingToken: string): Promise<number | null> {
    const raw = await this.cache.get(keyFor(channel, pendingToken));
    if (raw === null || !/^\d+$/.test(raw)) return null;
    return Number(raw);
  }

  async consume(
    channel: TwoFactorChannel,
    pendingToken: string,
    identityId: number,
  ): Promise<boolean> {
    return this.cache.delIfEquals(keyFor(channel, pendingToken), String(identityId));
  }

  async invalidate(channel: TwoFactorChannel, pendingToken: string): Promise<void> {
    await this.cache.del(keyFor(channel, pendingToken));
  }
}
