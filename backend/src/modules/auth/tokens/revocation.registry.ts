/**
 * src/modules/auth/tokens/revocation.registry.ts
 *
 * WHY:
 * - JWTs are stateless; logout, refresh rotation and single-use reset tokens
 *   need a way to kill a specific token before it expires.
 *
 * HOW:
 * - blacklist:{token} marker with TTL = the token's remaining lifetime (ms precision),
 *   so the marker evicts itself exactly when the token would have expired anyway.
 *   No sweeper.
 *
 * RULES:
 * - revoke() never throws for a bad token: expired or unverifiable tokens need no
 *   marker (they are already rejected), so it returns false.
 * - The kind is not enforced; any token we signed can be revoked.
 * - claim() is revoke() for single-use tokens: the marker is created with SET NX,
 *   so of two concurrent claims on the same token exactly one gets true.
 */

import type { Cache } from '../../../shared/cache/cache';
import { CacheKeys } from '../../../shared/cache/cache-keys';
import type { TokenService } from './token.service';

export class RevocationRegistry {
  constructor(
    private readonly deps: {
      cache: Cache;
      tokens: TokenService;
    },
  ) {}

  async revoke(token: string): Promise<boolean> {
    const claims = this.deps.tokens.decode(token);
    if (!claims) return false;

    const remainingMs = claims.expiresAt * 1000 - Date.now();
    if (remainingMs <= 0) return false;

    await this.deps.cache.set(CacheKeys.revokedToken(token), '1', { ttlMs: remainingMs });
    return true;
  }

  /**
   * Revokes `token` and reports whether this call was the one that did it.
   * False when the token was already revoked, expired or unverifiable.
   */
  async claim(token: string): Promise<boolean> {
    const claims = this.deps.tokens.decode(token);
    if (!claims) return false;

    const remainingMs = claims.expiresAt * 1000 - Date.now();
    if (remainingMs <= 0) return false;

    return this.deps.cache.setIfAbsent(CacheKeys.revokedToken(token), '1', { ttlMs: remainingMs });
  }

  async isRevoked(token: string): Promise<boolean> {
    return (await this.deps.cache.get(CacheKeys.revokedToken(token))) !== null;
  }
}
