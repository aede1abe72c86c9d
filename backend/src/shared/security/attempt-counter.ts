/**
 * src/shared/security/attempt-counter.ts
 *
 * WHY:
 * - Login lockout and two-factor verification both cap failed attempts per
 *   identity inside a time window.
 * - Uses Redis in prod, but depends only on Cache (DIP).
 *
 * HOW TO USE:
 * - const counter = new AttemptCounter(cache, { maxAttempts: 5, windowSeconds: 900 })
 * - const { remaining, exhausted } = await counter.hit(CacheKeys.loginAttempts(id))
 * - await counter.reset(key)   // on success
 *
 * ATOMICITY:
 * - hit() uses INCR-then-check, not check-then-INCR.
 * - INCR is atomic in Redis. Two concurrent failures both increment; the one
 *   that reaches the limit sees exhausted=true. There is no TOCTOU race.
 * - The window starts with the first failure; later failures do not extend it.
 */

import type { Cache } from '../cache/cache';

export type AttemptCounterPolicy = {
  maxAttempts: number;
  windowSeconds: number;
};

export type AttemptHit = {
  attempts: number;
  remaining: number;
  exhausted: boolean;
};

export class AttemptCounter {
  constructor(
    private readonly cache: Cache,
    readonly policy: AttemptCounterPolicy,
  ) {}

  async count(key: string): Promise<number> {
    const raw = await this.cache.get(key);
    if (raw === null) return 0;

    const value = Number.parseInt(raw, 10);
    return Number.isNaN(value) ? 0 : value;
  }

  async isExhausted(key: string): Promise<boolean> {
    return (await this.count(key)) >= this.policy.maxAttempts;
  }

  async hit(key: string): Promise<AttemptHit> {
    const attempts = await this.cache.incr(key, { ttlSeconds: this.policy.windowSeconds });
    const remaining = Math.max(0, this.policy.maxAttempts - attempts);
    return { attempts, remaining, exhausted: remaining === 0 };
  }

  async reset(key: string): Promise<void> {
    await this.cache.del(key);
  }

  /** Seconds until the window for `key` closes; the full window when unknown. */
  async retryAfterSeconds(key: string): Promise<number> {
    return (await this.cache.ttl(key)) ?? this.policy.windowSeconds;
  }
}
