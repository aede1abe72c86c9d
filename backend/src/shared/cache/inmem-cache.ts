/**
 * src/shared/cache/inmem-cache.ts
 *
 * WHY:
 * - Allows tests (and local dev if Redis is down) to run without external infra.
 * - TTL semantics mirror RedisCache so lockout and expiry tests mean the same thing.
 *
 * HOW TO USE:
 * - const cache = new InMemCache()
 * - Time comes from Date.now(), so `vi.useFakeTimers({ toFake: ['Date'] })` drives expiry.
 */

import type { Cache, CacheSetOptions } from './cache';

type StringEntry = { value: string; expiresAtMs: number | null };

export class InMemCache implements Cache {
  private readonly store = new Map<string, StringEntry>();
  private readonly sets = new Map<string, Set<string>>();
  private readonly setExpiry = new Map<string, number | null>();

  private now(): number {
    return Date.now();
  }

  private getEntry(key: string): StringEntry | null {
    const entry = this.store.get(key);
    if (!entry) return null;

    if (entry.expiresAtMs !== null && entry.expiresAtMs <= this.now()) {
      this.store.delete(key);
      return null;
    }

    return entry;
  }

  private isSetExpired(key: string): boolean {
    const exp = this.setExpiry.get(key);
    if (exp === undefined || exp === null) return false;
    return exp <= this.now();
  }

  private evictSetIfExpired(key: string): void {
    if (this.isSetExpired(key)) {
      this.sets.delete(key);
      this.setExpiry.delete(key);
    }
  }

  get(key: string): Promise<string | null> {
    const entry = this.getEntry(key);
    return Promise.resolve(entry ? entry.value : null);
  }

  set(key: string, value: string, opts?: CacheSetOptions): Promise<void> {
    let expiresAtMs: number | null = null;

    if (opts?.ttlMs !== undefined) {
      expiresAtMs = this.now() + opts.ttlMs;
    } else if (opts?.ttlSeconds !== undefined) {
      expiresAtMs = this.now() + opts.ttlSeconds * 1000;
    } else if (opts?.keepTtl) {
      expiresAtMs = this.getEntry(key)?.expiresAtMs ?? null;
    }

    this.store.set(key, { value, expiresAtMs });
    return Promise.resolve();
  }

  del(key: string): Promise<void> {
    this.store.delete(key);
    this.sets.delete(key);
    this.setExpiry.delete(key);
    return Promise.resolve();
  }

  incr(key: string, opts?: { ttlSeconds?: number }): Promise<number> {
    const entry = this.getEntry(key);
    const next = entry ? Number(entry.value) + 1 : 1;

    let expiresAtMs = entry?.expiresAtMs ?? null;
    if (expiresAtMs === null && opts?.ttlSeconds !== undefined) {
      expiresAtMs = this.now() + opts.ttlSeconds * 1000;
    }

    this.store.set(key, { value: String(next), expiresAtMs });

    return Promise.resolve(next);
  }

  ttl(key: string): Promise<number | null> {
    const entry = this.getEntry(key);
    if (!entry || entry.expiresAtMs === null) return Promise.resolve(null);

    return Promise.resolve(Math.ceil((entry.expiresAtMs - this.now()) / 1000));
  }

  delIfEquals(key: string, expected: string): Promise<boolean> {
    const entry = this.getEntry(key);
    if (!entry || entry.value !== expected) return Promise.resolve(false);

    this.store.delete(key);
    return Promise.resolve(true);
  }

  async setIfAbsent(
    key: string,
    value: string,
    opts?: Pick<CacheSetOptions, 'ttlSeconds' | 'ttlMs'>,
  ): Promise<boolean> {
    if (this.getEntry(key)) return false;
    await this.set(key, value, opts);
    return true;
  }

  sadd(key: string, member: string, opts?: { ttlSeconds?: number }): Promise<void> {
    this.evictSetIfExpired(key);

    let set = this.sets.get(key);
    if (!set) {
      set = new Set<string>();
      this.sets.set(key, set);
    }
    set.add(member);

    // Refresh TTL on every sadd (same as Redis EXPIRE after SADD)
    if (opts?.ttlSeconds !== undefined) {
      this.setExpiry.set(key, this.now() + opts.ttlSeconds * 1000);
    } else if (!this.setExpiry.has(key)) {
      this.setExpiry.set(key, null);
    }

    return Promise.resolve();
  }

  smembers(key: string): Promise<string[]> {
    this.evictSetIfExpired(key);

    const set = this.sets.get(key);
    return Promise.resolve(set ? Array.from(set) : []);
  }

  srem(key: string, member: string): Promise<void> {
    this.evictSetIfExpired(key);

    const set = this.sets.get(key);
    if (!set) return Promise.resolve();

    set.delete(member);
    // Redis drops a set key once its last member is removed
    if (set.size === 0) {
      this.sets.delete(key);
      this.setExpiry.delete(key);
    }
    return Promise.resolve();
  }
}
