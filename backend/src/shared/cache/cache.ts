/**
 * src/shared/cache/cache.ts
 *
 * WHY:
 * - Lockout counters, revocation markers, pending two-factor state and session
 *   records are short-lived security state: fast, externalized, TTL-driven.
 * - We depend on an abstraction so tests can use an in-memory implementation.
 *
 * HOW TO USE:
 * - cache.get(key)
 * - cache.set(key, value, { ttlSeconds })
 * - cache.set(key, value, { ttlMs })          // sub-second precision (revocation markers)
 * - cache.set(key, value, { keepTtl: true })  // do NOT refresh TTL
 * - cache.incr(key, { ttlSeconds }) -> counter; TTL is applied only when the key is created
 * - cache.ttl(key) -> remaining seconds (rounded up) or null
 * - cache.delIfEquals(key, expected) -> atomic compare-and-delete (single-use secrets)
 * - cache.setIfAbsent(key, value, { ttlMs }) -> atomic claim; true for the caller that created the key
 * - cache.sadd / smembers / srem -> Redis SET semantics for the per-identity session index
 */

export interface CacheSetOptions {
  ttlSeconds?: number;

  /** Takes precedence over ttlSeconds. */
  ttlMs?: number;

  /**
   * Keep existing TTL when overwriting a key.
   *
   * Used by the session registry: bump lastUsedAt WITHOUT extending the session lifetime.
   *
   * Redis supports this via SET ... KEEPTTL.
   * InMemCache preserves the existing expiry timestamp.
   */
  keepTtl?: boolean;
}

export interface Cache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, opts?: CacheSetOptions): Promise<void>;
  del(key: string): Promise<void>;

  /**
   * Atomically increment a counter. When the key did not exist (or had no expiry),
   * `ttlSeconds` starts its window; later increments never extend it.
   * Returns the new value.
   */
  incr(key: string, opts?: { ttlSeconds?: number }): Promise<number>;

  /**
   * Remaining lifetime in whole seconds (rounded up).
   * null when the key does not exist or never expires.
   */
  ttl(key: string): Promise<number | null>;

  /**
   * Delete `key` only if it currently holds `expected`.
   * Returns true for exactly one of any number of concurrent callers.
   */
  delIfEquals(key: string, expected: string): Promise<boolean>;

  /**
   * Create `key` only if it does not exist (SET NX).
   * Returns true for exactly one of any number of concurrent callers.
   */
  setIfAbsent(
    key: string,
    value: string,
    opts?: Pick<CacheSetOptions, 'ttlSeconds' | 'ttlMs'>,
  ): Promise<boolean>;

  /**
   * Add a member to a set. Idempotent: adding an existing member is a no-op.
   * Optionally refresh the TTL on the set key.
   */
  sadd(key: string, member: string, opts?: { ttlSeconds?: number }): Promise<void>;

  /**
   * Return all members of a set, or an empty array if the key does not exist.
   */
  smembers(key: string): Promise<string[]>;

  /**
   * Remove a member from a set. No-op if the member is not present.
   */
  srem(key: string, member: string): Promise<void>;
}
