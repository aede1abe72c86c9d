/**
 * backend/src/shared/cache/redis-cache.ts
 *
 * WHY:
 * - Redis implementation of Cache used for lockouts, revocation markers, pending
 *   two-factor state and the session registry.
 *
 * IMPORTANT:
 * - In monorepos, importing RedisClientType can cause type conflicts if multiple copies of
 *   @redis/client exist. We avoid that by deriving the client type from createClient().
 * - delIfEquals runs as a Lua script so compare + delete is a single atomic step.
 * - setIfAbsent is SET NX: Redis replies OK only to the caller that created the key.
 *
 * LOGGING:
 * - Redis connection errors fire outside any flow context (they are client-level events).
 *   We use the global logger directly; withContext() is not applicable here.
 */

import { createClient } from 'redis';
import type { Cache, CacheSetOptions } from './cache';
import { logger } from '../logger/logger';

type RedisClient = ReturnType<typeof createClient>;

const DEL_IF_EQUALS_SCRIPT = `
if redis.call('GET', KEYS[1]) == ARGV[1] then
  return redis.call('DEL', KEYS[1])
end
return 0
`;

export class RedisCache implements Cache {
  private constructor(private readonly client: RedisClient) {}

  static async connect(redisUrl: string): Promise<RedisCache> {
    const client = createClient({ url: redisUrl });

    client.on('error', (err: Error) => {
      logger.error('redis.client_error', {
        flow: 'redis',
        message: err.message,
        stack: err.stack,
      });
    });

    await client.connect();
    return new RedisCache(client);
  }

  async close(): Promise<void> {
    await this.client.quit();
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string, opts?: CacheSetOptions): Promise<void> {
    if (opts?.ttlMs !== undefined) {
      await this.client.set(key, value, { PX: Math.max(1, Math.ceil(opts.ttlMs)) });
      return;
    }
    if (opts?.ttlSeconds !== undefined) {
      await this.client.set(key, value, { EX: opts.ttlSeconds });
      return;
    }
    if (opts?.keepTtl) {
      await this.client.set(key, value, { KEEPTTL: true });
      return;
    }
    await this.client.set(key, value);
  }

  async del(key: string): Promise<void> {
    await this.client.del(key);
  }

  async incr(key: string, opts?: { ttlSeconds?: number }): Promise<number> {
    const value = await this.client.incr(key);

    if (opts?.ttlSeconds) {
      const ttl = await this.client.ttl(key);
      if (ttl < 0) {
        await this.client.expire(key, opts.ttlSeconds);
      }
    }

    return value;
  }

  async ttl(key: string): Promise<number | null> {
    // -2: missing, -1: no expiry
    const ms = await this.client.pTTL(key);
    if (ms < 0) return null;
    return Math.ceil(ms / 1000);
  }

  async delIfEquals(key: string, expected: string): Promise<boolean> {
    const deleted = await this.client.eval(DEL_IF_EQUALS_SCRIPT, {
      keys: [key],
      arguments: [expected],
    });
    return deleted === 1;
  }

  async setIfAbsent(
    key: string,
    value: string,
    opts?: Pick<CacheSetOptions, 'ttlSeconds' | 'ttlMs'>,
  ): Promise<boolean> {
    const reply =
      opts?.ttlMs !== undefined
        ? await this.client.set(key, value, { NX: true, PX: Math.max(1, Math.ceil(opts.ttlMs)) })
        : opts?.ttlSeconds !== undefined
          ? await this.client.set(key, value, { NX: true, EX: opts.ttlSeconds })
          : await this.client.set(key, value, { NX: true });
    return reply === 'OK';
  }

  async sadd(key: string, member: string, opts?: { ttlSeconds?: number }): Promise<void> {
    await this.client.sAdd(key, member);
    if (opts?.ttlSeconds !== undefined) {
      await this.client.expire(key, opts.ttlSeconds);
    }
  }

  async smembers(key: string): Promise<string[]> {
    return this.client.sMembers(key);
  }

  async srem(key: string, member: string): Promise<void> {
    await this.client.sRem(key, member);
  }
}
