import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createHash } from 'node:crypto';
import { InMemCache } from '../../../../src/shared/cache/inmem-cache';
import { logger } from '../../../../src/shared/logger/logger';
import { Sha256TokenHasher } from '../../../../src/shared/security/token-hasher';
import { SessionRegistry } from '../../../../src/shared/session/session.registry';
import { at, freezeClock, isoAt } from '../../../helpers/clock';

const TTL = 3_600;

function sessionIdOf(token: string): string {
  return createHash('sha256').update(token).digest('hex').slice(0, 32);
}

describe('SessionRegistry', () => {
  let cache: InMemCache;
  let registry: SessionRegistry;

  beforeEach(() => {
    freezeClock();
    cache = new InMemCache();
    registry = new SessionRegistry({
      cache,
      hasher: new Sha256TokenHasher({ length: 32 }),
      logger,
      ttlSeconds: TTL,
    });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('derives the session id from the token and is idempotent', async () => {
    const first = await registry.register(1, 'token-a', '10.0.0.1', 'curl/8.4.0');

    at(60_000);
    const second = await registry.register(1, 'token-a', '10.0.0.1', 'curl/8.4.0');

    expect(first).toBe(sessionIdOf('token-a'));
    expect(second).toBe(first);
    expect(await cache.smembers('user_sessions:1')).toEqual([first]);

    const [view] = await registry.list(1);
    expect(view?.createdAt).toBe(isoAt(0));
    expect(view?.lastUsedAt).toBe(isoAt(60_000));
  });

  it('stores the record with the configured TTL', async () => {
    const id = await registry.register(1, 'token-a');
    expect(await cache.ttl(`session:${id}`)).toBe(TTL);
  });

  it('a rotated token takes over the record it replaces', async () => {
    const old = await registry.register(1, 'access-1', '192.0.2.10', 'Mozilla/5.0 (Android 14; Mobile)');

    at(120_000);
    const next = await registry.register(1, 'access-2', null, null, { replaces: old });

    expect(await registry.get(old)).toBeNull();
    expect(await cache.smembers('user_sessions:1')).toEqual([next]);
    expect(await registry.get(next)).toEqual({
      identityId: 1,
      createdAt: isoAt(0),
      lastUsedAt: isoAt(120_000),
      ip: '192.0.2.10',
      userAgent: 'Mozilla/5.0 (Android 14; Mobile)',
      deviceClass: 'mobile',
    });
    expect(await cache.ttl(`session:${next}`)).toBe(TTL);
  });

  it('a fresh client ip wins over the replaced record', async () => {
    const old = await registry.register(1, 'access-1', '192.0.2.10');
    const next = await registry.register(1, 'access-2', '198.51.100.7', null, { replaces: old });

    expect((await registry.get(next))?.ip).toBe('198.51.100.7');
  });

  it('never takes over a record owned by another identity', async () => {
    at(5_000);
    const foreign = await registry.register(2, 'access-x');

    at(10_000);
    const next = await registry.register(1, 'access-y', null, null, { replaces: foreign });

    expect((await registry.get(next))?.createdAt).toBe(isoAt(10_000));
    expect(await registry.get(foreign)).not.toBeNull();
    expect(await cache.smembers('user_sessions:2')).toEqual([foreign]);
  });

  it('replacing a session that already expired starts a new one', async () => {
    const old = await registry.register(1, 'access-1');

    at(3_600_000);
    const next = await registry.register(1, 'access-2', null, null, { replaces: old });

    expect((await registry.get(next))?.createdAt).toBe(isoAt(3_600_000));
    expect(await registry.list(1)).toHaveLength(1);
  });

  it('lists most recently used first and flags the current session', async () => {
    const id1 = await registry.register(1, 't1');
    at(1_000);
    const id2 = await registry.register(1, 't2');
    at(2_000);
    const id3 = await registry.register(1, 't3');
    at(3_000);
    expect(await registry.touch('t1')).toBe(true);

    const views = await registry.list(1, 't3');

    expect(views.map((v) => v.sessionId)).toEqual([id1, id3, id2]);
    expect(views.map((v) => v.isCurrent)).toEqual([false, true, false]);
  });

  it('three sessions, one revoked by id → two listed; revokeAll(except current) leaves one', async () => {
    const id1 = await registry.register(7, 't1');
    await registry.register(7, 't2');
    await registry.register(7, 't3');

    expect(await registry.revoke(7, id1)).toBe(true);
    expect(await registry.list(7)).toHaveLength(2);

    expect(await registry.revokeAll(7, 't3')).toBe(1);

    const remaining = await registry.list(7, 't3');
    expect(remaining).toHaveLength(1);
    expect(remaining[0]?.sessionId).toBe(sessionIdOf('t3'));
    expect(remaining[0]?.isCurrent).toBe(true);
  });

  it('refuses to revoke a session owned by someone else', async () => {
    const id = await registry.register(1, 't1');

    expect(await registry.revoke(2, id)).toBe(false);
    expect(await registry.list(1)).toHaveLength(1);
  });

  it('revokeAll without a token to keep drops everything', async () => {
    await registry.register(1, 't1');
    await registry.register(1, 't2');

    expect(await registry.revokeAll(1)).toBe(2);
    expect(await registry.list(1)).toEqual([]);
  });

  it('prunes ids whose record has expired on read', async () => {
    const stale = await registry.register(1, 't1');
    at(1_800_000);
    const live = await registry.register(1, 't2');

    at(3_600_000);
    const views = await registry.list(1);

    expect(views.map((v) => v.sessionId)).toEqual([live]);
    expect(await cache.smembers('user_sessions:1')).toEqual([live]);
    expect(await registry.get(stale)).toBeNull();
  });

  it('touch bumps lastUsedAt without extending the lifetime', async () => {
    const id = await registry.register(1, 't1');

    at(3_000_000);
    await registry.touch('t1');
    expect((await registry.get(id))?.lastUsedAt).toBe(isoAt(3_000_000));

    at(3_600_000);
    expect(await registry.get(id)).toBeNull();
    expect(await registry.touch('t1')).toBe(false);
  });

  it('truncates the user agent in the view and records the device class', async () => {
    await registry.register(1, 't1', '192.0.2.10', 'a'.repeat(150));

    const [view] = await registry.list(1);
    expect(view?.userAgent).toBe('a'.repeat(100));
    expect(view?.ip).toBe('192.0.2.10');
    expect(view?.deviceClass).toBe('other');
  });

  it('treats a corrupted record as missing and removes it', async () => {
    await cache.set('session:broken', 'not json', { ttlSeconds: 60 });

    expect(await registry.get('broken')).toBeNull();
    expect(await cache.get('session:broken')).toBeNull();
  });
});
