/**
 * src/shared/session/session.registry.ts
 *
 * WHY:
 * - Tracks one record per issued token so an identity can see and revoke its
 *   active sessions ("sign out other devices").
 * - TTL enforced at cache level (no expired record can be read).
 *
 * KEYS:
 * - session:{sessionId}          → JSON SessionRecord, TTL = refresh-token lifetime
 * - user_sessions:{identityId}   → SET of session ids, TTL refreshed on every register
 * - sessionId = first 32 hex chars of sha256(token): re-registering the same
 *   token yields the same id, so register() is idempotent under races.
 *
 * INDEX HYGIENE:
 * - Records expire on their own; their ids linger in the index until list()
 *   notices the missing record and SREMs it (lazy pruning, no sweeper).
 *
 * RULES:
 * - Depends only on Cache + TokenHasher (DIP). Works with Redis in prod, InMemCache in tests.
 * - No business rules: whether a revoked session also revokes its token is the
 *   auth service's decision.
 */

import type { Cache } from '../cache/cache';
import { CacheKeys } from '../cache/cache-keys';
import type { Logger } from '../logger/logger';
import type { TokenHasher } from '../security/token-hasher';
import { detectDeviceClass } from './device-class';
import {
  SessionRecordSchema,
  USER_AGENT_VIEW_LENGTH,
  type SessionRecord,
  type SessionView,
} from './session.types';

export class SessionRegistry {
  constructor(
    private readonly deps: {
      cache: Cache;
      hasher: TokenHasher;
      logger: Logger;
      ttlSeconds: number;
    },
  ) {}

  sessionIdFor(token: string): string {
    return this.deps.hasher.hash(token);
  }

  /**
   * Creates (or refreshes) the record for `token` and returns its session id.
   * A re-registration keeps the original createdAt.
   *
   * `replaces` names the session this token succeeds (token rotation): when
   * that record is live and owned by the same identity, the new record keeps
   * its createdAt (and ip/userAgent when the client sends none) and the old
   * record is dropped, so one device stays one session.
   */
  async register(
    identityId: number,
    token: string,
    ip?: string | null,
    userAgent?: string | null,
    opts: { replaces?: string } = {},
  ): Promise<string> {
    const sessionId = this.sessionIdFor(token);
    const now = new Date().toISOString();
    const existing = await this.get(sessionId);

    const predecessor =
      opts.replaces && opts.replaces !== sessionId ? await this.get(opts.replaces) : null;
    const carried = predecessor && predecessor.identityId === identityId ? predecessor : null;

    const createdAt =
      existing && existing.identityId === identityId
        ? existing.createdAt
        : (carried?.createdAt ?? now);
    const agent = userAgent ?? carried?.userAgent ?? null;

    const record: SessionRecord = {
      identityId,
      createdAt,
      lastUsedAt: now,
      ip: ip ?? carried?.ip ?? null,
      userAgent: agent,
      deviceClass: detectDeviceClass(agent),
    };

    await this.deps.cache.set(CacheKeys.session(sessionId), JSON.stringify(record), {
      ttlSeconds: this.deps.ttlSeconds,
    });

    // Index TTL tracks the newest session so it never expires before a live record.
    await this.deps.cache.sadd(CacheKeys.identitySessions(identityId), sessionId, {
      ttlSeconds: this.deps.ttlSeconds,
    });

    if (carried && opts.replaces) {
      await this.deps.cache.del(CacheKeys.session(opts.replaces));
      await this.deps.cache.srem(CacheKeys.identitySessions(identityId), opts.replaces);
    }

    this.deps.logger.info('session.registered', {
      flow: 'session.register',
      identityId,
      sessionId: sessionId.slice(0, 8),
      deviceClass: record.deviceClass,
      rotated: carried !== null,
    });

    return sessionId;
  }

  /** Loads a record by id. Returns null if expired, missing or unreadable. */
  async get(sessionId: string): Promise<SessionRecord | null> {
    const key = CacheKeys.session(sessionId);
    const raw = await this.deps.cache.get(key);
    if (!raw) return null;

    const parsed = SessionRecordSchema.safeParse(safeJson(raw));
    if (!parsed.success) {
      // Corrupted record: treat as missing
      await this.deps.cache.del(key);
      return null;
    }
    return parsed.data;
  }

  /** Active sessions, most recently used first. */
  async list(identityId: number, currentToken?: string): Promise<SessionView[]> {
    const indexKey = CacheKeys.identitySessions(identityId);
    const sessionIds = await this.deps.cache.smembers(indexKey);
    if (sessionIds.length === 0) return [];

    const currentId = currentToken ? this.sessionIdFor(currentToken) : null;
    const views: SessionView[] = [];
    const stale: string[] = [];

    for (const sessionId of sessionIds) {
      const record = await this.get(sessionId);
      if (!record || record.identityId !== identityId) {
        stale.push(sessionId);
        continue;
      }
      views.push(toView(sessionId, record, sessionId === currentId));
    }

    await Promise.all(stale.map((id) => this.deps.cache.srem(indexKey, id)));

    return views.sort(
      (a, b) =>
        b.lastUsedAt.localeCompare(a.lastUsedAt) ||
        b.createdAt.localeCompare(a.createdAt) ||
        a.sessionId.localeCompare(b.sessionId),
    );
  }

  /**
   * Bumps lastUsedAt WITHOUT extending the record's lifetime.
   * Returns false when there is no live record for the token.
   */
  async touch(token: string): Promise<boolean> {
    const sessionId = this.sessionIdFor(token);
    const record = await this.get(sessionId);
    if (!record) return false;

    const updated: SessionRecord = { ...record, lastUsedAt: new Date().toISOString() };
    await this.deps.cache.set(CacheKeys.session(sessionId), JSON.stringify(updated), {
      keepTtl: true,
    });
    return true;
  }

  /** Deletes the session only if it belongs to `identityId`. */
  async revoke(identityId: number, sessionId: string): Promise<boolean> {
    const record = await this.get(sessionId);
    if (!record || record.identityId !== identityId) return false;

    await this.deps.cache.del(CacheKeys.session(sessionId));
    await this.deps.cache.srem(CacheKeys.identitySessions(identityId), sessionId);

    this.deps.logger.info('session.revoked', {
      flow: 'session.revoke',
      identityId,
      sessionId: sessionId.slice(0, 8),
    });
    return true;
  }

  /**
   * Deletes every indexed session except the one for `exceptToken`.
   * Returns how many ids were removed from the index.
   */
  async revokeAll(identityId: number, exceptToken?: string): Promise<number> {
    const indexKey = CacheKeys.identitySessions(identityId);
    const keepId = exceptToken ? this.sessionIdFor(exceptToken) : null;
    const sessionIds = await this.deps.cache.smembers(indexKey);

    const doomed = sessionIds.filter((id) => id !== keepId);

    await Promise.all(
      doomed.map(async (id) => {
        await this.deps.cache.del(CacheKeys.session(id));
        await this.deps.cache.srem(indexKey, id);
      }),
    );

    this.deps.logger.info('session.revoked_all', {
      flow: 'session.revoke_all',
      identityId,
      revokedCount: doomed.length,
      keptCurrent: keepId !== null && sessionIds.includes(keepId),
    });

    return doomed.length;
  }
}

function safeJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

function toView(sessionId: string, record: SessionRecord, isCurrent: boolean): SessionView {
  return {
    sessionId,
    createdAt: record.createdAt,
    lastUsedAt: record.lastUsedAt,
    ip: record.ip,
    userAgent: record.userAgent ? record.userAgent.slice(0, USER_AGENT_VIEW_LENGTH) : null,
    deviceClass: record.deviceClass,
    isCurrent,
  };
}
