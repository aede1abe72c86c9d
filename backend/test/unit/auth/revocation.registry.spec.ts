import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { buildConfig } from '../../../src/app/config';
import { RevocationRegistry } from '../../../src/modules/auth/tokens/revocation.registry';
import { TokenService } from '../../../src/modules/auth/tokens/token.service';
import { InMemCache } from '../../../src/shared/cache/inmem-cache';
import { at, freezeClock } from '../../helpers/clock';

describe('RevocationRegistry', () => {
  let cache: InMemCache;
  let tokens: TokenService;
  let revocations: RevocationRegistry;

  beforeEach(() => {
    freezeClock();
    cache = new InMemCache();
    tokens = new TokenService(buildConfig(process.env).tokens);
    revocations = new RevocationRegistry({ cache, tokens });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('marks a token revoked until its natural expiry, then forgets it', async () => {
    const token = tokens.issue('access', { identityId: 1 });

    expect(await revocations.isRevoked(token)).toBe(false);
    expect(await revocations.revoke(token)).toBe(true);
    expect(await revocations.isRevoked(token)).toBe(true);

    at(1_799_999);
    expect(await revocations.isRevoked(token)).toBe(true);

    at(1_800_000);
    expect(await revocations.isRevoked(token)).toBe(false);
    expect(await cache.get(`blacklist:${token}`)).toBeNull();
  });

  it('sizes the marker to the remaining lifetime', async () => {
    const token = tokens.issue('access', { identityId: 1 });

    at(600_000);
    await revocations.revoke(token);
    expect(await cache.ttl(`blacklist:${token}`)).toBe(1_200);
  });

  it('revokes any kind it signed', async () => {
    const refresh = tokens.issue('refresh', { identityId: 1 });
    expect(await revocations.revoke(refresh)).toBe(true);
    expect(await revocations.isRevoked(refresh)).toBe(true);
  });

  it('claim succeeds once per token, sized to its remaining lifetime', async () => {
    const token = tokens.issue('password_reset', { identityId: 3 });

    at(600_000);
    const results = await Promise.all([revocations.claim(token), revocations.claim(token)]);

    expect(results.sort()).toEqual([false, true]);
    expect(await revocations.isRevoked(token)).toBe(true);
    expect(await cache.ttl(`blacklist:${token}`)).toBe(3_000);
  });

  it('claim refuses a token that is already revoked, expired or foreign', async () => {
    const revoked = tokens.issue('password_reset', { identityId: 3 });
    await revocations.revoke(revoked);
    expect(await revocations.claim(revoked)).toBe(false);

    const expiring = tokens.issue('password_reset', { identityId: 3 });
    at(3_600_000);
    expect(await revocations.claim(expiring)).toBe(false);

    expect(await revocations.claim('not-a-jwt')).toBe(false);
  });

  it('is a no-op for expired or unverifiable tokens', async () => {
    const expired = tokens.issue('access', { identityId: 1 }, 0);

    expect(await revocations.revoke(expired)).toBe(false);
    expect(await revocations.revoke('garbage')).toBe(false);
    expect(await cache.get(`blacklist:${expired}`)).toBeNull();
  });
});
