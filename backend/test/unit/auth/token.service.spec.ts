import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import jwt from 'jsonwebtoken';
import { buildConfig } from '../../../src/app/config';
import { TOKEN_KINDS } from '../../../src/modules/auth/auth.constants';
import type { TokenKind } from '../../../src/modules/auth/auth.types';
import { TokenService } from '../../../src/modules/auth/tokens/token.service';
import { captureAuthErrorSync } from '../../helpers/auth-error';
import { at, freezeClock, T0 } from '../../helpers/clock';

const config = buildConfig(process.env).tokens;

describe('TokenService', () => {
  let tokens: TokenService;

  beforeEach(() => {
    freezeClock();
    tokens = new TokenService(config);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it.each(TOKEN_KINDS)('issue → validate round-trips the subject for %s tokens', (kind) => {
    const token = tokens.issue(kind, { identityId: 42 });
    const claims = tokens.validate(token, kind);

    expect(claims.identityId).toBe(42);
    expect(claims.kind).toBe(kind);
    expect(claims.expiresAt).toBe(T0 / 1000 + tokens.defaultTtlSeconds(kind));
  });

  const mismatches: Array<[TokenKind, TokenKind]> = [
    ['access', 'refresh'],
    ['refresh', 'access'],
    ['password_reset', 'email_verification'],
    ['email_verification', 'access'],
  ];

  it.each(mismatches)('a %s token is rejected where %s is expected', (kind, expected) => {
    const token = tokens.issue(kind, { identityId: 42 });
    expect(captureAuthErrorSync(() => tokens.validate(token, expected)).kind).toBe(
      'INVALID_OR_EXPIRED_TOKEN',
    );
  });

  it('accepts any kind when no kind is expected', () => {
    const token = tokens.issue('refresh', { identityId: 7 });
    expect(tokens.validate(token, null).kind).toBe('refresh');
  });

  it('uses the configured default lifetimes', () => {
    expect(tokens.defaultTtlSeconds('access')).toBe(1_800);
    expect(tokens.defaultTtlSeconds('refresh')).toBe(604_800);
    expect(tokens.defaultTtlSeconds('password_reset')).toBe(3_600);
    expect(tokens.defaultTtlSeconds('email_verification')).toBe(86_400);
  });

  it('expires access tokens after their lifetime', () => {
    const token = tokens.issue('access', { identityId: 1 });

    at(1_799_000);
    expect(tokens.validate(token, 'access').identityId).toBe(1);

    at(1_800_000);
    expect(captureAuthErrorSync(() => tokens.validate(token, 'access')).kind).toBe(
      'INVALID_OR_EXPIRED_TOKEN',
    );
  });

  it('a zero ttl override yields an already-expired token', () => {
    const token = tokens.issue('access', { identityId: 1 }, 0);
    expect(captureAuthErrorSync(() => tokens.validate(token, 'access')).kind).toBe(
      'INVALID_OR_EXPIRED_TOKEN',
    );
  });

  it('rejects tokens signed with another secret', () => {
    const foreign = new TokenService({ ...config, secret: 'other-test-secret-other-test-secret-00' });
    const token = foreign.issue('access', { identityId: 1 });

    expect(captureAuthErrorSync(() => tokens.validate(token, 'access')).kind).toBe(
      'INVALID_OR_EXPIRED_TOKEN',
    );
    expect(tokens.decode(token)).toBeNull();
  });

  it('rejects well-signed tokens with malformed claims', () => {
    const token = jwt.sign(
      { sub: 'not-a-number', type: 'access', exp: T0 / 1000 + 60, jti: 'x' },
      config.secret,
      { algorithm: 'HS256' },
    );
    expect(captureAuthErrorSync(() => tokens.validate(token, 'access')).kind).toBe(
      'INVALID_OR_EXPIRED_TOKEN',
    );
  });

  it('rejects garbage', () => {
    expect(captureAuthErrorSync(() => tokens.validate('not.a.jwt', null)).kind).toBe(
      'INVALID_OR_EXPIRED_TOKEN',
    );
    expect(tokens.decode('not.a.jwt')).toBeNull();
  });

  it('decode ignores kind and expiry', () => {
    const token = tokens.issue('password_reset', { identityId: 9 });

    at(3_600_000 + 1_000);
    expect(tokens.decode(token)).toMatchObject({ identityId: 9, kind: 'password_reset' });
  });

  it('issuePair returns a bearer access/refresh pair with advisory claims', () => {
    const pair = tokens.issuePair({ identityId: 5, username: 'alice', role: 'admin' });

    expect(pair.tokenType).toBe('bearer');
    expect(tokens.validate(pair.accessToken, 'access')).toMatchObject({
      identityId: 5,
      username: 'alice',
      role: 'admin',
    });
    expect(tokens.validate(pair.refreshToken, 'refresh').identityId).toBe(5);
  });

  it('issuePair binds the refresh token to the session of its access token', () => {
    const pair = tokens.issuePair({ identityId: 5 }, (access) => `sid-for-${access.length}`);

    const refresh = tokens.validate(pair.refreshToken, 'refresh');
    expect(refresh.sessionId).toBe(`sid-for-${pair.accessToken.length}`);
    expect(tokens.validate(pair.accessToken, 'access').sessionId).toBeUndefined();
  });

  it('issuePair without a binding leaves sessionId unset', () => {
    const pair = tokens.issuePair({ identityId: 5 });
    expect(tokens.validate(pair.refreshToken, 'refresh').sessionId).toBeUndefined();
  });

  it('never mints the same token twice within a second', () => {
    const a = tokens.issue('access', { identityId: 1 });
    const b = tokens.issue('access', { identityId: 1 });

    expect(a).not.toBe(b);
    expect(tokens.validate(a, 'access').tokenId).not.toBe(tokens.validate(b, 'access').tokenId);
  });
});
