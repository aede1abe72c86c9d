import { describe, it, expect } from 'vitest';
import { normalizeTotpCode, TotpService } from '../../../../src/shared/security/totp';

const totp = new TotpService('Authcore Test');
const T = Date.UTC(2026, 0, 15, 9, 0, 0);

describe('normalizeTotpCode', () => {
  it('strips spaces and dashes', () => {
    expect(normalizeTotpCode('123 456')).toBe('123456');
    expect(normalizeTotpCode('123-456')).toBe('123456');
    expect(normalizeTotpCode(' 123456 ')).toBe('123456');
  });

  it('rejects anything that is not exactly six digits', () => {
    expect(normalizeTotpCode('12345')).toBeNull();
    expect(normalizeTotpCode('1234567')).toBeNull();
    expect(normalizeTotpCode('abcdef')).toBeNull();
    expect(normalizeTotpCode('')).toBeNull();
  });
});

describe('TotpService', () => {
  it('generates 20-byte base32 secrets', () => {
    const secret = totp.generateSecret();
    expect(secret).toMatch(/^[A-Z2-7]{32}$/);
    expect(totp.generateSecret()).not.toBe(secret);
  });

  it('builds an otpauth URI carrying the secret', () => {
    const secret = totp.generateSecret();
    const uri = totp.buildUri(secret, 'alice@example.com');

    expect(uri.startsWith('otpauth://totp/')).toBe(true);
    expect(uri).toContain(`secret=${secret}`);
  });

  it('accepts the previous and next step with window 1', () => {
    const secret = totp.generateSecret();

    expect(totp.verify(secret, totp.generateCode(secret, T), { timestamp: T })).toBe(true);
    expect(totp.verify(secret, totp.generateCode(secret, T - 30_000), { timestamp: T })).toBe(true);
    expect(totp.verify(secret, totp.generateCode(secret, T + 30_000), { timestamp: T })).toBe(true);
  });

  it('rejects a code from three steps back', () => {
    const secret = totp.generateSecret();
    const stale = totp.generateCode(secret, T - 90_000);
    const live = new Set([-30_000, 0, 30_000].map((d) => totp.generateCode(secret, T + d)));

    // Codes of different steps can coincide (1 in a million); only assert when they don't.
    if (!live.has(stale)) {
      expect(totp.verify(secret, stale, { timestamp: T })).toBe(false);
    }
  });

  it('accepts a grouped code and rejects malformed input', () => {
    const secret = totp.generateSecret();
    const code = totp.generateCode(secret, T);

    expect(totp.verify(secret, `${code.slice(0, 3)} ${code.slice(3)}`, { timestamp: T })).toBe(true);
    expect(totp.verify(secret, 'abc', { timestamp: T })).toBe(false);
  });
});
