import { describe, it, expect } from 'vitest';
import { EncryptionService } from '../../../../src/shared/security/encryption';
import { safeEqual } from '../../../../src/shared/security/safe-equal';

const key = Buffer.alloc(32, 7).toString('base64');

describe('EncryptionService', () => {
  it('round-trips and uses a fresh IV per call', () => {
    const enc = new EncryptionService(key);

    const a = enc.encrypt('JBSWY3DPEHPK3PXP');
    const b = enc.encrypt('JBSWY3DPEHPK3PXP');

    expect(a).not.toBe(b);
    expect(enc.decrypt(a)).toBe('JBSWY3DPEHPK3PXP');
    expect(enc.decrypt(b)).toBe('JBSWY3DPEHPK3PXP');
  });

  it('rejects tampered ciphertext', () => {
    const enc = new EncryptionService(key);
    const packed = Buffer.from(enc.encrypt('secret'), 'base64');
    packed[packed.length - 1] ^= 0xff;

    expect(() => enc.decrypt(packed.toString('base64'))).toThrow();
  });

  it('rejects ciphertext produced under another key', () => {
    const other = new EncryptionService(Buffer.alloc(32, 9).toString('base64'));
    const packed = other.encrypt('secret');

    expect(() => new EncryptionService(key).decrypt(packed)).toThrow();
  });

  it('refuses keys that are not 32 bytes', () => {
    expect(() => new EncryptionService(Buffer.alloc(16).toString('base64'))).toThrow(
      'EncryptionService: TOTP_ENCRYPTION_KEY_BASE64 must decode to 32 bytes, got 16.',
    );
  });
});

describe('safeEqual', () => {
  it('compares by content', () => {
    expect(safeEqual('123456', '123456')).toBe(true);
    expect(safeEqual('123456', '123457')).toBe(false);
    expect(safeEqual('123456', '12345')).toBe(false);
  });
});
