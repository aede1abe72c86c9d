/**
 * src/shared/security/totp.ts
 *
 * WHY:
 * - Thin wrapper over the otpauth library (RFC 6238 TOTP).
 * - Keeps the TOTP implementation detail isolated so we can swap libraries
 *   without touching two-factor code.
 *
 * RULES:
 * - No business logic here.
 * - No DB access.
 * - Secret is always passed in as a base32 string (decrypted by caller before use).
 * - generateSecret() returns a base32 string suitable for direct use in OTP URIs.
 *
 * INPUT:
 * - Codes are normalized before checking: whitespace and dashes are stripped
 *   ("123 456", "123-456"). Anything that is not then exactly 6 digits is rejected
 *   without touching the library.
 *
 * WINDOW:
 * - Default ±1 step tolerance = 90-second window (prev, current, next 30s slot).
 * - otpauth `window` parameter: 1 means ±1 step.
 */

import * as OTPAuth from 'otpauth';

const ALGORITHM = 'SHA1';
const DIGITS = 6;
const PERIOD = 30;
const SECRET_BYTES = 20;

export type TotpVerifyOptions = {
  window?: number;
  /** ms since epoch; defaults to now. */
  timestamp?: number;
};

export function normalizeTotpCode(code: string): string | null {
  const stripped = code.replace(/[\s-]/g, '');
  return /^\d{6}$/.test(stripped) ? stripped : null;
}

export class TotpService {
  constructor(private readonly issuer: string) {}

  private totp(secret: string, label?: string): OTPAuth.TOTP {
    return new OTPAuth.TOTP({
      issuer: this.issuer,
      label,
      algorithm: ALGORITHM,
      digits: DIGITS,
      period: PERIOD,
      secret: OTPAuth.Secret.fromBase32(secret),
    });
  }

  /** Random 20-byte secret, base32-encoded (32 chars). */
  generateSecret(): string {
    return new OTPAuth.Secret({ size: SECRET_BYTES }).base32;
  }

  /**
   * otpauth://totp/... URI for authenticator apps.
   *
   * @param account - shown in the authenticator app as the account label (email)
   */
  buildUri(secret: string, account: string): string {
    return this.totp(secret, account).toString();
  }

  verify(secret: string, code: string, opts: TotpVerifyOptions = {}): boolean {
    const token = normalizeTotpCode(code);
    if (token === null) return false;

    const delta = this.totp(secret).validate({
      token,
      window: opts.window ?? 1,
      timestamp: opts.timestamp,
    });
    return delta !== null;
  }

  /** Code for the step containing `timestamp` (now by default). */
  generateCode(secret: string, timestamp?: number): string {
    return this.totp(secret).generate({ timestamp });
  }
}
