/**
 * backend/src/shared/security/token.ts
 *
 * WHY:
 * - Random values for pending two-factor sessions and one-time codes must come
 *   from a CSPRNG, consistently across the system.
 *
 * HOW TO USE:
 * - const pendingToken = generateSecureToken()   // URL-safe, 256 bits
 * - const code = generateNumericCode(6)          // "042917"
 * - const suffix = generateHexSuffix(8)          // "9f03ab1c"
 */

import { randomBytes, randomInt } from 'node:crypto';

export function generateSecureToken(bytes: number = 32): string {
  // URL-safe base64 (no + / =)
  return randomBytes(bytes).toString('base64url');
}

/** Uniformly random digits, leading zeros kept. */
export function generateNumericCode(digits: number = 6): string {
  let code = '';
  for (let i = 0; i < digits; i++) {
    code += String(randomInt(0, 10));
  }
  return code;
}

export function generateHexSuffix(length: number = 8): string {
  return randomBytes(Math.ceil(length / 2))
    .toString('hex')
    .slice(0, length);
}
