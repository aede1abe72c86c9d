/**
 * backend/src/shared/security/bcrypt-password-hasher.ts
 *
 * WHY:
 * - Bcrypt hashing behind PasswordHasher; cost comes from config (BCRYPT_COST).
 *
 * HOW TO USE:
 * - const hasher = new BcryptPasswordHasher({ cost: config.bcryptCost })
 * - const ok = await hasher.verify('secret', hash)
 *
 * NOTE:
 * - bcrypt only reads the first 72 bytes of input; the password policy caps
 *   length at 72 characters.
 */

import bcrypt from 'bcrypt';
import type { PasswordHasher } from './password-hasher';

const BCRYPT_PREFIX = /^\$2[aby]\$\d{2}\$/;

export class BcryptPasswordHasher implements PasswordHasher {
  private readonly cost: number;

  constructor(opts?: { cost?: number }) {
    this.cost = opts?.cost ?? 12;
  }

  async hash(plain: string): Promise<string> {
    return bcrypt.hash(plain, this.cost);
  }

  async verify(plain: string, hash: string): Promise<boolean> {
    if (!BCRYPT_PREFIX.test(hash)) return false;
    return bcrypt.compare(plain, hash);
  }
}
