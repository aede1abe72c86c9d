/**
 * backend/src/shared/security/token-hasher.ts
 *
 * WHY:
 * - Session records are keyed by a hash of the bearer token, never the token itself,
 *   so a cache dump does not yield usable tokens.
 * - Callers depend on the TokenHasher interface; Sha256TokenHasher is the only
 *   implementation today.
 *
 * HOW TO USE:
 * - const hasher = new Sha256TokenHasher({ length: 32 })
 * - const sessionId = hasher.hash(token)   // first 32 lowercase hex chars of SHA-256
 */

import { createHash } from 'node:crypto';

export interface TokenHasher {
  hash(rawToken: string): string;
}

export class Sha256TokenHasher implements TokenHasher {
  private readonly length: number | undefined;

  constructor(opts?: { length?: number }) {
    this.length = opts?.length;
  }

  hash(rawToken: string): string {
    const digest = createHash('sha256').update(rawToken).digest('hex');
    return this.length === undefined ? digest : digest.slice(0, this.length);
  }
}
