/**
 * src/modules/auth/tokens/token.service.ts
 *
 * WHY:
 * - Issues and validates the signed JWTs this core hands out.
 * - A token is accepted only by a validator expecting its exact kind: a refresh
 *   token is never an access token, a reset token never logs anyone in.
 *
 * CLAIMS:
 * - sub: identity id (string), type: token kind, exp: seconds since epoch
 * - jti: random per token, so two tokens minted in the same second never collide
 * - username/role: advisory only; always re-read the identity before trusting them
 * - sid (refresh only): session id of the paired access token, so a rotation
 *   can carry that session forward instead of opening a new one
 *
 * RULES:
 * - Every verification failure (bad signature, expiry, malformed claims, wrong
 *   kind) collapses into AuthErrors.invalidOrExpiredToken().
 * - Errors that are not JWT failures propagate unchanged.
 * - Revocation is NOT checked here (see RevocationRegistry).
 */

import jwt, { type JwtPayload } from 'jsonwebtoken';
import { z } from 'zod';

import type { JwtAlgorithm } from '../../../app/config';
import { generateSecureToken } from '../../../shared/security/token';
import { TOKEN_KINDS, TOKEN_TYPE } from '../auth.constants';
import { AuthErrors } from '../auth.errors';
import type { TokenClaims, TokenKind, TokenPair, TokenSubject } from '../auth.types';

const ClaimsSchema = z.object({
  sub: z.string().regex(/^\d+$/),
  type: z.enum(TOKEN_KINDS),
  exp: z.number().int(),
  jti: z.string().min(1),
  username: z.string().optional(),
  role: z.string().optional(),
  sid: z.string().optional(),
});

export type TokenServiceConfig = {
  secret: string;
  algorithm: JwtAlgorithm;
  accessTtlSeconds: number;
  refreshTtlSeconds: number;
  passwordResetTtlSeconds: number;
  emailVerificationTtlSeconds: number;
};

export class TokenService {
  constructor(private readonly config: TokenServiceConfig) {}

  defaultTtlSeconds(kind: TokenKind): number {
    switch (kind) {
      case 'access':
        return this.config.accessTtlSeconds;
      case 'refresh':
        return this.config.refreshTtlSeconds;
      case 'password_reset':
        return this.config.passwordResetTtlSeconds;
      case 'email_verification':
        return this.config.emailVerificationTtlSeconds;
    }
  }

  /**
   * Signs a token of `kind` for `subject`.
   * A non-positive ttlOverrideSeconds yields an already-expired token.
   */
  issue(kind: TokenKind, subject: TokenSubject, ttlOverrideSeconds?: number): string {
    const nowSeconds = Math.floor(Date.now() / 1000);
    const ttl = ttlOverrideSeconds ?? this.defaultTtlSeconds(kind);

    const payload: Record<string, string | number> = {
      sub: String(subject.identityId),
      type: kind,
      exp: nowSeconds + ttl,
      jti: generateSecureToken(16),
    };
    if (subject.username !== undefined) payload.username = subject.username;
    if (subject.role !== undefined) payload.role = subject.role;
    if (subject.sessionId !== undefined) payload.sid = subject.sessionId;

    return jwt.sign(payload, this.config.secret, { algorithm: this.config.algorithm });
  }

  /**
   * Signs an access/refresh pair. `bindSession` maps the new access token to
   * its session id, which the refresh token then carries as `sid`.
   */
  issuePair(subject: TokenSubject, bindSession?: (accessToken: string) => string): TokenPair {
    const accessToken = this.issue('access', subject);
    const sessionId = bindSession ? bindSession(accessToken) : undefined;
    return {
      accessToken,
      refreshToken: this.issue('refresh', { ...subject, sessionId }),
      tokenType: TOKEN_TYPE,
    };
  }

  /**
   * Verifies signature + expiry, then the claim shape and (unless null) the kind.
   */
  validate(token: string, expectedKind: TokenKind | null): TokenClaims {
    const claims = this.verify(token, { ignoreExpiration: false });
    if (!claims) throw AuthErrors.invalidOrExpiredToken();
    if (expectedKind !== null && claims.kind !== expectedKind) {
      throw AuthErrors.invalidOrExpiredToken();
    }
    return claims;
  }

  /**
   * Signature-checked decode that ignores kind and expiry.
   * Returns null for anything that was not signed by us or is malformed.
   */
  decode(token: string): TokenClaims | null {
    return this.verify(token, { ignoreExpiration: true });
  }

  private verify(token: string, opts: { ignoreExpiration: boolean }): TokenClaims | null {
    let payload: string | JwtPayload;
    try {
      payload = jwt.verify(token, this.config.secret, {
        algorithms: [this.config.algorithm],
        ignoreExpiration: opts.ignoreExpiration,
      });
    } catch (err) {
      if (err instanceof jwt.JsonWebTokenError) return null;
      throw err;
    }

    const parsed = ClaimsSchema.safeParse(payload);
    if (!parsed.success) return null;

    return {
      identityId: Number(parsed.data.sub),
      kind: parsed.data.type,
      expiresAt: parsed.data.exp,
      tokenId: parsed.data.jti,
      username: parsed.data.username,
      role: parsed.data.role,
      sessionId: parsed.data.sid,
    };
  }
}
