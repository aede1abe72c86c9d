/**
 * src/modules/auth/auth.types.ts
 *
 * WHY:
 * - Domain types for the Auth module: tokens, two-factor challenges and the
 *   results login/verification flows hand back to the transport layer.
 *
 * RULES:
 * - Never include password hashes or TOTP secrets in result types.
 * - Token claims are advisory: callers re-read the identity before trusting
 *   username/role.
 */

import type { Role } from '../identities';
import type { TOKEN_KINDS, TOKEN_TYPE, TWO_FACTOR_CHANNELS } from './auth.constants';

export type TokenKind = (typeof TOKEN_KINDS)[number];

export type TokenSubject = {
  identityId: number;
  username?: string;
  role?: Role;
  /** Written as the `sid` claim. */
  sessionId?: string;
};

export type TokenClaims = {
  identityId: number;
  kind: TokenKind;
  /** Seconds since epoch. */
  expiresAt: number;
  /** Random per-token id. */
  tokenId: string;
  username?: string;
  role?: string;
  /** Refresh tokens only: the session the pair was issued for. */
  sessionId?: string;
};

export type TokenPair = {
  accessToken: string;
  refreshToken: string;
  tokenType: typeof TOKEN_TYPE;
};

export type TwoFactorChannel = (typeof TWO_FACTOR_CHANNELS)[number];

export type TwoFactorChallenge = {
  channel: TwoFactorChannel;
  pendingToken: string;
};

/** Where a request came from; both fields are optional hints for the session record. */
export type ClientInfo = {
  ip?: string | null;
  userAgent?: string | null;
};

export type AuthSession = {
  tokens: TokenPair;
  sessionId: string;
};

export type LoginResult =
  | ({ status: 'AUTHENTICATED' } & AuthSession)
  | ({ status: 'TWO_FACTOR_REQUIRED' } & TwoFactorChallenge);

export type TotpSetup = {
  /** base32 secret for manual entry */
  secret: string;
  provisioningUri: string;
  /** The provisioning URI rendered as a QR code: data:image/png;base64,... */
  qrCodePayload: string;
};
