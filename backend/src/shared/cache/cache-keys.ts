/**
 * src/shared/cache/cache-keys.ts
 *
 * WHY:
 * - Every cache namespace in one place. A typo in a key prefix silently breaks
 *   lockouts or revocation, so services never concatenate keys themselves.
 *
 * RULES:
 * - Prefixes are part of the operational contract (ops tooling greps for them).
 * - Identity-scoped keys take the integer identity id; token-scoped keys take the
 *   opaque token (or its hash for session records).
 */

export const CacheKeys = {
  revokedToken: (token: string) => `blacklist:${token}`,

  loginAttempts: (identityId: number) => `login_attempts:${identityId}`,
  loginLockout: (identityId: number) => `login_lockout:${identityId}`,

  emailCode: (identityId: number) => `2fa:${identityId}`,
  twoFactorAttempts: (identityId: number) => `2fa_attempts:${identityId}`,
  emailPendingSession: (pendingToken: string) => `2fa_session:${pendingToken}`,

  totpPendingSession: (pendingToken: string) => `totp_login:${pendingToken}`,
  totpSetup: (identityId: number) => `totp_setup:${identityId}`,
  totpFailures: (identityId: number) => `totp_fail:${identityId}`,

  session: (sessionId: string) => `session:${sessionId}`,
  identitySessions: (identityId: number) => `user_sessions:${identityId}`,
} as const;
