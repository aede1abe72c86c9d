/**
 * backend/src/modules/auth/index.ts
 *
 * WHY:
 * - Define the public surface of the auth module.
 * - Transport code imports from here, never from flows/ or helpers/.
 */

export { createAuthModule, type AuthModule } from './auth.module';
export { AuthService, type OAuthLoginResult } from './auth.service';
export { AuthError, AuthErrors, isAuthError, AUTH_ERROR_KINDS } from './auth.errors';
export type { AuthErrorKind } from './auth.errors';
export type {
  AuthSession,
  ClientInfo,
  LoginResult,
  TokenClaims,
  TokenKind,
  TokenPair,
  TotpSetup,
  TwoFactorChallenge,
  TwoFactorChannel,
} from './auth.types';
export type { LoginInput } from './flows/login/execute-login-flow';
export type { OAuthProfile } from './oauth/oauth-linker';
