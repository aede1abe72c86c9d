/**
 * src/modules/auth/auth.service.ts
 *
 * WHY:
 * - Single entry point the transport layer talks to: login, token lifecycle,
 *   password reset/change, email verification, sessions and OAuth sign-in.
 * - Orchestration only. Use-cases with more than a couple of steps live in
 *   flows/; the building blocks (TokenService, RevocationRegistry, LoginGuard,
 *   TwoFactorController, SessionRegistry, OAuthIdentityLinker) are injected.
 *
 * RULES:
 * - Token claims are advisory: every authenticated call re-reads the identity.
 * - A token is honored only if it validates for its kind AND is not revoked.
 * - Session records are advisory: revoking a session drops the record, it does
 *   not revoke the token (logout does both). See DESIGN.md.
 * - Never store/log raw passwords, tokens or codes.
 *
 * STRUCTURE:
 * - refresh(): rotation. The presented refresh token is revoked before the new
 *   pair is issued, so each refresh token works once.
 * - requestPasswordReset(): always returns void regardless of outcome
 *   (anti-enumeration).
 * - resetPassword(): single-use token, then every session is dropped.
 *   No auto-login after reset: the user must prove the new password by signing in.
 */

import type { Logger } from '../../shared/logger/logger';
import type { Queue } from '../../shared/messaging/queue';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { SessionRegistry } from '../../shared/session/session.registry';
import type { SessionView } from '../../shared/session/session.types';
import type { Identity, IdentityStore } from '../identities';
import { AuthErrors } from './auth.errors';
import type { AuthSession, ClientInfo, LoginResult, TokenClaims } from './auth.types';
import {
  sendEmailVerificationFlow,
  verifyEmailFlow,
} from './flows/email-verification/email-verification-flows';
import { executeLoginFlow, type LoginInput } from './flows/login/execute-login-flow';
import { changePasswordFlow } from './flows/password/change-password-flow';
import { requestPasswordResetFlow } from './flows/password-reset/request-password-reset-flow';
import { resetPasswordFlow } from './flows/password-reset/reset-password-flow';
import { issueAuthSession } from './helpers/issue-auth-session';
import type { LoginGuard } from './login/login-guard';
import type { OAuthIdentityLinker, OAuthProfile } from './oauth/oauth-linker';
import type { RevocationRegistry } from './tokens/revocation.registry';
import type { TokenService } from './tokens/token.service';
import type { TwoFactorController } from './two-factor/two-factor.controller';

export type AuthServiceDeps = {
  identities: IdentityStore;
  tokens: TokenService;
  revocations: RevocationRegistry;
  sessions: SessionRegistry;
  loginGuard: LoginGuard;
  twoFactor: TwoFactorController;
  oauth: OAuthIdentityLinker;
  passwordHasher: PasswordHasher;
  queue: Queue;
  logger: Logger;
  appBaseUrl: string;
};

export type OAuthLoginResult = AuthSession & { created: boolean };

export class AuthService {
  constructor(private readonly deps: AuthServiceDeps) {}

  login(input: LoginInput): Promise<LoginResult> {
    return executeLoginFlow({ deps: this.deps, input });
  }

  /** Resolves the identity behind an access token and bumps its session. */
  async authenticate(accessToken: string): Promise<Identity> {
    const { identity } = await this.resolveTokenIdentity(accessToken, 'access');
    await this.deps.sessions.touch(accessToken);
    return identity;
  }

  /**
   * Rotates a refresh token. The new pair continues the session the old pair
   * was issued for: same createdAt, one record per device.
   */
  async refresh(refreshToken: string, client: ClientInfo = {}): Promise<AuthSession> {
    const { identity, claims } = await this.resolveTokenIdentity(refreshToken, 'refresh');

    await this.deps.revocations.revoke(refreshToken);

    const tokens = this.deps.tokens.issuePair(
      { identityId: identity.id, username: identity.username, role: identity.role },
      (accessToken) => this.deps.sessions.sessionIdFor(accessToken),
    );
    const sessionId = await this.deps.sessions.register(
      identity.id,
      tokens.accessToken,
      client.ip,
      client.userAgent,
      { replaces: claims.sessionId },
    );

    this.deps.logger.info('auth.token.refreshed', {
      flow: 'auth.refresh',
      identityId: identity.id,
    });

    return { tokens, sessionId };
  }

  /**
   * Revokes both tokens and drops the session record of the access token.
   * Tokens that are already expired or unverifiable are ignored.
   */
  async logout(accessToken: string, refreshToken?: string): Promise<void> {
    await this.deps.revocations.revoke(accessToken);
    if (refreshToken) await this.deps.revocations.revoke(refreshToken);

    const claims = this.deps.tokens.decode(accessToken);
    if (!claims) return;

    await this.deps.sessions.revoke(
      claims.identityId,
      this.deps.sessions.sessionIdFor(accessToken),
    );

    this.deps.logger.info('auth.logout', { flow: 'auth.logout', identityId: claims.identityId });
  }

  requestPasswordReset(email: string): Promise<void> {
    return requestPasswordResetFlow({ deps: this.deps, input: { email } });
  }

  resetPassword(token: string, newPassword: string): Promise<void> {
    return resetPasswordFlow({ deps: this.deps, input: { token, newPassword } });
  }

  sendEmailVerification(identityId: number): Promise<void> {
    return sendEmailVerificationFlow({ deps: this.deps, input: { identityId } });
  }

  verifyEmail(token: string): Promise<void> {
    return verifyEmailFlow({ deps: this.deps, input: { token } });
  }

  changePassword(
    identityId: number,
    currentPassword: string,
    newPassword: string,
    keepToken?: string,
  ): Promise<void> {
    return changePasswordFlow({
      deps: this.deps,
      input: { identityId, currentPassword, newPassword, keepToken },
    });
  }

  listSessions(identityId: number, currentToken?: string): Promise<SessionView[]> {
    return this.deps.sessions.list(identityId, currentToken);
  }

  async revokeSession(identityId: number, sessionId: string): Promise<void> {
    const revoked = await this.deps.sessions.revoke(identityId, sessionId);
    if (!revoked) throw AuthErrors.notFound('Session not found.');
  }

  revokeAllSessions(identityId: number, exceptToken?: string): Promise<number> {
    return this.deps.sessions.revokeAll(identityId, exceptToken);
  }

  /**
   * Sign-in after the provider's own flow succeeded. Linking rules live in
   * OAuthIdentityLinker; here only the activity gate and token issuance.
   */
  async completeOAuthLogin(profile: OAuthProfile, client: ClientInfo = {}): Promise<OAuthLoginResult> {
    const { identity, created } = await this.deps.oauth.getOrCreate(profile);
    if (!identity.isActive) throw AuthErrors.accountInactive();

    const session = await issueAuthSession(this.deps, identity, client);

    this.deps.logger.info('auth.oauth.login', {
      flow: 'auth.oauth',
      provider: profile.provider,
      identityId: identity.id,
      created,
    });

    return { ...session, created };
  }

  private async resolveTokenIdentity(
    token: string,
    kind: 'access' | 'refresh',
  ): Promise<{ identity: Identity; claims: TokenClaims }> {
    const claims = this.deps.tokens.validate(token, kind);
    if (await this.deps.revocations.isRevoked(token)) throw AuthErrors.invalidOrExpiredToken();

    const identity = await this.deps.identities.findById(claims.identityId);
    if (!identity) throw AuthErrors.invalidOrExpiredToken();
    if (!identity.isActive) throw AuthErrors.accountInactive();

    return { identity, claims };
  }
}
