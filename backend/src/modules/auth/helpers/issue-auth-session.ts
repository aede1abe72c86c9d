/**
 * src/modules/auth/helpers/issue-auth-session.ts
 *
 * WHY:
 * - The sequence (stamp lastLoginAt → issue token pair → register session)
 *   is identical after a plain password login, after a second factor, and
 *   after an OAuth callback.
 *
 * RULES:
 * - Callers have already decided the identity may sign in (active, factors done).
 * - The session is registered for the ACCESS token; its record lives as long
 *   as the refresh token, which carries the session id for later rotation.
 */

import type { SessionRegistry } from '../../../shared/session/session.registry';
import type { Identity, IdentityStore } from '../../identities';
import type { AuthSession, ClientInfo } from '../auth.types';
import type { TokenService } from '../tokens/token.service';

export type IssueAuthSessionDeps = {
  identities: IdentityStore;
  tokens: TokenService;
  sessions: SessionRegistry;
};

export async function issueAuthSession(
  deps: IssueAuthSessionDeps,
  identity: Identity,
  client: ClientInfo = {},
): Promise<AuthSession> {
  await deps.identities.update(identity.id, { lastLoginAt: new Date() });

  const tokens = deps.tokens.issuePair(
    { identityId: identity.id, username: identity.username, role: identity.role },
    (accessToken) => deps.sessions.sessionIdFor(accessToken),
  );

  const sessionId = await deps.sessions.register(
    identity.id,
    tokens.accessToken,
    client.ip,
    client.userAgent,
  );

  return { tokens, sessionId };
}
