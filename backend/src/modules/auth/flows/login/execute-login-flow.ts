/**
 * backend/src/modules/auth/flows/login/execute-login-flow.ts
 *
 * WHY:
 * - "Flow" = deep module for one end-to-end use-case.
 * - Password check → activity gate → second factor (if any) → tokens + session.
 *
 * RULES:
 * - The activity gate runs AFTER the password check: an inactive account is only
 *   disclosed to someone who knows its password.
 * - With a second factor enabled no tokens are issued here; the caller gets a
 *   pending token for TwoFactorController.verifyEmail / verifyTotp.
 */

import type { Logger } from '../../../../shared/logger/logger';
import { withContext } from '../../../../shared/logger/with-context';
import { AuthErrors } from '../../auth.errors';
import type { ClientInfo, LoginResult } from '../../auth.types';
import { issueAuthSession, type IssueAuthSessionDeps } from '../../helpers/issue-auth-session';
import type { LoginGuard } from '../../login/login-guard';
import type { TwoFactorController } from '../../two-factor/two-factor.controller';

export type LoginInput = ClientInfo & {
  identifier: string;
  password: string;
  requestId?: string | null;
};

export async function executeLoginFlow(params: {
  deps: IssueAuthSessionDeps & {
    loginGuard: LoginGuard;
    twoFactor: TwoFactorController;
    logger: Logger;
  };
  input: LoginInput;
}): Promise<LoginResult> {
  const { deps, input } = params;

  const identity = await deps.loginGuard.authenticate(input.identifier, input.password);
  const log = withContext(deps.logger, { requestId: input.requestId, identityId: identity.id });

  if (!identity.isActive) {
    log.info('auth.login.failed', { flow: 'auth.login', reason: 'inactive' });
    throw AuthErrors.accountInactive();
  }

  const challenge = await deps.twoFactor.beginChallenge(identity);
  if (challenge) {
    log.info('auth.login.two_factor_required', {
      flow: 'auth.login',
      channel: challenge.channel,
    });
    return { status: 'TWO_FACTOR_REQUIRED', ...challenge };
  }

  const session = await issueAuthSession(deps, identity, input);

  log.info('auth.login.success', { flow: 'auth.login' });

  return { status: 'AUTHENTICATED', ...session };
}
