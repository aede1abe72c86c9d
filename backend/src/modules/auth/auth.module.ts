/**
 * src/modules/auth/auth.module.ts
 *
 * WHY:
 * - Encapsulates Auth module wiring.
 * - DI creates infra (cache, queue, identity store, hashers); the module
 *   composes the domain units on top of them.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { AppConfig } from '../../app/config';
import type { Cache } from '../../shared/cache/cache';
import type { Logger } from '../../shared/logger/logger';
import type { Queue } from '../../shared/messaging/queue';
import type { EncryptionService } from '../../shared/security/encryption';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { TokenHasher } from '../../shared/security/token-hasher';
import type { TotpService } from '../../shared/security/totp';
import { SessionRegistry } from '../../shared/session/session.registry';
import type { IdentityStore } from '../identities';

import { AuthService } from './auth.service';
import { LoginGuard } from './login/login-guard';
import { OAuthIdentityLinker } from './oauth/oauth-linker';
import { RevocationRegistry } from './tokens/revocation.registry';
import { TokenService } from './tokens/token.service';
import { TwoFactorController } from './two-factor/two-factor.controller';

export type AuthModule = ReturnType<typeof createAuthModule>;

export function createAuthModule(deps: {
  identities: IdentityStore;
  cache: Cache;
  queue: Queue;
  logger: Logger;
  passwordHasher: PasswordHasher;
  tokenHasher: TokenHasher;
  totp: TotpService;
  encryption: EncryptionService;
  config: Pick<AppConfig, 'tokens' | 'loginGuard' | 'twoFactor' | 'appBaseUrl'>;
}) {
  const { config } = deps;

  const tokens = new TokenService(config.tokens);
  const revocations = new RevocationRegistry({ cache: deps.cache, tokens });

  // Session records live as long as the refresh token they were issued with.
  const sessions = new SessionRegistry({
    cache: deps.cache,
    hasher: deps.tokenHasher,
    logger: deps.logger,
    ttlSeconds: config.tokens.refreshTtlSeconds,
  });

  const loginGuard = new LoginGuard({
    identities: deps.identities,
    cache: deps.cache,
    passwordHasher: deps.passwordHasher,
    logger: deps.logger,
    policy: config.loginGuard,
  });

  const twoFactor = new TwoFactorController({
    identities: deps.identities,
    cache: deps.cache,
    queue: deps.queue,
    logger: deps.logger,
    totp: deps.totp,
    encryption: deps.encryption,
    passwordHasher: deps.passwordHasher,
    tokens,
    sessions,
    policy: config.twoFactor,
  });

  const oauth = new OAuthIdentityLinker({ identities: deps.identities, logger: deps.logger });

  const authService = new AuthService({
    identities: deps.identities,
    tokens,
    revocations,
    sessions,
    loginGuard,
    twoFactor,
    oauth,
    passwordHasher: deps.passwordHasher,
    queue: deps.queue,
    logger: deps.logger,
    appBaseUrl: config.appBaseUrl,
  });

  return {
    authService,
    tokens,
    revocations,
    sessions,
    loginGuard,
    twoFactor,
    oauth,
  };
}
