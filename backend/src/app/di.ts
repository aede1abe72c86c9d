/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db, redis) and shares them safely.
 * - Owns their lifecycle: close() is the only teardown path.
 *
 * RULES:
 * - No business logic here.
 * - Environment-dependent decisions belong HERE, not inside the classes
 *   themselves (DIP).
 */

import type { AppConfig } from './config';
import { createDb } from '../shared/db/db';

import { RedisCache } from '../shared/cache/redis-cache';
import type { Cache } from '../shared/cache/cache';

import { Sha256TokenHasher } from '../shared/security/token-hasher';
import type { TokenHasher } from '../shared/security/token-hasher';

import type { PasswordHasher } from '../shared/security/password-hasher';
import { BcryptPasswordHasher } from '../shared/security/bcrypt-password-hasher';

import { logger, setLogLevel } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { InMemQueue } from '../shared/messaging/inmem-queue';
import type { Queue } from '../shared/messaging/queue';

import { TotpService } from '../shared/security/totp';
import { EncryptionService } from '../shared/security/encryption';
import { SESSION_ID_LENGTH } from '../shared/session/session.types';

import { createIdentityModule } from '../modules/identities';
import type { IdentityModule } from '../modules/identities';

import { createAuthModule } from '../modules/auth';
import type { AuthModule } from '../modules/auth';

export type AppDeps = {
  db: ReturnType<typeof createDb>;
  cache: Cache;

  logger: Logger;

  tokenHasher: TokenHasher;
  passwordHasher: PasswordHasher;

  totp: TotpService;
  encryption: EncryptionService;

  // messaging
  queue: Queue;

  // modules
  identities: IdentityModule;
  auth: AuthModule;

  // lifecycle
  close: () => Promise<void>;
};

export async function buildDeps(config: AppConfig): Promise<AppDeps> {
  setLogLevel(config.logLevel);

  const db = createDb(config.databaseUrl);

  // Redis is mandatory (dev + prod)
  const redis = await RedisCache.connect(config.redisUrl);

  const tokenHasher: TokenHasher = new Sha256TokenHasher({ length: SESSION_ID_LENGTH });
  const passwordHasher: PasswordHasher = new BcryptPasswordHasher({
    cost: config.bcryptCost,
  });

  const totp = new TotpService(config.twoFactor.totpIssuer);
  const encryption = new EncryptionService(config.twoFactor.encryptionKeyBase64);

  // In-memory queue until a mail transport adapter is wired here
  const queue: Queue = new InMemQueue();

  const identities = createIdentityModule({ db });

  const auth = createAuthModule({
    identities: identities.identityStore,
    cache: redis,
    queue,
    logger,
    passwordHasher,
    tokenHasher,
    totp,
    encryption,
    config,
  });

  return {
    db,
    cache: redis,
    logger,
    tokenHasher,
    passwordHasher,
    totp,
    encryption,
    queue,
    identities,
    auth,
    close: async () => {
      await redis.close();
      await db.destroy();
    },
  };
}
