/**
 * backend/src/modules/identities/identity.module.ts
 *
 * WHY:
 * - Encapsulates Identities module wiring.
 * - Identities is a support module (no flows of its own).
 *   The auth module consumes its store.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { DbExecutor } from '../../shared/db/db';
import { KyselyIdentityStore } from './dal/kysely-identity.store';
import type { IdentityStore } from './identity.store';

export type IdentityModule = {
  identityStore: IdentityStore;
};

export function createIdentityModule(deps: { db: DbExecutor }): IdentityModule {
  return {
    identityStore: new KyselyIdentityStore(deps.db),
  };
}
