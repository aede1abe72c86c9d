/**
 * backend/src/modules/identities/index.ts
 *
 * WHY:
 * - Define the public surface of the identities module.
 * - Prevent cross-module coupling via deep imports into /dal or /queries.
 *
 * RULES:
 * - Only export stable contracts needed by other modules.
 */

export { createIdentityModule, type IdentityModule } from './identity.module';
export { InMemIdentityStore } from './dal/inmem-identity.store';
export type { IdentityStore } from './identity.store';
export { ROLES, isRole } from './identity.types';
export type {
  Identity,
  IdentityId,
  IdentityPage,
  IdentityPatch,
  ListIdentitiesOptions,
  NewIdentity,
  Role,
} from './identity.types';
export { hasRole, isAdmin, isSuperadmin, assertRoleAllowed } from './policies/role.policy';
