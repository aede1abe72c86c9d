/**
 * backend/src/modules/identities/identity.store.ts
 *
 * WHY:
 * - The auth core consumes identities through this contract only.
 * - Production uses Postgres (KyselyIdentityStore); tests and local dev use
 *   InMemIdentityStore, the same way Cache has RedisCache and InMemCache.
 *
 * RULES:
 * - Lookups return undefined when absent; they never throw for "not found".
 * - Email lookups are case-insensitive (emails are stored lower-cased).
 * - update() returns the updated identity, or undefined if the id is unknown.
 */

import type {
  Identity,
  IdentityId,
  IdentityPage,
  IdentityPatch,
  ListIdentitiesOptions,
  NewIdentity,
} from './identity.types';

export interface IdentityStore {
  findById(id: IdentityId): Promise<Identity | undefined>;
  findByUsername(username: string): Promise<Identity | undefined>;
  findByEmail(email: string): Promise<Identity | undefined>;

  /** Username first, then email. */
  findByUsernameOrEmail(identifier: string): Promise<Identity | undefined>;

  findByOAuth(provider: string, providerId: string): Promise<Identity | undefined>;
  usernameExists(username: string): Promise<boolean>;

  insert(input: NewIdentity): Promise<Identity>;
  update(id: IdentityId, patch: IdentityPatch): Promise<Identity | undefined>;

  list(opts?: ListIdentitiesOptions): Promise<IdentityPage>;
}

export const DEFAULT_PAGE_LIMIT = 20;
export const MAX_PAGE_LIMIT = 100;

export function clampLimit(limit: number | undefined): number {
  if (limit === undefined) return DEFAULT_PAGE_LIMIT;
  return Math.min(Math.max(1, Math.trunc(limit)), MAX_PAGE_LIMIT);
}
