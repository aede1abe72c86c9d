/**
 * backend/src/modules/identities/dal/identity.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for identities (mutations).
 *
 * RULES:
 * - No transactions started here (caller owns tx).
 * - No AppError.
 * - No policies.
 */

import type { Updateable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { IdentitiesTable } from '../../../shared/db/schema';
import type { IdentityPatch, NewIdentity } from '../identity.types';
import type { IdentityRow } from './identity.query-sql';

function toRowPatch(patch: IdentityPatch): Updateable<IdentitiesTable> {
  const row: Updateable<IdentitiesTable> = {};

  if (patch.passwordHash !== undefined) row.password_hash = patch.passwordHash;
  if (patch.role !== undefined) row.role = patch.role;
  if (patch.isActive !== undefined) row.is_active = patch.isActive;
  if (patch.emailVerified !== undefined) row.email_verified = patch.emailVerified;
  if (patch.twoFaEnabled !== undefined) row.two_fa_enabled = patch.twoFaEnabled;
  if (patch.totpEnabled !== undefined) row.totp_enabled = patch.totpEnabled;
  if (patch.totpSecret !== undefined) row.totp_secret = patch.totpSecret;
  if (patch.oauthProvider !== undefined) row.oauth_provider = patch.oauthProvider;
  if (patch.oauthId !== undefined) row.oauth_id = patch.oauthId;
  if (patch.firstName !== undefined) row.first_name = patch.firstName;
  if (patch.lastName !== undefined) row.last_name = patch.lastName;
  if (patch.avatarUrl !== undefined) row.avatar_url = patch.avatarUrl;
  if (patch.lastLoginAt !== undefined) row.last_login_at = patch.lastLoginAt;

  return row;
}

export class IdentityRepo {
  constructor(private readonly db: DbExecutor) {}

  /**
   * Username and email must be globally unique (enforced by DB constraint).
   * Callers doing find-or-create should check first; a race surfaces as a
   * unique violation.
   */
  async insertIdentity(input: NewIdentity): Promise<IdentityRow> {
    return this.db
      .insertInto('identities')
      .values({
        username: input.username,
        email: input.email.toLowerCase(),
        password_hash: input.passwordHash,
        role: input.role ?? 'user',
        is_active: input.isActive ?? true,
        email_verified: input.emailVerified ?? false,
        oauth_provider: input.oauthProvider ?? null,
        oauth_id: input.oauthId ?? null,
        first_name: input.firstName ?? null,
        last_name: input.lastName ?? null,
        avatar_url: input.avatarUrl ?? null,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
  }

  /** Returns undefined when the patch is empty or the id is unknown. */
  async updateIdentity(id: number, patch: IdentityPatch): Promise<IdentityRow | undefined> {
    const row = toRowPatch(patch);
    if (Object.keys(row).length === 0) return undefined;

    return this.db
      .updateTable('identities')
      .set(row)
      .where('id', '=', id)
      .returningAll()
      .executeTakeFirst();
  }
}
