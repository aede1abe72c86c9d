/**
 * backend/src/modules/identities/queries/identity.queries.ts
 *
 * WHY:
 * - Shapes DB rows into Identity domain types.
 *
 * RULES:
 * - Pure mapping; no I/O.
 * - An unknown role string in the DB maps to the least-privileged role.
 */

import type { IdentityRow } from '../dal/identity.query-sql';
import { isRole, type Identity } from '../identity.types';

export function toIdentity(row: IdentityRow): Identity {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    role: isRole(row.role) ? row.role : 'user',
    isActive: row.is_active,

    emailVerified: row.email_verified,
    twoFaEnabled: row.two_fa_enabled,
    totpEnabled: row.totp_enabled,
    totpSecret: row.totp_secret,

    oauthProvider: row.oauth_provider,
    oauthId: row.oauth_id,

    firstName: row.first_name,
    lastName: row.last_name,
    avatarUrl: row.avatar_url,

    lastLoginAt: row.last_login_at,
    createdAt: row.created_at,
  };
}
