/**
 * backend/src/modules/identities/identity.types.ts
 *
 * WHY:
 * - Domain types for the Identities module.
 * - An identity is global: one username and one email map to exactly one identity.
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 * - passwordHash === null means the identity is OAuth-only.
 * - totpSecret is the ENCRYPTED secret (see shared/security/encryption.ts).
 */

export const ROLES = ['user', 'admin', 'superadmin'] as const;

export type Role = (typeof ROLES)[number];

export function isRole(value: string): value is Role {
  return ROLES.some((role) => role === value);
}

export type IdentityId = number;

export type Identity = {
  id: IdentityId;
  username: string;
  email: string;
  passwordHash: string | null;
  role: Role;
  isActive: boolean;

  emailVerified: boolean;
  twoFaEnabled: boolean;
  totpEnabled: boolean;
  totpSecret: string | null;

  oauthProvider: string | null;
  oauthId: string | null;

  firstName: string | null;
  lastName: string | null;
  avatarUrl: string | null;

  lastLoginAt: Date | null;
  createdAt: Date;
};

export type NewIdentity = {
  username: string;
  email: string;
  passwordHash: string | null;
  role?: Role;
  isActive?: boolean;
  emailVerified?: boolean;
  oauthProvider?: string | null;
  oauthId?: string | null;
  firstName?: string | null;
  lastName?: string | null;
  avatarUrl?: string | null;
};

/** Fields this core is allowed to change. username/email are immutable here. */
export type IdentityPatch = Partial<
  Pick<
    Identity,
    | 'passwordHash'
    | 'role'
    | 'isActive'
    | 'emailVerified'
    | 'twoFaEnabled'
    | 'totpEnabled'
    | 'totpSecret'
    | 'oauthProvider'
    | 'oauthId'
    | 'firstName'
    | 'lastName'
    | 'avatarUrl'
    | 'lastLoginAt'
  >
>;

export const IDENTITY_SORT_FIELDS = [
  'id',
  'username',
  'email',
  'createdAt',
  'lastLoginAt',
  'role',
] as const;

export type IdentitySortField = (typeof IDENTITY_SORT_FIELDS)[number];

export type ListIdentitiesOptions = {
  offset?: number;
  limit?: number;
  /** Case-insensitive substring over username, email, first and last name. */
  search?: string;
  role?: Role;
  isActive?: boolean;
  emailVerified?: boolean;
  /** Defaults to createdAt desc. */
  sortBy?: IdentitySortField;
  sortOrder?: 'asc' | 'desc';
};

export type IdentityPage = {
  items: Identity[];
  total: number;
};
