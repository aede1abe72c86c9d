/**
 * backend/src/shared/db/schema.ts
 *
 * WHY:
 * - Kysely needs a typed view of the Postgres schema.
 * - The schema is one table; it is small enough to keep by hand next to its migration.
 *
 * RULES:
 * - Keep aligned with src/shared/db/migrations.
 * - snake_case stays here and in the DAL; domain types are camelCase.
 */

import type { ColumnType, Generated } from 'kysely';

export type Timestamp = ColumnType<Date, Date | string, Date | string>;

export interface IdentitiesTable {
  id: Generated<number>;
  username: string;
  email: string;
  password_hash: string | null;
  role: Generated<string>;
  is_active: Generated<boolean>;
  email_verified: Generated<boolean>;
  two_fa_enabled: Generated<boolean>;
  totp_enabled: Generated<boolean>;
  totp_secret: string | null;
  oauth_provider: string | null;
  oauth_id: string | null;
  first_name: string | null;
  last_name: string | null;
  avatar_url: string | null;
  last_login_at: Timestamp | null;
  created_at: ColumnType<Date, Date | string | undefined, Date | string>;
}

export interface DB {
  identities: IdentitiesTable;
}
