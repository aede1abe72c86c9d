/**
 * src/shared/db/migrations/0001_identities.ts
 *
 * WHY:
 * - One durable table for identities. Everything else (lockouts, pending
 *   two-factor state, sessions, revocation) is ephemeral and lives in the cache.
 *
 * KEY CONSTRAINTS:
 * - username and email are globally unique; email is stored lower-cased.
 * - (oauth_provider, oauth_id) is unique when present, so a provider account
 *   maps to at most one identity.
 * - password_hash NULL means the identity is OAuth-only.
 */

import { type Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await sql`
    CREATE TABLE identities (
      id              SERIAL      PRIMARY KEY,
      username        TEXT        NOT NULL UNIQUE,
      email           TEXT        NOT NULL UNIQUE,
      password_hash   TEXT,
      role            TEXT        NOT NULL DEFAULT 'user'
                                  CHECK (role IN ('user', 'admin', 'superadmin')),
      is_active       BOOLEAN     NOT NULL DEFAULT true,
      email_verified  BOOLEAN     NOT NULL DEFAULT false,
      two_fa_enabled  BOOLEAN     NOT NULL DEFAULT false,
      totp_enabled    BOOLEAN     NOT NULL DEFAULT false,
      totp_secret     TEXT,
      oauth_provider  TEXT,
      oauth_id        TEXT,
      first_name      TEXT,
      last_name       TEXT,
      avatar_url      TEXT,
      last_login_at   TIMESTAMPTZ,
      created_at      TIMESTAMPTZ NOT NULL DEFAULT now()
    );
  `.execute(db);

  await sql`
    CREATE UNIQUE INDEX idx_identities_oauth
      ON identities (oauth_provider, oauth_id)
      WHERE oauth_provider IS NOT NULL;
  `.execute(db);

  await sql`CREATE INDEX idx_identities_role ON identities (role);`.execute(db);
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await sql`DROP INDEX IF EXISTS idx_identities_role;`.execute(db);
  await sql`DROP INDEX IF EXISTS idx_identities_oauth;`.execute(db);
  await sql`DROP TABLE IF EXISTS identities;`.execute(db);
}
