/**
 * backend/src/modules/identities/dal/identity.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for identities (raw SQL access).
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - No transactions started here.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { IdentitiesTable } from '../../../shared/db/schema';
import type { IdentitySortField, ListIdentitiesOptions } from '../identity.types';

export type IdentityRow = Selectable<IdentitiesTable>;

const SORT_COLUMNS = {
  id: 'id',
  username: 'username',
  email: 'email',
  createdAt: 'created_at',
  lastLoginAt: 'last_login_at',
  role: 'role',
} as const satisfies Record<IdentitySortField, keyof IdentitiesTable>;

export async function selectIdentityByIdSql(
  db: DbExecutor,
  id: number,
): Promise<IdentityRow | undefined> {
  return db.selectFrom('identities').selectAll().where('id', '=', id).executeTakeFirst();
}

export async function selectIdentityByUsernameSql(
  db: DbExecutor,
  username: string,
): Promise<IdentityRow | undefined> {
  return db
    .selectFrom('identities')
    .selectAll()
    .where('username', '=', username)
    .executeTakeFirst();
}

export async function selectIdentityByEmailSql(
  db: DbExecutor,
  email: string,
): Promise<IdentityRow | undefined> {
  return db
    .selectFrom('identities')
    .selectAll()
    .where('email', '=', email.toLowerCase())
    .executeTakeFirst();
}

export async function selectIdentityByOAuthSql(
  db: DbExecutor,
  provider: string,
  providerId: string,
): Promise<IdentityRow | undefined> {
  return db
    .selectFrom('identities')
    .selectAll()
    .where('oauth_provider', '=', provider)
    .where('oauth_id', '=', providerId)
    .executeTakeFirst();
}

export async function usernameExistsSql(db: DbExecutor, username: string): Promise<boolean> {
  const row = await db
    .selectFrom('identities')
    .select('id')
    .where('username', '=', username)
    .executeTakeFirst();
  return row !== undefined;
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

function filtered(db: DbExecutor, opts: ListIdentitiesOptions) {
  let query = db.selectFrom('identities');

  if (opts.search) {
    const pattern = `%${escapeLike(opts.search)}%`;
    query = query.where((eb) =>
      eb.or([
        eb('username', 'ilike', pattern),
        eb('email', 'ilike', pattern),
        eb('first_name', 'ilike', pattern),
        eb('last_name', 'ilike', pattern),
      ]),
    );
  }
  if (opts.role !== undefined) query = query.where('role', '=', opts.role);
  if (opts.isActive !== undefined) query = query.where('is_active', '=', opts.isActive);
  if (opts.emailVerified !== undefined) {
    query = query.where('email_verified', '=', opts.emailVerified);
  }

  return query;
}

export async function selectIdentitiesPageSql(
  db: DbExecutor,
  opts: ListIdentitiesOptions & { offset: number; limit: number },
): Promise<{ rows: IdentityRow[]; total: number }> {
  const sortColumn = SORT_COLUMNS[opts.sortBy ?? 'createdAt'];
  const sortOrder = opts.sortBy ? (opts.sortOrder ?? 'asc') : 'desc';

  const rows = await filtered(db, opts)
    .selectAll()
    .orderBy(sortColumn, sortOrder)
    .orderBy('id', 'asc')
    .offset(opts.offset)
    .limit(opts.limit)
    .execute();

  const count = await filtered(db, opts)
    .select((eb) => eb.fn.countAll<string>().as('total'))
    .executeTakeFirstOrThrow();

  return { rows, total: Number(count.total) };
}
