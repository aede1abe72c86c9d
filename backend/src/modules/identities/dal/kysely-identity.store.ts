/**
 * backend/src/modules/identities/dal/kysely-identity.store.ts
 *
 * WHY:
 * - Postgres-backed IdentityStore. Composes the read SQL, the write repo and the
 *   row mapper so callers only see domain types.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { IdentityStore } from '../identity.store';
import { clampLimit } from '../identity.store';
import type {
  Identity,
  IdentityPage,
  IdentityPatch,
  ListIdentitiesOptions,
  NewIdentity,
} from '../identity.types';
import { toIdentity } from '../queries/identity.queries';
import {
  selectIdentitiesPageSql,
  selectIdentityByEmailSql,
  selectIdentityByIdSql,
  selectIdentityByOAuthSql,
  selectIdentityByUsernameSql,
  usernameExistsSql,
  type IdentityRow,
} from './identity.query-sql';
import { IdentityRepo } from './identity.repo';

function mapped(row: IdentityRow | undefined): Identity | undefined {
  return row ? toIdentity(row) : undefined;
}

export class KyselyIdentityStore implements IdentityStore {
  private readonly repo: IdentityRepo;

  constructor(private readonly db: DbExecutor) {
    this.repo = new IdentityRepo(db);
  }

  async findById(id: number): Promise<Identity | undefined> {
    return mapped(await selectIdentityByIdSql(this.db, id));
  }

  async findByUsername(username: string): Promise<Identity | undefined> {
    return mapped(await selectIdentityByUsernameSql(this.db, username));
  }

  async findByEmail(email: string): Promise<Identity | undefined> {
    return mapped(await selectIdentityByEmailSql(this.db, email));
  }

  async findByUsernameOrEmail(identifier: string): Promise<Identity | undefined> {
    return (await this.findByUsername(identifier)) ?? (await this.findByEmail(identifier));
  }

  async findByOAuth(provider: string, providerId: string): Promise<Identity | undefined> {
    return mapped(await selectIdentityByOAuthSql(this.db, provider, providerId));
  }

  async usernameExists(username: string): Promise<boolean> {
    return usernameExistsSql(this.db, username);
  }

  async insert(input: NewIdentity): Promise<Identity> {
    return toIdentity(await this.repo.insertIdentity(input));
  }

  async update(id: number, patch: IdentityPatch): Promise<Identity | undefined> {
    const row = await this.repo.updateIdentity(id, patch);
    if (row) return toIdentity(row);
    return this.findById(id);
  }

  async list(opts: ListIdentitiesOptions = {}): Promise<IdentityPage> {
    const { rows, total } = await selectIdentitiesPageSql(this.db, {
      ...opts,
      offset: Math.max(0, opts.offset ?? 0),
      limit: clampLimit(opts.limit),
    });
    return { items: rows.map(toIdentity), total };
  }
}
