/**
 * backend/src/modules/identities/dal/inmem-identity.store.ts
 *
 * WHY:
 * - Allows tests (and local dev without Postgres) to run the full auth core.
 * - Mirrors the DB constraints that matter to callers: unique username,
 *   unique lower-cased email, unique (provider, provider id).
 *
 * HOW TO USE:
 * - const identities = new InMemIdentityStore()
 * - Returned identities are copies; mutating them does not change the store.
 */

import type { IdentityStore } from '../identity.store';
import { clampLimit } from '../identity.store';
import type {
  Identity,
  IdentityPage,
  IdentityPatch,
  IdentitySortField,
  ListIdentitiesOptions,
  NewIdentity,
} from '../identity.types';

type SortValue = string | number | null;

function sortValue(identity: Identity, field: IdentitySortField): SortValue {
  switch (field) {
    case 'id':
      return identity.id;
    case 'username':
      return identity.username;
    case 'email':
      return identity.email;
    case 'role':
      return identity.role;
    case 'createdAt':
      return identity.createdAt.getTime();
    case 'lastLoginAt':
      return identity.lastLoginAt ? identity.lastLoginAt.getTime() : null;
  }
}

// Postgres ordering: NULLs sort as the largest value
function compare(a: SortValue, b: SortValue): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return a < b ? -1 : 1;
}

// undefined means "not part of the patch"; null is a real value
function keep<T>(value: T | undefined, current: T): T {
  return value === undefined ? current : value;
}

function matchesSearch(identity: Identity, search: string): boolean {
  const needle = search.toLowerCase();
  return [identity.username, identity.email, identity.firstName, identity.lastName].some(
    (field) => field !== null && field.toLowerCase().includes(needle),
  );
}

export class InMemIdentityStore implements IdentityStore {
  private readonly rows = new Map<number, Identity>();
  private nextId = 1;

  private copy(identity: Identity | undefined): Identity | undefined {
    return identity ? { ...identity } : undefined;
  }

  private find(predicate: (identity: Identity) => boolean): Identity | undefined {
    for (const identity of this.rows.values()) {
      if (predicate(identity)) return { ...identity };
    }
    return undefined;
  }

  private uniqueViolation(constraint: string): Error {
    return new Error(`duplicate key value violates unique constraint "${constraint}"`);
  }

  findById(id: number): Promise<Identity | undefined> {
    return Promise.resolve(this.copy(this.rows.get(id)));
  }

  findByUsername(username: string): Promise<Identity | undefined> {
    return Promise.resolve(this.find((i) => i.username === username));
  }

  findByEmail(email: string): Promise<Identity | undefined> {
    const normalized = email.toLowerCase();
    return Promise.resolve(this.find((i) => i.email === normalized));
  }

  async findByUsernameOrEmail(identifier: string): Promise<Identity | undefined> {
    return (await this.findByUsername(identifier)) ?? (await this.findByEmail(identifier));
  }

  findByOAuth(provider: string, providerId: string): Promise<Identity | undefined> {
    return Promise.resolve(
      this.find((i) => i.oauthProvider === provider && i.oauthId === providerId),
    );
  }

  usernameExists(username: string): Promise<boolean> {
    return Promise.resolve(this.find((i) => i.username === username) !== undefined);
  }

  insert(input: NewIdentity): Promise<Identity> {
    const email = input.email.toLowerCase();
    const oauthProvider = input.oauthProvider ?? null;
    const oauthId = input.oauthId ?? null;

    if (this.find((i) => i.username === input.username)) {
      return Promise.reject(this.uniqueViolation('identities_username_key'));
    }
    if (this.find((i) => i.email === email)) {
      return Promise.reject(this.uniqueViolation('identities_email_key'));
    }
    if (
      oauthProvider !== null &&
      this.find((i) => i.oauthProvider === oauthProvider && i.oauthId === oauthId)
    ) {
      return Promise.reject(this.uniqueViolation('idx_identities_oauth'));
    }

    const identity: Identity = {
      id: this.nextId++,
      username: input.username,
      email,
      passwordHash: input.passwordHash,
      role: input.role ?? 'user',
      isActive: input.isActive ?? true,
      emailVerified: input.emailVerified ?? false,
      twoFaEnabled: false,
      totpEnabled: false,
      totpSecret: null,
      oauthProvider,
      oauthId,
      firstName: input.firstName ?? null,
      lastName: input.lastName ?? null,
      avatarUrl: input.avatarUrl ?? null,
      lastLoginAt: null,
      createdAt: new Date(),
    };

    this.rows.set(identity.id, identity);
    return Promise.resolve({ ...identity });
  }

  update(id: number, patch: IdentityPatch): Promise<Identity | undefined> {
    const current = this.rows.get(id);
    if (!current) return Promise.resolve(undefined);

    const next: Identity = {
      ...current,
      passwordHash: keep(patch.passwordHash, current.passwordHash),
      role: keep(patch.role, current.role),
      isActive: keep(patch.isActive, current.isActive),
      emailVerified: keep(patch.emailVerified, current.emailVerified),
      twoFaEnabled: keep(patch.twoFaEnabled, current.twoFaEnabled),
      totpEnabled: keep(patch.totpEnabled, current.totpEnabled),
      totpSecret: keep(patch.totpSecret, current.totpSecret),
      oauthProvider: keep(patch.oauthProvider, current.oauthProvider),
      oauthId: keep(patch.oauthId, current.oauthId),
      firstName: keep(patch.firstName, current.firstName),
      lastName: keep(patch.lastName, current.lastName),
      avatarUrl: keep(patch.avatarUrl, current.avatarUrl),
      lastLoginAt: keep(patch.lastLoginAt, current.lastLoginAt),
    };

    this.rows.set(id, next);
    return Promise.resolve({ ...next });
  }

  list(opts: ListIdentitiesOptions = {}): Promise<IdentityPage> {
    const sortBy = opts.sortBy ?? 'createdAt';
    const direction = opts.sortBy ? (opts.sortOrder ?? 'asc') : 'desc';
    const sign = direction === 'asc' ? 1 : -1;

    const matching = Array.from(this.rows.values())
      .filter((i) => !opts.search || matchesSearch(i, opts.search))
      .filter((i) => opts.role === undefined || i.role === opts.role)
      .filter((i) => opts.isActive === undefined || i.isActive === opts.isActive)
      .filter((i) => opts.emailVerified === undefined || i.emailVerified === opts.emailVerified)
      .sort(
        (a, b) =>
          sign * compare(sortValue(a, sortBy), sortValue(b, sortBy)) || compare(a.id, b.id),
      );

    const offset = Math.max(0, opts.offset ?? 0);
    const limit = clampLimit(opts.limit);

    return Promise.resolve({
      items: matching.slice(offset, offset + limit).map((i) => ({ ...i })),
      total: matching.length,
    });
  }
}
