/**
 * src/shared/db/migrations/index.ts
 *
 * RULES:
 * - Register every migration here, keyed by file name. Kysely runs them in key order.
 */

import type { Migration } from 'kysely';

import * as m0001 from './0001_identities';

export const migrations: Record<string, Migration> = {
  '0001_identities': m0001,
};
