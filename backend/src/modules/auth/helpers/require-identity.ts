/**
 * backend/src/modules/auth/helpers/require-identity.ts
 *
 * WHY:
 * - Flows that act on an already-authenticated identity re-read it from the
 *   store every time (token claims are advisory). A missing row is NotFound.
 */

import type { Identity, IdentityStore } from '../../identities';
import { AuthErrors } from '../auth.errors';

export async function requireIdentity(
  identities: IdentityStore,
  identityId: number,
): Promise<Identity> {
  const identity = await identities.findById(identityId);
  if (!identity) throw AuthErrors.notFound('Account not found.');
  return identity;
}
