/**
 * src/modules/auth/oauth/derive-username.ts
 *
 * Username for a fresh OAuth identity: the email's local part, cut to 42 chars.
 * On collision a `_` + 8 hex chars suffix is appended (at most 51 chars total).
 */

import { generateHexSuffix } from '../../../shared/security/token';
import type { IdentityStore } from '../../identities';
import { OAUTH_USERNAME_MAX_LENGTH, OAUTH_USERNAME_SUFFIX_LENGTH } from '../auth.constants';

export function usernameBaseFromEmail(email: string): string {
  const at = email.indexOf('@');
  const local = at === -1 ? email : email.slice(0, at);
  const base = local.trim().slice(0, OAUTH_USERNAME_MAX_LENGTH);
  return base.length > 0 ? base : 'user';
}

export async function deriveUsername(identities: IdentityStore, email: string): Promise<string> {
  const base = usernameBaseFromEmail(email);
  if (!(await identities.usernameExists(base))) return base;
  return `${base}_${generateHexSuffix(OAUTH_USERNAME_SUFFIX_LENGTH)}`;
}
