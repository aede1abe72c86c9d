/**
 * src/modules/auth/oauth/oauth-linker.ts
 *
 * WHY:
 * - Maps an external provider identity (already verified by the provider's
 *   flow) onto exactly one local identity.
 *
 * RESOLUTION ORDER:
 * 1) (provider, providerId) match → that identity, created=false.
 * 2) email match →
 *    - provider did not assert a verified email → AccountLinkConflict
 *      (an unverified address must never take over an existing account);
 *    - identity already linked to ANOTHER provider → AccountLinkConflict;
 *    - otherwise link, backfilling avatar and emailVerified when absent.
 * 3) no match → new OAuth-only identity (no password, default role),
 *    created=true.
 *
 * RULES:
 * - Whether the identity may sign in (isActive) is decided by the caller.
 */

import type { Logger } from '../../../shared/logger/logger';
import type { Identity, IdentityPatch, IdentityStore } from '../../identities';
import { AuthErrors } from '../auth.errors';
import { emailDomain } from '../helpers/email-domain';
import { deriveUsername } from './derive-username';

export type OAuthProfile = {
  provider: string;
  providerId: string;
  email: string;
  emailVerified: boolean;
  firstName?: string | null;
  lastName?: string | null;
  avatarUrl?: string | null;
};

export type OAuthLinkResult = {
  identity: Identity;
  created: boolean;
};

export class OAuthIdentityLinker {
  constructor(
    private readonly deps: {
      identities: IdentityStore;
      logger: Logger;
    },
  ) {}

  async getOrCreate(profile: OAuthProfile): Promise<OAuthLinkResult> {
    const { identities, logger } = this.deps;
    const email = profile.email.trim().toLowerCase();

    const linked = await identities.findByOAuth(profile.provider, profile.providerId);
    if (linked) return { identity: linked, created: false };

    const existing = await identities.findByEmail(email);
    if (existing) {
      if (!profile.emailVerified) {
        logger.warn('auth.oauth.link_refused', {
          flow: 'auth.oauth',
          reason: 'email_not_verified',
          provider: profile.provider,
          emailDomain: emailDomain(email),
        });
        throw AuthErrors.accountLinkConflict(
          'Cannot link account: the provider has not verified this email.',
        );
      }

      if (existing.oauthProvider !== null && existing.oauthProvider !== profile.provider) {
        logger.warn('auth.oauth.link_refused', {
          flow: 'auth.oauth',
          reason: 'other_provider_linked',
          provider: profile.provider,
          identityId: existing.id,
        });
        throw AuthErrors.accountLinkConflict(
          `Account already linked to ${existing.oauthProvider}. Use that provider to sign in.`,
        );
      }

      const patch: IdentityPatch = {
        oauthProvider: profile.provider,
        oauthId: profile.providerId,
      };
      if (existing.avatarUrl === null && profile.avatarUrl) patch.avatarUrl = profile.avatarUrl;
      if (!existing.emailVerified) patch.emailVerified = true;

      const updated = await identities.update(existing.id, patch);
      if (!updated) throw AuthErrors.notFound('Account not found.');

      logger.info('auth.oauth.linked', {
        flow: 'auth.oauth',
        provider: profile.provider,
        identityId: updated.id,
      });
      return { identity: updated, created: false };
    }

    const identity = await identities.insert({
      username: await deriveUsername(identities, email),
      email,
      passwordHash: null,
      emailVerified: profile.emailVerified,
      oauthProvider: profile.provider,
      oauthId: profile.providerId,
      firstName: profile.firstName ?? null,
      lastName: profile.lastName ?? null,
      avatarUrl: profile.avatarUrl ?? null,
    });

    logger.info('auth.oauth.created', {
      flow: 'auth.oauth',
      provider: profile.provider,
      identityId: identity.id,
    });
    return { identity, created: true };
  }
}
