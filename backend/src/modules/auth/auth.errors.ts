/**
 * src/modules/auth/auth.errors.ts
 *
 * WHY:
 * - Auth module owns its domain-specific error semantics.
 * - Every failure is an AuthError with a closed `kind`; callers switch on the
 *   kind, never on the message.
 * - Security-safe: messages never reveal whether a username/email exists.
 *
 * RULES:
 * - Services construct errors ONLY through `AuthErrors`.
 * - Never include passwords, tokens, codes or hashes in meta.
 * - `remainingAttempts` / `retryAfterSeconds` are the only structured hints.
 */

import { AppError, type AppErrorCode } from '../../shared/errors/app-error';

export const AUTH_ERROR_KINDS = [
  'INVALID_CREDENTIALS',
  'ACCOUNT_LOCKED',
  'ACCOUNT_INACTIVE',
  'OAUTH_ONLY_ACCOUNT',
  'INVALID_OR_EXPIRED_TOKEN',
  'INVALID_OR_EXPIRED_SESSION',
  'INVALID_CODE',
  'TOO_MANY_ATTEMPTS',
  'ACCOUNT_LINK_CONFLICT',
  'NOT_FOUND',
  'EMAIL_NOT_VERIFIED',
  'TWO_FACTOR_ALREADY_ENABLED',
  'TWO_FACTOR_NOT_ENABLED',
  'NO_SETUP_IN_PROGRESS',
  'VERIFICATION_REQUIRED',
  'WEAK_PASSWORD',
  'CODE_DELIVERY_FAILED',
] as const;

export type AuthErrorKind = (typeof AUTH_ERROR_KINDS)[number];

export type AuthErrorHints = {
  remainingAttempts?: number;
  retryAfterSeconds?: number;
};

export class AuthError extends AppError {
  readonly kind: AuthErrorKind;
  readonly remainingAttempts?: number;
  readonly retryAfterSeconds?: number;

  constructor(opts: {
    kind: AuthErrorKind;
    code: AppErrorCode;
    status: number;
    message: string;
    hints?: AuthErrorHints;
  }) {
    super({
      code: opts.code,
      status: opts.status,
      message: opts.message,
      meta: opts.hints ? { kind: opts.kind, ...opts.hints } : { kind: opts.kind },
    });
    this.name = 'AuthError';
    this.kind = opts.kind;
    this.remainingAttempts = opts.hints?.remainingAttempts;
    this.retryAfterSeconds = opts.hints?.retryAfterSeconds;
  }
}

export function isAuthError(err: unknown, kind?: AuthErrorKind): err is AuthError {
  if (!(err instanceof AuthError)) return false;
  return kind === undefined || err.kind === kind;
}

export const AuthErrors = {
  /**
   * Login: unknown identifier OR wrong password. Intentionally identical for both.
   * `remainingAttempts` is only known for existing identities (see DESIGN.md).
   */
  invalidCredentials(hints?: Pick<AuthErrorHints, 'remainingAttempts'>) {
    return new AuthError({
      kind: 'INVALID_CREDENTIALS',
      code: 'UNAUTHORIZED',
      status: 401,
      message: 'Incorrect username/email or password.',
      hints,
    });
  },

  accountLocked(retryAfterSeconds: number) {
    return new AuthError({
      kind: 'ACCOUNT_LOCKED',
      code: 'RATE_LIMITED',
      status: 423,
      message: `Account temporarily locked. Try again in ${Math.ceil(retryAfterSeconds / 60)} minutes.`,
      hints: { retryAfterSeconds },
    });
  },

  accountInactive() {
    return new AuthError({
      kind: 'ACCOUNT_INACTIVE',
      code: 'FORBIDDEN',
      status: 403,
      message: 'This account is inactive.',
    });
  },

  /** Identity has no password hash; it can only sign in through its provider. */
  oauthOnlyAccount() {
    return new AuthError({
      kind: 'OAUTH_ONLY_ACCOUNT',
      code: 'CONFLICT',
      status: 409,
      message: 'Please sign in with your OAuth provider.',
    });
  },

  /**
   * Bad signature, expired, malformed, revoked, or wrong type.
   * One error covers all of them so the response does not reveal the token's state.
   */
  invalidOrExpiredToken() {
    return new AuthError({
      kind: 'INVALID_OR_EXPIRED_TOKEN',
      code: 'UNAUTHORIZED',
      status: 401,
      message: 'Invalid or expired token.',
    });
  },

  invalidOrExpiredSession() {
    return new AuthError({
      kind: 'INVALID_OR_EXPIRED_SESSION',
      code: 'UNAUTHORIZED',
      status: 401,
      message: 'Invalid or expired session. Please sign in again.',
    });
  },

  invalidCode(remainingAttempts?: number) {
    const suffix =
      remainingAttempts === undefined ? '' : ` ${remainingAttempts} attempts remaining.`;
    return new AuthError({
      kind: 'INVALID_CODE',
      code: 'UNAUTHORIZED',
      status: 401,
      message: `Invalid code.${suffix}`,
      hints: remainingAttempts === undefined ? undefined : { remainingAttempts },
    });
  },

  /** A sensitive change was attempted with proof that did not check out. */
  verificationFailed(message = 'Invalid password or authenticator code.') {
    return new AuthError({
      kind: 'INVALID_CODE',
      code: 'UNAUTHORIZED',
      status: 401,
      message,
    });
  },

  tooManyAttempts(retryAfterSeconds: number) {
    return new AuthError({
      kind: 'TOO_MANY_ATTEMPTS',
      code: 'RATE_LIMITED',
      status: 429,
      message: 'Too many failed attempts. Please sign in again later.',
      hints: { retryAfterSeconds },
    });
  },

  accountLinkConflict(message = 'This account cannot be linked to the OAuth provider.') {
    return new AuthError({
      kind: 'ACCOUNT_LINK_CONFLICT',
      code: 'CONFLICT',
      status: 409,
      message,
    });
  },

  notFound(message = 'Not found.') {
    return new AuthError({ kind: 'NOT_FOUND', code: 'NOT_FOUND', status: 404, message });
  },

  emailNotVerified() {
    return new AuthError({
      kind: 'EMAIL_NOT_VERIFIED',
      code: 'FORBIDDEN',
      status: 403,
      message: 'Please verify your email first.',
    });
  },

  twoFactorAlreadyEnabled(message = 'Two-factor authentication is already enabled.') {
    return new AuthError({
      kind: 'TWO_FACTOR_ALREADY_ENABLED',
      code: 'CONFLICT',
      status: 409,
      message,
    });
  },

  twoFactorNotEnabled(message = 'Two-factor authentication is not enabled.') {
    return new AuthError({
      kind: 'TWO_FACTOR_NOT_ENABLED',
      code: 'CONFLICT',
      status: 409,
      message,
    });
  },

  noSetupInProgress() {
    return new AuthError({
      kind: 'NO_SETUP_IN_PROGRESS',
      code: 'CONFLICT',
      status: 409,
      message: 'No authenticator setup in progress. Start setup first.',
    });
  },

  /** Sensitive change attempted without any proof (no password, no code). */
  verificationRequired(message = 'Either password or authenticator code is required.') {
    return new AuthError({
      kind: 'VERIFICATION_REQUIRED',
      code: 'VALIDATION_ERROR',
      status: 400,
      message,
    });
  },

  weakPassword(message: string) {
    return new AuthError({
      kind: 'WEAK_PASSWORD',
      code: 'VALIDATION_ERROR',
      status: 400,
      message,
    });
  },

  /** The email OTP could not be handed to the notifier; the flow cannot continue. */
  codeDeliveryFailed() {
    return new AuthError({
      kind: 'CODE_DELIVERY_FAILED',
      code: 'UNAVAILABLE',
      status: 503,
      message: 'We could not send your verification code. Please try again.',
    });
  },
} as const;
