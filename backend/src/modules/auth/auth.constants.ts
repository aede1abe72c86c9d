/**
 * backend/src/modules/auth/auth.constants.ts
 *
 * WHY:
 * - Central place for auth domain constants shared across components.
 *
 * RULES:
 * - Must not import from DB/framework code.
 * - Operator-tunable values (TTLs, attempt limits) live in config, not here.
 */

export const TOKEN_KINDS = ['access', 'refresh', 'password_reset', 'email_verification'] as const;

export const TOKEN_TYPE = 'bearer';

export const TWO_FACTOR_CHANNELS = ['email', 'totp'] as const;

export const EMAIL_CODE_DIGITS = 6;

/** ±1 step (30 s) of authenticator clock drift. */
export const TOTP_VERIFY_WINDOW = 1;

export const OAUTH_USERNAME_MAX_LENGTH = 42;
export const OAUTH_USERNAME_SUFFIX_LENGTH = 8;

export const PASSWORD_MIN_LENGTH = 8;
export const PASSWORD_MAX_LENGTH = 72;
