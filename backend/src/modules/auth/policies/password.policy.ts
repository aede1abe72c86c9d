/**
 * backend/src/modules/auth/policies/password.policy.ts
 *
 * WHY:
 * - One password policy for reset and change (and any future registration).
 *
 * RULES:
 * - 8..72 characters (bcrypt ignores bytes past 72), at least one letter and one digit.
 * - The first failing rule is reported, as a WeakPassword error.
 */

import { z } from 'zod';

import { PASSWORD_MAX_LENGTH, PASSWORD_MIN_LENGTH } from '../auth.constants';
import { AuthErrors } from '../auth.errors';

export const PasswordSchema = z
  .string()
  .min(PASSWORD_MIN_LENGTH, `Password must be at least ${PASSWORD_MIN_LENGTH} characters.`)
  .max(PASSWORD_MAX_LENGTH, `Password must be at most ${PASSWORD_MAX_LENGTH} characters.`)
  .regex(/[A-Za-z]/, 'Password must contain at least one letter.')
  .regex(/\d/, 'Password must contain at least one digit.');

export function getPasswordPolicyFailure(password: string): string | null {
  const parsed = PasswordSchema.safeParse(password);
  if (parsed.success) return null;
  return parsed.error.issues[0]?.message ?? 'Password does not meet requirements.';
}

export function assertPasswordAllowed(password: string): void {
  const failure = getPasswordPolicyFailure(password);
  if (failure !== null) throw AuthErrors.weakPassword(failure);
}
