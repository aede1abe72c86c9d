/**
 * backend/src/modules/auth/helpers/email-domain.ts
 *
 * WHY:
 * - Logs carry the email domain only (PII-minimized), never the full address.
 *
 * RULES:
 * - Pure function.
 * - Never throws.
 */

export function emailDomain(email: string): string {
  const at = email.lastIndexOf('@');
  return at >= 0 ? email.slice(at + 1).toLowerCase() : 'unknown';
}
