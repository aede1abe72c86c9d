/**
 * src/shared/messaging/queue.ts
 *
 * WHY:
 * - Decouples "I need to send an email" from "here is how emails are sent".
 * - Auth flows enqueue messages; the transport (SES, SendGrid, a worker queue)
 *   is wired at the DI layer only. Flows never change when transport changes.
 *
 * RULES:
 * - Queue interface depends on nothing else in this codebase (shared → nothing).
 * - Message types are discriminated unions on the `type` field.
 * - Messages must be JSON-serializable.
 * - Raw one-time tokens and codes are allowed here: they travel to the renderer
 *   so the link or code can be shown. They are never logged or stored.
 * - Never put password hashes, TOTP secrets or access/refresh tokens in messages.
 */

// ── Message types ─────────────────────────────────────────────

export type EmailVerificationMessage = {
  type: 'auth.email-verification';
  identityId: number;
  email: string;
  username: string;
  /** Full link: {APP_BASE_URL}/verify-email?token={token} */
  link: string;
  expiresInHours: number;
};

export type PasswordResetMessage = {
  type: 'auth.password-reset';
  identityId: number;
  email: string;
  username: string;
  /** Full link: {APP_BASE_URL}/reset-password?token={token} */
  link: string;
  expiresInMinutes: number;
};

export type TwoFactorCodeMessage = {
  type: 'auth.two-factor-code';
  identityId: number;
  email: string;
  username: string;
  code: string;
  expiresInMinutes: number;
};

export const SECURITY_NOTICES = [
  'password_changed',
  'password_reset',
  'email_two_factor_enabled',
  'email_two_factor_disabled',
  'totp_enabled',
  'totp_disabled',
] as const;

export type SecurityNoticeKind = (typeof SECURITY_NOTICES)[number];

export type SecurityNoticeMessage = {
  type: 'auth.security-notice';
  identityId: number;
  email: string;
  notice: SecurityNoticeKind;
  /** ISO timestamp */
  occurredAt: string;
};

export type QueueMessage =
  | EmailVerificationMessage
  | PasswordResetMessage
  | TwoFactorCodeMessage
  | SecurityNoticeMessage;

export type QueueMessageType = QueueMessage['type'];

// ── Queue interface ───────────────────────────────────────────

export interface Queue {
  enqueue(message: QueueMessage): Promise<void>;
}
