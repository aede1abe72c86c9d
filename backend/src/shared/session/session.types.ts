/**
 * src/shared/session/session.types.ts
 *
 * WHY:
 * - Defines the session record kept per issued token, so an identity can list
 *   and revoke its active devices.
 * - Records live in the cache (JSON) with a TTL equal to the refresh-token lifetime.
 *
 * RULES:
 * - Session data must be JSON-serializable (stored in Redis as JSON string).
 * - Never store tokens in session data; the session id is a one-way hash of the token.
 * - The registry is advisory: it does not gate token validity on its own.
 */

import { z } from 'zod';

export const DEVICE_CLASSES = ['mobile', 'tablet', 'desktop', 'other', 'unknown'] as const;

export type DeviceClass = (typeof DEVICE_CLASSES)[number];

export const SessionRecordSchema = z.object({
  identityId: z.number().int(),
  createdAt: z.string(), // ISO string (JSON-safe)
  lastUsedAt: z.string(),
  ip: z.string().nullable(),
  userAgent: z.string().nullable(),
  deviceClass: z.enum(DEVICE_CLASSES),
});

export type SessionRecord = z.infer<typeof SessionRecordSchema>;

/** What list() hands back to a caller. userAgent is truncated for display. */
export type SessionView = {
  sessionId: string;
  createdAt: string;
  lastUsedAt: string;
  ip: string | null;
  userAgent: string | null;
  deviceClass: DeviceClass;
  isCurrent: boolean;
};

export const SESSION_ID_LENGTH = 32;
export const USER_AGENT_VIEW_LENGTH = 100;
