/**
 * backend/src/shared/security/safe-equal.ts
 *
 * WHY:
 * - Comparing a submitted one-time code with `===` leaks, through timing, how
 *   many leading characters matched.
 *
 * RULES:
 * - Length mismatch returns false immediately; code lengths are public.
 */

import { timingSafeEqual } from 'node:crypto';

export function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a, 'utf8');
  const right = Buffer.from(b, 'utf8');
  if (left.length !== right.length) return false;
  return timingSafeEqual(left, right);
}
