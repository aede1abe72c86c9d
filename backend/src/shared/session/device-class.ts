/**
 * src/shared/session/device-class.ts
 *
 * WHY:
 * - Coarse device label for the "active sessions" view. Substring matching only;
 *   it is a display hint, never a security signal.
 *
 * RULES (first match wins, case-insensitive):
 * - empty/absent           → unknown
 * - mobile | android       → tablet if it also says tablet | ipad, else mobile
 * - windows | macintosh | linux → desktop
 * - anything else          → other
 */

import type { DeviceClass } from './session.types';

export function detectDeviceClass(userAgent: string | null | undefined): DeviceClass {
  if (!userAgent) return 'unknown';

  const ua = userAgent.toLowerCase();

  if (ua.includes('mobile') || ua.includes('android')) {
    return ua.includes('tablet') || ua.includes('ipad') ? 'tablet' : 'mobile';
  }
  if (ua.includes('windows') || ua.includes('macintosh') || ua.includes('linux')) {
    return 'desktop';
  }
  return 'other';
}
