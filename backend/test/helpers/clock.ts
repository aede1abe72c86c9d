import { vi } from 'vitest';

/** Whole-second epoch so JWT `exp` math stays exact. */
export const T0 = Date.UTC(2026, 0, 15, 9, 0, 0);

/**
 * Fakes Date only: bcrypt and other real async work keep running,
 * while cache TTLs, JWT expiry and TOTP steps follow the frozen clock.
 */
export function freezeClock(): void {
  vi.useFakeTimers({ toFake: ['Date'] });
  vi.setSystemTime(T0);
}

/** Moves the frozen clock to T0 + ms. */
export function at(ms: number): void {
  vi.setSystemTime(T0 + ms);
}

export function isoAt(ms: number): string {
  return new Date(T0 + ms).toISOString();
}
