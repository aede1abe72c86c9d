import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { InMemCache } from '../../../../src/shared/cache/inmem-cache';
import { AttemptCounter } from '../../../../src/shared/security/attempt-counter';
import { at, freezeClock } from '../../../helpers/clock';

describe('AttemptCounter', () => {
  let counter: AttemptCounter;

  beforeEach(() => {
    freezeClock();
    counter = new AttemptCounter(new InMemCache(), { maxAttempts: 3, windowSeconds: 60 });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('counts down to exhaustion', async () => {
    expect(await counter.hit('k')).toEqual({ attempts: 1, remaining: 2, exhausted: false });
    expect(await counter.hit('k')).toEqual({ attempts: 2, remaining: 1, exhausted: false });
    expect(await counter.hit('k')).toEqual({ attempts: 3, remaining: 0, exhausted: true });
    expect(await counter.isExhausted('k')).toBe(true);
  });

  it('reports the time left in the window as retry-after', async () => {
    await counter.hit('k');

    at(20_000);
    expect(await counter.retryAfterSeconds('k')).toBe(40);
  });

  it('falls back to the full window when the key is unknown', async () => {
    expect(await counter.retryAfterSeconds('missing')).toBe(60);
  });

  it('reset clears the count', async () => {
    await counter.hit('k');
    await counter.hit('k');
    await counter.reset('k');

    expect(await counter.count('k')).toBe(0);
    expect(await counter.isExhausted('k')).toBe(false);
  });

  it('forgets failures once the window closes', async () => {
    await counter.hit('k');
    await counter.hit('k');

    at(60_000);
    expect(await counter.count('k')).toBe(0);
  });
});
