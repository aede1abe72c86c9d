import { describe, it, expect } from 'vitest';
import { usernameBaseFromEmail } from '../../../src/modules/auth/oauth/derive-username';

describe('usernameBaseFromEmail', () => {
  it('uses the local part of the address', () => {
    expect(usernameBaseFromEmail('sam.ortiz@example.com')).toBe('sam.ortiz');
  });

  it('cuts long local parts to 42 characters', () => {
    const local = 'a'.repeat(60);
    expect(usernameBaseFromEmail(`${local}@example.com`)).toBe('a'.repeat(42));
  });

  it('falls back to "user" for an empty local part', () => {
    expect(usernameBaseFromEmail('@example.com')).toBe('user');
  });
});
