import { describe, it, expect } from 'vitest';
import {
  assertPasswordAllowed,
  getPasswordPolicyFailure,
} from '../../../src/modules/auth/policies/password.policy';
import { captureAuthErrorSync } from '../../helpers/auth-error';

describe('password policy', () => {
  it('accepts 8+ characters with a letter and a digit', () => {
    expect(getPasswordPolicyFailure('password1')).toBeNull();
    expect(getPasswordPolicyFailure('12345abc')).toBeNull();
  });

  it('reports the first failing rule', () => {
    expect(getPasswordPolicyFailure('abc1')).toBe('Password must be at least 8 characters.');
    expect(getPasswordPolicyFailure('a1'.repeat(37))).toBe('Password must be at most 72 characters.');
    expect(getPasswordPolicyFailure('12345678')).toBe('Password must contain at least one letter.');
    expect(getPasswordPolicyFailure('abcdefgh')).toBe('Password must contain at least one digit.');
  });

  it('assert throws WeakPassword with the reason', () => {
    const err = captureAuthErrorSync(() => assertPasswordAllowed('abcdefgh'));
    expect(err.kind).toBe('WEAK_PASSWORD');
    expect(err.message).toBe('Password must contain at least one digit.');
  });
});
