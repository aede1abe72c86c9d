/**
 * backend/src/shared/security/password-hasher.ts
 *
 * WHY:
 * - Password hashing must be consistent, safe, and easy to swap.
 * - Services depend on this interface, not bcrypt directly; tests can pass a
 *   cheaper cost without touching the login guard.
 *
 * RULES:
 * - verify() must be constant-time with respect to the hash contents.
 * - verify() returns false (never throws) for a malformed stored hash.
 */

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, hash: string): Promise<boolean>;
}
