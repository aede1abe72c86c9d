/**
 * backend/src/modules/identities/policies/role.policy.ts
 *
 * WHY:
 * - Role checks are a security rule; keep them pure + unit-testable.
 *
 * RULES:
 * - Roles are ordered: user < admin < superadmin. A higher role satisfies a lower requirement.
 * - Never trust the advisory `role` claim in a token; pass the role from a fresh store lookup.
 */

import { AppError } from '../../../shared/errors/app-error';
import { ROLES, type Role } from '../identity.types';

function rank(role: Role): number {
  return ROLES.indexOf(role);
}

export function hasRole(actual: Role, required: Role): boolean {
  return rank(actual) >= rank(required);
}

export function isAdmin(role: Role): boolean {
  return hasRole(role, 'admin');
}

export function isSuperadmin(role: Role): boolean {
  return role === 'superadmin';
}

export function assertRoleAllowed(actual: Role, required: Role): void {
  if (!hasRole(actual, required)) {
    throw AppError.forbidden('Insufficient permissions.', { required });
  }
}
