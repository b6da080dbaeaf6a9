/**
 * Role Resolver: maps an authenticated actor to exactly one role.
 *
 * Roles:
 *   - admin:    full catalog management, any loan target, every loan
 *   - employee: self-service loans to their own linked profile
 *   - company:  office / department-position loans
 *
 * Privilege flags win over group membership. Membership in the `admin`
 * group yields the admin role but never superuser privileges.
 */

import { z } from 'zod';

export const Role = z.enum(['admin', 'employee', 'company']);
export type Role = z.infer<typeof Role>;

/** Canonical role group names, in membership precedence order. */
export const ROLE_NAMES: readonly Role[] = Role.options;

/** Least-privileged role, used when nothing else applies. */
export const DEFAULT_ROLE: Role = 'employee';

export interface ActorIdentity {
  userId: string;
  username: string;
  email: string | null;
  isSuperuser: boolean;
  isStaff: boolean;
}

export function isAdminPrivileged(actor: Pick<ActorIdentity, 'isSuperuser' | 'isStaff'>): boolean {
  return actor.isSuperuser || actor.isStaff;
}

function isRole(name: string): name is Role {
  return Role.safeParse(name).success;
}

/**
 * Deterministic role resolution.
 *
 * 1. superuser/staff → admin
 * 2. first canonical group (in ROLE_NAMES order) the actor belongs to
 * 3. fallback → employee
 */
export function resolveRole(
  actor: Pick<ActorIdentity, 'isSuperuser' | 'isStaff'>,
  groupNames: readonly string[],
): Role {
  if (isAdminPrivileged(actor)) return 'admin';

  const memberOf = new Set(groupNames.filter(isRole));
  for (const role of ROLE_NAMES) {
    if (memberOf.has(role)) return role;
  }
  return DEFAULT_ROLE;
}
