/**
 * Role Resolver Service
 *
 * Turns an authenticated actor into exactly one Role, reading group
 * membership from the role-group store.
 */

import { ROLE_NAMES, resolveRole, type ActorIdentity, type Role } from '@loandesk/domain';
import type { IRoleGroupRepository } from '../repositories/index.js';

/** Create the canonical role groups if missing. Safe to call repeatedly. */
export async function ensureRoleGroups(groups: IRoleGroupRepository): Promise<string[]> {
  return groups.ensureGroups(ROLE_NAMES);
}

export async function resolveActorRole(
  groups: IRoleGroupRepository,
  actor: ActorIdentity,
): Promise<Role> {
  // Privilege flags win without a membership lookup
  if (actor.isSuperuser || actor.isStaff) return 'admin';
  const names = await groups.findGroupNamesForUser(actor.userId);
  return resolveRole(actor, names);
}
