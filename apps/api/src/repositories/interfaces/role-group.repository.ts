/**
 * Role Group Repository Interface
 * Named groups with a flat user membership list.
 */

export interface RoleGroup {
  name: string;
  memberCount: number;
}

export interface IRoleGroupRepository {
  /** Create the named groups that do not exist yet; returns the names created. */
  ensureGroups(names: readonly string[]): Promise<string[]>;
  listGroups(): Promise<RoleGroup[]>;
  findGroupNamesForUser(userId: string): Promise<string[]>;
  /** Returns false when the group does not exist. */
  addMember(groupName: string, userId: string): Promise<boolean>;
  /** Returns false when the group or the membership does not exist. */
  removeMember(groupName: string, userId: string): Promise<boolean>;
}
