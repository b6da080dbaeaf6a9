/**
 * PostgreSQL Role Group Repository Implementation
 */

import { query } from '../../db/index.js';
import { IRoleGroupRepository, RoleGroup } from '../interfaces/role-group.repository.js';

export class PostgresRoleGroupRepository implements IRoleGroupRepository {
  async ensureGroups(names: readonly string[]): Promise<string[]> {
    if (names.length === 0) return [];
    const result = await query<{ name: string }>(`
      INSERT INTO role_group (name)
      SELECT UNNEST($1::varchar[])
      ON CONFLICT (name) DO NOTHING
      RETURNING name
    `, [names]);
    return result.rows.map(r => r.name);
  }

  async listGroups(): Promise<RoleGroup[]> {
    const result = await query<{ name: string; member_count: number }>(`
      SELECT g.name, COUNT(m.user_id)::int AS member_count
      FROM role_group g
      LEFT JOIN role_group_member m ON m.group_id = g.id
      GROUP BY g.id, g.name
      ORDER BY g.name
    `);
    return result.rows.map(r => ({ name: r.name, memberCount: r.member_count }));
  }

  async findGroupNamesForUser(userId: string): Promise<string[]> {
    const result = await query<{ name: string }>(`
      SELECT g.name
      FROM role_group_member m
      JOIN role_group g ON m.group_id = g.id
      WHERE m.user_id = $1
      ORDER BY g.name
    `, [userId]);
    return result.rows.map(r => r.name);
  }

  async addMember(groupName: string, userId: string): Promise<boolean> {
    const group = await query<{ id: string }>('SELECT id FROM role_group WHERE name = $1', [groupName]);
    if (group.rows.length === 0) return false;

    await query(`
      INSERT INTO role_group_member (group_id, user_id) VALUES ($1, $2)
      ON CONFLICT (group_id, user_id) DO NOTHING
    `, [group.rows[0].id, userId]);
    return true;
  }

  async removeMember(groupName: string, userId: string): Promise<boolean> {
    const result = await query(`
      DELETE FROM role_group_member m
      USING role_group g
      WHERE m.group_id = g.id AND g.name = $1 AND m.user_id = $2
    `, [groupName, userId]);
    return (result.rowCount ?? 0) > 0;
  }
}
