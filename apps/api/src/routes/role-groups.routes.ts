/**
 * Role Group Routes (admin)
 * Membership in the `admin`, `employee` and `company` groups drives role
 * resolution for actors without privilege flags.
 */

import { FastifyInstance } from 'fastify';
import { RoleGroupMemberParamsSchema } from '../schemas/index.js';
import { requireAdmin } from '../plugins/auth.js';
import { getRoleGroupRepository } from '../repositories/index.js';
import { ok, fail, validated } from '../utils/reply.js';

export async function roleGroupsRoutes(fastify: FastifyInstance): Promise<void> {
  const roleGroupRepo = getRoleGroupRepository();

  fastify.get('/', {
    preHandler: [requireAdmin],
  }, async (_request, reply) => {
    const groups = await roleGroupRepo.listGroups();
    return ok(reply, { groups });
  });

  /**
   * PUT /role-groups/:name/members/:userId
   * Idempotent. 404 only when the group itself is missing.
   */
  fastify.put('/:name/members/:userId', {
    preHandler: [requireAdmin],
  }, async (request, reply) => {
    const params = validated(reply, RoleGroupMemberParamsSchema, request.params);
    if (!params) return;

    const added = await roleGroupRepo.addMember(params.name, params.userId);
    if (!added) {
      return fail(reply, 'NOT_FOUND', 'Role group not found', 404);
    }
    request.log.info({ code: 'ROLE_GROUP_MEMBER_ADDED', group: params.name, memberUserId: params.userId }, 'Role group membership updated');
    return ok(reply, { group: params.name, userId: params.userId });
  });

  fastify.delete('/:name/members/:userId', {
    preHandler: [requireAdmin],
  }, async (request, reply) => {
    const params = validated(reply, RoleGroupMemberParamsSchema, request.params);
    if (!params) return;

    const removed = await roleGroupRepo.removeMember(params.name, params.userId);
    if (!removed) {
      return fail(reply, 'NOT_FOUND', 'Membership not found', 404);
    }
    request.log.info({ code: 'ROLE_GROUP_MEMBER_REMOVED', group: params.name, memberUserId: params.userId }, 'Role group membership updated');
    return reply.status(204).send();
  });
}
