/**
 * Department Routes
 * Departments and their numbered positions ("IT #3").
 */

import { FastifyInstance } from 'fastify';
import { positionName, type Department, type DepartmentPosition } from '@loandesk/domain';
import {
  CreateDepartmentRequestSchema,
  CreatePositionRequestSchema,
  DepartmentPositionParamsSchema,
  IdParamsSchema,
  UpdateDepartmentRequestSchema,
} from '../schemas/index.js';
import { requireAdmin, requireAuthenticated } from '../plugins/auth.js';
import { getDepartmentRepository } from '../repositories/index.js';
import { ok, fail, validated } from '../utils/reply.js';

function formatPosition(department: Department, position: DepartmentPosition) {
  return {
    ...position,
    label: positionName({ departmentName: department.name, number: position.number }),
  };
}

export async function departmentsRoutes(fastify: FastifyInstance): Promise<void> {
  const departmentRepo = getDepartmentRepository();

  fastify.get('/', {
    preHandler: [requireAuthenticated],
  }, async (_request, reply) => {
    const departments = await departmentRepo.listDepartments();
    return ok(reply, { departments });
  });

  fastify.get('/:id', {
    preHandler: [requireAuthenticated],
  }, async (request, reply) => {
    const params = validated(reply, IdParamsSchema, request.params);
    if (!params) return;

    const department = await departmentRepo.findDepartmentById(params.id);
    if (!department) {
      return fail(reply, 'NOT_FOUND', 'Department not found', 404);
    }
    return ok(reply, { department });
  });

  /**
   * POST /departments
   * `positions: N` also creates positions 1..N.
   */
  fastify.post('/', {
    preHandler: [requireAdmin],
  }, async (request, reply) => {
    const body = validated(reply, CreateDepartmentRequestSchema, request.body);
    if (!body) return;

    const department = await departmentRepo.createDepartment({ name: body.name, positions: body.positions });
    return ok(reply, { department }, 201);
  });

  fastify.patch('/:id', {
    preHandler: [requireAdmin],
  }, async (request, reply) => {
    const params = validated(reply, IdParamsSchema, request.params);
    if (!params) return;
    const body = validated(reply, UpdateDepartmentRequestSchema, request.body);
    if (!body) return;

    const department = await departmentRepo.updateDepartment(params.id, body);
    if (!department) {
      return fail(reply, 'NOT_FOUND', 'Department not found', 404);
    }
    return ok(reply, { department });
  });

  fastify.delete('/:id', {
    preHandler: [requireAdmin],
  }, async (request, reply) => {
    const params = validated(reply, IdParamsSchema, request.params);
    if (!params) return;

    const deleted = await departmentRepo.deleteDepartment(params.id);
    if (!deleted) {
      return fail(reply, 'NOT_FOUND', 'Department not found', 404);
    }
    return reply.status(204).send();
  });

  // ==========================================================================
  // POSITIONS
  // ==========================================================================

  fastify.get('/:id/positions', {
    preHandler: [requireAuthenticated],
  }, async (request, reply) => {
    const params = validated(reply, IdParamsSchema, request.params);
    if (!params) return;

    const department = await departmentRepo.findDepartmentById(params.id);
    if (!department) {
      return fail(reply, 'NOT_FOUND', 'Department not found', 404);
    }
    const positions = await departmentRepo.listPositions(department.id);
    return ok(reply, { positions: positions.map((p) => formatPosition(department, p)) });
  });

  fastify.post('/:id/positions', {
    preHandler: [requireAdmin],
  }, async (request, reply) => {
    const params = validated(reply, IdParamsSchema, request.params);
    if (!params) return;
    const body = validated(reply, CreatePositionRequestSchema, request.body);
    if (!body) return;

    const department = await departmentRepo.findDepartmentById(params.id);
    if (!department) {
      return fail(reply, 'NOT_FOUND', 'Department not found', 404);
    }
    const position = await departmentRepo.createPosition(department.id, body.number);
    return ok(reply, { position: formatPosition(department, position) }, 201);
  });

  fastify.delete('/:id/positions/:positionId', {
    preHandler: [requireAdmin],
  }, async (request, reply) => {
    const params = validated(reply, DepartmentPositionParamsSchema, request.params);
    if (!params) return;

    const position = await departmentRepo.findPositionById(params.positionId);
    if (!position || position.departmentId !== params.id) {
      return fail(reply, 'NOT_FOUND', 'Department position not found', 404);
    }
    await departmentRepo.deletePosition(position.id);
    return reply.status(204).send();
  });
}
