/**
 * Person Routes
 * People that can hold loans, optionally linked to a login identity.
 */

import { FastifyInstance } from 'fastify';
import { personName, type Person } from '@loandesk/domain';
import {
  CreatePersonRequestSchema,
  IdParamsSchema,
  PersonListQuerySchema,
  UpdatePersonRequestSchema,
} from '../schemas/index.js';
import { requireAdmin, requireAuthenticated } from '../plugins/auth.js';
import { getPersonRepository } from '../repositories/index.js';
import { ok, fail, validated } from '../utils/reply.js';

function formatPerson(person: Person) {
  return {
    ...person,
    name: personName(person),
  };
}

export async function personsRoutes(fastify: FastifyInstance): Promise<void> {
  const personRepo = getPersonRepository();

  /**
   * GET /persons
   * Filters: name (matches first or last name), email, department (repeatable)
   */
  fastify.get('/', {
    preHandler: [requireAuthenticated],
  }, async (request, reply) => {
    const filters = validated(reply, PersonListQuerySchema, request.query);
    if (!filters) return;

    const persons = await personRepo.list(filters);
    return ok(reply, { persons: persons.map(formatPerson) });
  });

  /**
   * GET /persons/departments
   * Distinct free-text department labels, for filter pickers.
   */
  fastify.get('/departments', {
    preHandler: [requireAuthenticated],
  }, async (_request, reply) => {
    const departments = await personRepo.listDepartmentLabels();
    return ok(reply, { departments });
  });

  fastify.get('/:id', {
    preHandler: [requireAuthenticated],
  }, async (request, reply) => {
    const params = validated(reply, IdParamsSchema, request.params);
    if (!params) return;

    const person = await personRepo.findById(params.id);
    if (!person) {
      return fail(reply, 'NOT_FOUND', 'Person not found', 404);
    }
    return ok(reply, { person: formatPerson(person) });
  });

  fastify.post('/', {
    preHandler: [requireAdmin],
  }, async (request, reply) => {
    const body = validated(reply, CreatePersonRequestSchema, request.body);
    if (!body) return;

    const person = await personRepo.create({
      firstName: body.firstName,
      lastName: body.lastName,
      department: body.department ?? null,
      email: body.email ?? null,
      userId: body.userId ?? null,
    });
    return ok(reply, { person: formatPerson(person) }, 201);
  });

  fastify.patch('/:id', {
    preHandler: [requireAdmin],
  }, async (request, reply) => {
    const params = validated(reply, IdParamsSchema, request.params);
    if (!params) return;
    const body = validated(reply, UpdatePersonRequestSchema, request.body);
    if (!body) return;

    const person = await personRepo.update(params.id, body);
    if (!person) {
      return fail(reply, 'NOT_FOUND', 'Person not found', 404);
    }
    return ok(reply, { person: formatPerson(person) });
  });

  fastify.delete('/:id', {
    preHandler: [requireAdmin],
  }, async (request, reply) => {
    const params = validated(reply, IdParamsSchema, request.params);
    if (!params) return;

    const deleted = await personRepo.delete(params.id);
    if (!deleted) {
      return fail(reply, 'NOT_FOUND', 'Person not found', 404);
    }
    return reply.status(204).send();
  });
}
