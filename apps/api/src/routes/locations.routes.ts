/**
 * Location Routes
 * Offices, the rooms inside them, and the desks inside rooms.
 */

import { FastifyInstance } from 'fastify';
import { deskName } from '@loandesk/domain';
import {
  CreateDeskRequestSchema,
  CreateOfficeRequestSchema,
  CreateRoomRequestSchema,
  DeskListQuerySchema,
  IdParamsSchema,
  RoomListQuerySchema,
  UpdateDeskRequestSchema,
  UpdateOfficeRequestSchema,
  UpdateRoomRequestSchema,
} from '../schemas/index.js';
import { requireAdmin, requireAuthenticated } from '../plugins/auth.js';
import { getLocationRepository, type DeskWithLocation } from '../repositories/index.js';
import { ok, fail, validated } from '../utils/reply.js';

function formatDesk(desk: DeskWithLocation) {
  return {
    id: desk.id,
    roomId: desk.roomId,
    code: desk.code,
    roomName: desk.roomName,
    office: desk.office,
    label: deskName(desk),
  };
}

// ============================================================================
// OFFICES
// ============================================================================

export async function officesRoutes(fastify: FastifyInstance): Promise<void> {
  const locationRepo = getLocationRepository();

  fastify.get('/', {
    preHandler: [requireAuthenticated],
  }, async (_request, reply) => {
    const offices = await locationRepo.listOffices();
    return ok(reply, { offices });
  });

  fastify.get('/:id', {
    preHandler: [requireAuthenticated],
  }, async (request, reply) => {
    const params = validated(reply, IdParamsSchema, request.params);
    if (!params) return;

    const office = await locationRepo.findOfficeById(params.id);
    if (!office) {
      return fail(reply, 'NOT_FOUND', 'Office not found', 404);
    }
    return ok(reply, { office });
  });

  fastify.post('/', {
    preHandler: [requireAdmin],
  }, async (request, reply) => {
    const body = validated(reply, CreateOfficeRequestSchema, request.body);
    if (!body) return;

    const office = await locationRepo.createOffice({
      name: body.name,
      address: body.address ?? null,
    });
    return ok(reply, { office }, 201);
  });

  fastify.patch('/:id', {
    preHandler: [requireAdmin],
  }, async (request, reply) => {
    const params = validated(reply, IdParamsSchema, request.params);
    if (!params) return;
    const body = validated(reply, UpdateOfficeRequestSchema, request.body);
    if (!body) return;

    const office = await locationRepo.updateOffice(params.id, body);
    if (!office) {
      return fail(reply, 'NOT_FOUND', 'Office not found', 404);
    }
    return ok(reply, { office });
  });

  // Rooms cascade; loans that target the office block the delete
  fastify.delete('/:id', {
    preHandler: [requireAdmin],
  }, async (request, reply) => {
    const params = validated(reply, IdParamsSchema, request.params);
    if (!params) return;

    const deleted = await locationRepo.deleteOffice(params.id);
    if (!deleted) {
      return fail(reply, 'NOT_FOUND', 'Office not found', 404);
    }
    return reply.status(204).send();
  });
}

// ============================================================================
// ROOMS
// ============================================================================

export async function roomsRoutes(fastify: FastifyInstance): Promise<void> {
  const locationRepo = getLocationRepository();

  fastify.get('/', {
    preHandler: [requireAuthenticated],
  }, async (request, reply) => {
    const filters = validated(reply, RoomListQuerySchema, request.query);
    if (!filters) return;

    const rooms = await locationRepo.listRooms(filters);
    return ok(reply, { rooms });
  });

  fastify.get('/:id', {
    preHandler: [requireAuthenticated],
  }, async (request, reply) => {
    const params = validated(reply, IdParamsSchema, request.params);
    if (!params) return;

    const room = await locationRepo.findRoomById(params.id);
    if (!room) {
      return fail(reply, 'NOT_FOUND', 'Room not found', 404);
    }
    return ok(reply, { room });
  });

  fastify.post('/', {
    preHandler: [requireAdmin],
  }, async (request, reply) => {
    const body = validated(reply, CreateRoomRequestSchema, request.body);
    if (!body) return;

    if (!(await locationRepo.findOfficeById(body.officeId))) {
      return fail(reply, 'VALIDATION_ERROR', 'Validation error', 400, { officeId: 'Select a valid office.' });
    }

    const room = await locationRepo.createRoom(body);
    return ok(reply, { room }, 201);
  });

  fastify.patch('/:id', {
    preHandler: [requireAdmin],
  }, async (request, reply) => {
    const params = validated(reply, IdParamsSchema, request.params);
    if (!params) return;
    const body = validated(reply, UpdateRoomRequestSchema, request.body);
    if (!body) return;

    if (body.officeId && !(await locationRepo.findOfficeById(body.officeId))) {
      return fail(reply, 'VALIDATION_ERROR', 'Validation error', 400, { officeId: 'Select a valid office.' });
    }

    const room = await locationRepo.updateRoom(params.id, body);
    if (!room) {
      return fail(reply, 'NOT_FOUND', 'Room not found', 404);
    }
    return ok(reply, { room });
  });

  fastify.delete('/:id', {
    preHandler: [requireAdmin],
  }, async (request, reply) => {
    const params = validated(reply, IdParamsSchema, request.params);
    if (!params) return;

    const deleted = await locationRepo.deleteRoom(params.id);
    if (!deleted) {
      return fail(reply, 'NOT_FOUND', 'Room not found', 404);
    }
    return reply.status(204).send();
  });
}

// ============================================================================
// DESKS
// ============================================================================

export async function desksRoutes(fastify: FastifyInstance): Promise<void> {
  const locationRepo = getLocationRepository();

  /**
   * GET /desks
   * Filters: officeId, roomId
   */
  fastify.get('/', {
    preHandler: [requireAuthenticated],
  }, async (request, reply) => {
    const filters = validated(reply, DeskListQuerySchema, request.query);
    if (!filters) return;

    const desks = await locationRepo.listDesks(filters);
    return ok(reply, { desks: desks.map(formatDesk) });
  });

  fastify.get('/:id', {
    preHandler: [requireAuthenticated],
  }, async (request, reply) => {
    const params = validated(reply, IdParamsSchema, request.params);
    if (!params) return;

    const desk = await locationRepo.findDeskById(params.id);
    if (!desk) {
      return fail(reply, 'NOT_FOUND', 'Desk not found', 404);
    }
    return ok(reply, { desk: formatDesk(desk) });
  });

  fastify.post('/', {
    preHandler: [requireAdmin],
  }, async (request, reply) => {
    const body = validated(reply, CreateDeskRequestSchema, request.body);
    if (!body) return;

    if (!(await locationRepo.findRoomById(body.roomId))) {
      return fail(reply, 'VALIDATION_ERROR', 'Validation error', 400, { roomId: 'Select a valid room.' });
    }

    const desk = await locationRepo.createDesk(body);
    return ok(reply, { desk: formatDesk(desk) }, 201);
  });

  fastify.patch('/:id', {
    preHandler: [requireAdmin],
  }, async (request, reply) => {
    const params = validated(reply, IdParamsSchema, request.params);
    if (!params) return;
    const body = validated(reply, UpdateDeskRequestSchema, request.body);
    if (!body) return;

    if (body.roomId && !(await locationRepo.findRoomById(body.roomId))) {
      return fail(reply, 'VALIDATION_ERROR', 'Validation error', 400, { roomId: 'Select a valid room.' });
    }

    const desk = await locationRepo.updateDesk(params.id, body);
    if (!desk) {
      return fail(reply, 'NOT_FOUND', 'Desk not found', 404);
    }
    return ok(reply, { desk: formatDesk(desk) });
  });

  fastify.delete('/:id', {
    preHandler: [requireAdmin],
  }, async (request, reply) => {
    const params = validated(reply, IdParamsSchema, request.params);
    if (!params) return;

    const deleted = await locationRepo.deleteDesk(params.id);
    if (!deleted) {
      return fail(reply, 'NOT_FOUND', 'Desk not found', 404);
    }
    return reply.status(204).send();
  });
}
