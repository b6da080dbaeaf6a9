/**
 * Fastify application assembly.
 * Kept separate from the process entry point so tests can build the same
 * instance and drive it with `inject`.
 */

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import sensible from '@fastify/sensible';
import { isLoanError } from '@loandesk/domain';
import type { AppConfig } from './config.js';
import { authPlugin } from './plugins/auth.js';
import { requestIdPlugin } from './plugins/request-id.js';
import { describeConstraintError } from './utils/pg-errors.js';
import { fail, failWith } from './utils/reply.js';
import { assetsRoutes } from './routes/assets.routes.js';
import { categoriesRoutes } from './routes/categories.routes.js';
import { departmentsRoutes } from './routes/departments.routes.js';
import { desksRoutes, officesRoutes, roomsRoutes } from './routes/locations.routes.js';
import { loansRoutes } from './routes/loans.routes.js';
import { meRoutes } from './routes/me.routes.js';
import { personsRoutes } from './routes/persons.routes.js';
import { roleGroupsRoutes } from './routes/role-groups.routes.js';

export interface BuildAppOptions {
  config: AppConfig;
  /** Overrides the pino logger settings derived from config (tests pass `false`). */
  logger?: boolean;
}

export async function buildApp({ config, logger }: BuildAppOptions): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: logger ?? {
      level: config.LOG_LEVEL,
      transport: config.NODE_ENV === 'development'
        ? { target: 'pino-pretty', options: { colorize: true } }
        : undefined,
    },
  });

  await fastify.register(cors, {
    origin: config.CORS_ORIGIN,
    credentials: true,
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-Id'],
    exposedHeaders: ['X-Request-Id'],
  });

  await fastify.register(sensible);

  // Called directly so the JWT decorators and hooks reach every route plugin
  await authPlugin(fastify, { secret: config.JWT_SECRET });
  requestIdPlugin(fastify);

  // Centralized error handler: consistent envelope, no stack trace leakage
  fastify.setErrorHandler((error, request, reply) => {
    if (isLoanError(error)) {
      return failWith(reply, error);
    }

    const constraint = describeConstraintError(error);
    if (constraint) {
      request.log.info({ code: constraint.code, pgCode: error.code }, constraint.message);
      return fail(reply, constraint.code, constraint.message, constraint.statusCode);
    }

    // JWT verification errors bubble as 401
    if (error.statusCode === 401) {
      return fail(reply, 'UNAUTHENTICATED', 'Authentication required', 401);
    }
    // Fastify validation errors (e.g., malformed JSON, content-type)
    if (error.validation || error.statusCode === 400) {
      return fail(reply, 'VALIDATION_ERROR', error.message, 400);
    }
    if (error.statusCode !== undefined && error.statusCode > 400 && error.statusCode < 500) {
      return fail(reply, 'BAD_REQUEST', error.message, error.statusCode);
    }

    request.log.error({ err: error }, 'Unhandled error');
    return fail(reply, 'INTERNAL_ERROR', 'Internal server error', 500);
  });

  fastify.setNotFoundHandler((request, reply) => {
    return fail(reply, 'NOT_FOUND', `Route ${request.method} ${request.url} not found`, 404);
  });

  fastify.get('/api/health', async () => ({ status: 'ok', timestamp: new Date().toISOString() }));

  await fastify.register(meRoutes, { prefix: '/api/me' });
  await fastify.register(loansRoutes, { prefix: '/api/loans' });
  await fastify.register(assetsRoutes, { prefix: '/api/assets' });
  await fastify.register(categoriesRoutes, { prefix: '/api/categories' });
  await fastify.register(personsRoutes, { prefix: '/api/persons' });
  await fastify.register(officesRoutes, { prefix: '/api/offices' });
  await fastify.register(roomsRoutes, { prefix: '/api/rooms' });
  await fastify.register(desksRoutes, { prefix: '/api/desks' });
  await fastify.register(departmentsRoutes, { prefix: '/api/departments' });
  await fastify.register(roleGroupsRoutes, { prefix: '/api/role-groups' });

  return fastify;
}
