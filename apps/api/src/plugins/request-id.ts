/**
 * Request ID Plugin
 *
 * Assigns a correlation ID to every request:
 * - Accepts inbound X-Request-Id header from clients
 * - Generates a UUID if none provided
 * - Binds requestId to pino logger for structured logging
 * - Returns X-Request-Id header on every response
 */

import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { randomUUID } from 'crypto';

declare module 'fastify' {
  interface FastifyRequest {
    requestId: string;
  }
}

const MAX_INBOUND_LENGTH = 128;

function inboundRequestId(request: FastifyRequest): string | null {
  const header = request.headers['x-request-id'];
  const value = Array.isArray(header) ? header[0] : header;
  return value && value.length <= MAX_INBOUND_LENGTH ? value : null;
}

/**
 * Installs the hooks on the given instance. Call it on the root instance
 * (not through `register`) so the hooks reach every route.
 */
export function requestIdPlugin(fastify: FastifyInstance): void {
  fastify.decorateRequest('requestId', '');

  fastify.addHook('onRequest', (request: FastifyRequest, _reply: FastifyReply, done) => {
    const id = inboundRequestId(request) ?? randomUUID();
    request.requestId = id;
    // Rebind pino child logger with requestId for all subsequent logs
    request.log = request.log.child({ requestId: id });
    done();
  });

  fastify.addHook('onSend', (request: FastifyRequest, reply: FastifyReply, payload: unknown, done) => {
    reply.header('X-Request-Id', request.requestId);
    done(null, payload);
  });
}
