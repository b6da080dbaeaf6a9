/**
 * Authentication Plugin
 * JWT-based auth with role-based access control.
 *
 * Tokens are issued by the identity provider; this service only verifies
 * them. The role is resolved per request from privilege flags and role
 * group membership, never trusted from the token.
 */

import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import fastifyJwt from '@fastify/jwt';
import { z } from 'zod';
import type { ActorIdentity, Role } from '@loandesk/domain';
import { getRoleGroupRepository } from '../repositories/index.js';
import { resolveActorRole } from '../services/role.service.js';

// JWT payload type
export const JwtPayloadSchema = z.object({
  userId: z.string().uuid(),
  username: z.string().min(1),
  email: z.string().nullable(),
  isSuperuser: z.boolean(),
  isStaff: z.boolean(),
});
export type JwtPayload = z.infer<typeof JwtPayloadSchema>;

// Extend @fastify/jwt module to type the user property
declare module '@fastify/jwt' {
  interface FastifyJWT {
    payload: JwtPayload;
    user: JwtPayload;
  }
}

declare module 'fastify' {
  interface FastifyRequest {
    /** Resolved by the auth preHandlers; `employee` until then. */
    role: Role;
  }
}

export interface AuthPluginOptions {
  secret: string;
}

/** The verified token as the domain's actor identity. */
export function toActor(user: JwtPayload): ActorIdentity {
  return {
    userId: user.userId,
    username: user.username,
    email: user.email,
    isSuperuser: user.isSuperuser,
    isStaff: user.isStaff,
  };
}

export async function authPlugin(fastify: FastifyInstance, options: AuthPluginOptions): Promise<void> {
  await fastify.register(fastifyJwt, {
    secret: options.secret,
    sign: {
      expiresIn: '24h',
    },
  });

  fastify.decorateRequest('role', 'employee');
}

// ============================================================================
// Authorization helpers (preHandler functions)
// ============================================================================

async function authenticate(request: FastifyRequest, reply: FastifyReply): Promise<boolean> {
  try {
    await request.jwtVerify();
  } catch (err) {
    request.log.warn({ code: 'AUTH_FAILED', method: request.method, url: request.url }, 'Authentication failed');
    reply.status(401).send({ error: { code: 'UNAUTHENTICATED', message: 'Authentication required', requestId: request.requestId } });
    return false;
  }

  // Signed by a trusted issuer, but the claims still have to match
  if (!JwtPayloadSchema.safeParse(request.user).success) {
    request.log.warn({ code: 'AUTH_FAILED', method: request.method, url: request.url, reason: 'claims' }, 'Authentication failed');
    reply.status(401).send({ error: { code: 'UNAUTHENTICATED', message: 'Authentication required', requestId: request.requestId } });
    return false;
  }

  request.role = await resolveActorRole(getRoleGroupRepository(), toActor(request.user));
  return true;
}

/**
 * Require ANY of the listed roles.
 */
export function requireRoles(...allowedRoles: Role[]) {
  return async function (request: FastifyRequest, reply: FastifyReply) {
    if (!(await authenticate(request, reply))) return reply;

    if (!allowedRoles.includes(request.role)) {
      request.log.warn({ code: 'AUTHZ_DENIED', userId: request.user.userId, role: request.role, requiredRoles: allowedRoles }, 'Authorization denied: missing roles');
      return reply.status(403).send({
        error: { code: 'FORBIDDEN', message: `Required roles: ${allowedRoles.join(', ')}`, requestId: request.requestId },
      });
    }
  };
}

// Pre-built role checks
export const requireAuthenticated = requireRoles('admin', 'employee', 'company');
export const requireAdmin = requireRoles('admin');
