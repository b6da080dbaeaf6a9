/**
 * Current actor: identity, resolved role, and linked person profile.
 */

import { FastifyInstance } from 'fastify';
import { allowedTargetKinds, personName } from '@loandesk/domain';
import { requireAuthenticated, toActor } from '../plugins/auth.js';
import { createLoanLifecycleService } from '../services/loan-lifecycle.service.js';
import { ok } from '../utils/reply.js';

export async function meRoutes(fastify: FastifyInstance): Promise<void> {
  const lifecycle = createLoanLifecycleService();

  fastify.get('/', {
    preHandler: [requireAuthenticated],
  }, async (request, reply) => {
    const actor = toActor(request.user);
    const person = await lifecycle.resolveActorPerson(actor);

    return ok(reply, {
      user: {
        userId: actor.userId,
        username: actor.username,
        email: actor.email,
      },
      role: request.role,
      targetKinds: allowedTargetKinds(request.role),
      person: person ? { ...person, name: personName(person) } : null,
    });
  });
}
