import fp from 'fastify-plugin';
import { FastifyInstance, FastifyRequest } from 'fastify';
import { UnauthorizedError } from '../lib/errors.js';
import { SYSTEM_ACTOR } from '../types/index.js';
import type { Actor } from '../types/index.js';

export const AGENT_HEADER = 'x-agent-id';
export const USER_HEADER = 'x-user-id';

declare module 'fastify' {
  interface FastifyInstance {
    requireAgent: (request: FastifyRequest) => string;
  }

  interface FastifyRequest {
    actor: Actor;
  }
}

function headerValue(request: FastifyRequest, name: string): string | null {
  const value = request.headers[name];
  const first = Array.isArray(value) ? value[0] : value;
  const trimmed = first?.trim();
  return trimmed ? trimmed : null;
}

/**
 * Resolve the calling actor from the request headers. An agent id wins over
 * a user id; a request carrying neither acts as the system.
 */
export function resolveActor(request: FastifyRequest): Actor {
  const agentId = headerValue(request, AGENT_HEADER);
  if (agentId) {
    return { type: 'agent', id: agentId };
  }
  const userId = headerValue(request, USER_HEADER);
  if (userId) {
    return { type: 'user', id: userId };
  }
  return SYSTEM_ACTOR;
}

async function actorPlugin(fastify: FastifyInstance): Promise<void> {
  fastify.decorateRequest('actor', null);

  fastify.addHook('onRequest', async (request) => {
    request.actor = resolveActor(request);
  });

  /**
   * Lease operations need an agent: returns its id as the lease holder.
   */
  fastify.decorate('requireAgent', function (request: FastifyRequest): string {
    if (request.actor.type !== 'agent' || !request.actor.id) {
      throw new UnauthorizedError(`This operation requires the ${AGENT_HEADER} header`);
    }
    return request.actor.id;
  });
}

export default fp(actorPlugin, {
  name: 'actor',
});
