/**
 * @file identity-route.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import type { IdentityState } from '../../domain/value-objects/identity.js';
import { IdentityBodySchema, parseRequest } from '../../protocol/schemas.js';

export interface IdentityRouteDeps {
  identity: IdentityState;
}

type RouteHandler = (request: FastifyRequest, reply: FastifyReply) => Promise<unknown>;

interface AppWithRoutes {
  get: (path: string, handler: RouteHandler) => unknown;
  put: (path: string, handler: RouteHandler) => unknown;
}

/**
 * Registers identity routes. Records created after an update carry the new identity.
 */
export function registerIdentityRoute(app: AppWithRoutes, deps: IdentityRouteDeps): void {
  app.get('/identity', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send(deps.identity.snapshot());
  });

  app.put('/identity', async (request: FastifyRequest, reply: FastifyReply) => {
    const body = parseRequest(IdentityBodySchema, request.body);
    const updated = deps.identity.update(body);
    request.log.info({ userId: updated.userId, orgId: updated.orgId }, 'Identity updated');
    return reply.status(200).send(updated);
  });
}
