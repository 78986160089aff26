/**
 * @file oracle-route.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import type { OracleQueryEngine } from '../../application/services/oracle-query-engine.js';
import { OracleAskBodySchema, parseRequest } from '../../protocol/schemas.js';

export interface OracleRouteDeps {
  oracle: Pick<OracleQueryEngine, 'ask'>;
}

interface AppWithPost {
  post: (path: string, handler: (request: FastifyRequest, reply: FastifyReply) => Promise<unknown>) => unknown;
}

export function registerOracleRoute(app: AppWithPost, deps: OracleRouteDeps): void {
  app.post('/oracle/ask', async (request: FastifyRequest, reply: FastifyReply) => {
    const body = parseRequest(OracleAskBodySchema, request.body);
    const answer = await deps.oracle.ask(body);
    return reply.status(200).send(answer);
  });
}
