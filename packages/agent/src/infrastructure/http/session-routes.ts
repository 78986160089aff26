/**
 * @file session-routes.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { resolve } from 'path';
import type { FastifyRequest, FastifyReply } from 'fastify';
import type { SessionRegistry } from '../../application/services/session-registry.js';
import type { SessionSummarizer } from '../../application/services/session-summarizer.js';
import { SessionNotFoundError } from '../../domain/errors/domain-errors.js';
import {
  CreateSessionBodySchema,
  RecordsQuerySchema,
  SessionParamsSchema,
  parseRequest,
} from '../../protocol/schemas.js';

export interface SessionRoutesDeps {
  registry: SessionRegistry;
  /** Null when no model or store is configured */
  summarizer: SessionSummarizer | null;
  clock?: () => Date;
}

type RouteHandler = (request: FastifyRequest, reply: FastifyReply) => Promise<unknown>;

interface AppWithRoutes {
  get: (path: string, handler: RouteHandler) => unknown;
  post: (path: string, handler: RouteHandler) => unknown;
  delete: (path: string, handler: RouteHandler) => unknown;
}

/**
 * Registers session management routes.
 *
 * Routes:
 * - GET /sessions - List sessions and the active pointer
 * - POST /sessions - Create a session
 * - DELETE /sessions/:id - Delete a session and its spool directory
 * - POST /sessions/:id/activate - Make a session active
 * - GET /sessions/:id/records - Session history, optionally windowed
 * - POST /sessions/:id/summary - Summarize the session now
 */
export function registerSessionRoutes(app: AppWithRoutes, deps: SessionRoutesDeps): void {
  const { registry } = deps;
  const clock = deps.clock ?? (() => new Date());

  const requireSession = (request: FastifyRequest) => {
    const { id } = parseRequest(SessionParamsSchema, request.params);
    const session = registry.get(id);
    if (!session) {
      throw new SessionNotFoundError(id);
    }
    return session;
  };

  app.get('/sessions', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send({
      activeSessionId: registry.getActiveSessionId(),
      sessions: registry.list(),
    });
  });

  app.post('/sessions', async (request: FastifyRequest, reply: FastifyReply) => {
    const body = parseRequest(CreateSessionBodySchema, request.body);
    const session = await registry.create({
      projectName: body.projectName,
      repoPath: resolve(body.repoPath),
      goal: body.goal,
    });
    return reply.status(201).send(session.toInfo());
  });

  app.delete('/sessions/:id', async (request: FastifyRequest, reply: FastifyReply) => {
    const { id } = parseRequest(SessionParamsSchema, request.params);
    await registry.delete(id);
    return reply.status(204).send();
  });

  app.post('/sessions/:id/activate', async (request: FastifyRequest, reply: FastifyReply) => {
    const session = requireSession(request);
    registry.switch(session.id.value);
    return reply.status(200).send(session.toInfo());
  });

  app.get('/sessions/:id/records', async (request: FastifyRequest, reply: FastifyReply) => {
    const session = requireSession(request);
    const query = parseRequest(RecordsQuerySchema, request.query);
    const since = query.minutes ? new Date(clock().getTime() - query.minutes * 60_000) : new Date(0);
    const records = registry.window(
      session.id.value,
      since,
      query.allowedOnly ? (record) => record.isAllowed : undefined
    );
    return reply.status(200).send({
      sessionId: session.id.value,
      records: records.map((record) => record.toView()),
    });
  });

  app.post('/sessions/:id/summary', async (request: FastifyRequest, reply: FastifyReply) => {
    const session = requireSession(request);
    if (!deps.summarizer) {
      return reply.status(503).send({
        error: 'Session summaries require a model and a shared store',
        code: 'SUMMARY_UNAVAILABLE',
      });
    }
    const result = await deps.summarizer.summarizeSession(session.id.value);
    return reply.status(200).send({
      sessionId: session.id.value,
      summary: result?.document ?? null,
      stored: result?.stored ?? false,
    });
  });
}
