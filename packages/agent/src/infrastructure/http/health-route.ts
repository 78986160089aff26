/**
 * @file health-route.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import type { HiveStore, StoreHealth } from '../../domain/ports/hive-store.js';
import type { SessionRegistry } from '../../application/services/session-registry.js';

export interface HealthRouteConfig {
  version: string;
}

export interface HealthRouteDeps {
  registry: Pick<SessionRegistry, 'count' | 'getActiveSessionId'>;
  store: Pick<HiveStore, 'getHealth'>;
  /** Null when capture is disabled */
  isCaptureRunning: (() => boolean) | null;
}

interface HealthResponse {
  status: 'healthy' | 'degraded';
  version: string;
  uptime: number;
  capture: {
    enabled: boolean;
    running: boolean;
  };
  sessions: {
    total: number;
    activeSessionId: string | null;
  };
  store: {
    health: StoreHealth;
  };
  timestamp: string;
}

interface AppWithGet {
  get: (path: string, handler: (request: FastifyRequest, reply: FastifyReply) => Promise<unknown>) => unknown;
}

/**
 * Registers the health check routes on the Fastify server.
 */
export function registerHealthRoute(
  app: AppWithGet,
  config: HealthRouteConfig,
  deps: HealthRouteDeps
): void {
  const startTime = Date.now();

  app.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    const captureEnabled = deps.isCaptureRunning !== null;
    const captureRunning = deps.isCaptureRunning?.() ?? false;

    const response: HealthResponse = {
      status: captureEnabled && !captureRunning ? 'degraded' : 'healthy',
      version: config.version,
      uptime: Math.floor((Date.now() - startTime) / 1000),
      capture: {
        enabled: captureEnabled,
        running: captureRunning,
      },
      sessions: {
        total: deps.registry.count(),
        activeSessionId: deps.registry.getActiveSessionId(),
      },
      store: {
        health: deps.store.getHealth(),
      },
      timestamp: new Date().toISOString(),
    };

    return reply.status(200).send(response);
  });

  // Simple liveness probe
  app.get('/healthz', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send({ status: 'ok' });
  });
}
