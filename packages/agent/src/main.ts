/**
 * @file main.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 *
 * Entry point for the devtrail agent.
 */

import { getEnv } from './config/env.js';
import { createAgentConfig } from './config/agent-config.js';
import { SHUTDOWN_CONFIG, getAgentVersion } from './config/constants.js';
import { createLogger } from './infrastructure/logging/pino-logger.js';
import { FileArtifactStorage } from './infrastructure/storage/file-artifact-storage.js';
import { SqliteHiveStore } from './infrastructure/persistence/sqlite-hive-store.js';
import { createModelAdapters } from './infrastructure/llm/index.js';
import { MacWindowSensor } from './infrastructure/sensors/macos-window-sensor.js';
import { MacScreenSensor } from './infrastructure/sensors/macos-screen-sensor.js';
import { ActiveWindowInspector } from './infrastructure/sensors/active-window-inspector.js';
import { CommitWatcherPool } from './infrastructure/git/commit-watcher-pool.js';
import { registerHealthRoute } from './infrastructure/http/health-route.js';
import { registerSessionRoutes } from './infrastructure/http/session-routes.js';
import { registerIdentityRoute } from './infrastructure/http/identity-route.js';
import { registerOracleRoute } from './infrastructure/http/oracle-route.js';
import { IdentityState } from './domain/value-objects/identity.js';
import { SessionRegistry } from './application/services/session-registry.js';
import { RemoteSync } from './application/services/remote-sync.js';
import { createBlocklistPrivacyFilter } from './application/services/privacy-filter.js';
import { CaptureScheduler } from './application/services/capture-scheduler.js';
import { ContextReporter } from './application/services/context-reporter.js';
import { SessionSummarizer } from './application/services/session-summarizer.js';
import { OracleQueryEngine } from './application/services/oracle-query-engine.js';
import { waitWithTimeout } from './application/services/bounded-wait.js';
import { createApp } from './app.js';

async function bootstrap(): Promise<void> {
  const version = getAgentVersion();

  // Load configuration
  const env = getEnv();
  const config = createAgentConfig(env);

  // Create logger
  const logger = createLogger({
    name: 'devtrail-agent',
    level: env.LOG_LEVEL,
    pretty: env.LOG_PRETTY || env.NODE_ENV === 'development',
  });

  logger.info(
    {
      version,
      nodeEnv: env.NODE_ENV,
      port: config.http.port,
      dataDir: env.DATA_DIR,
      captureIntervalMs: config.capture.intervalMs,
      storeConfigured: Boolean(config.store.path),
      modelConfigured: config.model !== null,
    },
    'Starting devtrail agent'
  );

  // Core state
  const artifacts = new FileArtifactStorage(config.capture.spoolRoot, logger);
  const registry = new SessionRegistry({
    artifacts,
    historyCapacity: config.capture.historyCapacity,
    logger,
  });
  const identity = new IdentityState(config.identity);
  const store = new SqliteHiveStore({ path: config.store.path, logger });
  const sync = new RemoteSync({ store, identity, logger });
  const adapters = createModelAdapters(config.model, logger);

  // Capture pipeline, only with a classifier to feed
  const windows = new ActiveWindowInspector(new MacWindowSensor(), logger);
  const scheduler = adapters
    ? new CaptureScheduler({
        registry,
        windows,
        screen: new MacScreenSensor(),
        classifier: adapters.classifier,
        artifacts,
        sync,
        identity,
        privacyFilter: createBlocklistPrivacyFilter(windows, config.capture.privacyBlocklist),
        intervalMs: config.capture.intervalMs,
        idleDelayMs: config.capture.idleDelayMs,
        stopGraceMs: config.capture.stopGraceMs,
        logger,
      })
    : null;

  // Commit reports
  const reporter = new ContextReporter({
    registry,
    generator: adapters?.generator ?? null,
    windowMinutes: config.report.windowMinutes,
    logger,
  });
  const watchers = new CommitWatcherPool({ registry, reporter, logger });
  watchers.attach();

  // Team memory
  const summarizer = adapters
    ? new SessionSummarizer({
        registry,
        store,
        generator: adapters.generator,
        identity,
        intervalMs: config.summary.intervalMs,
        logger,
      })
    : null;
  const oracle = new OracleQueryEngine({
    store,
    generator: adapters?.generator ?? null,
    identity,
    maxContext: config.oracle.maxContext,
    logger,
  });

  // Create Fastify app
  const app = createApp({ logger });

  registerHealthRoute(
    app,
    { version },
    {
      registry,
      store,
      isCaptureRunning: scheduler ? () => scheduler.isRunning() : null,
    }
  );
  registerSessionRoutes(app, { registry, summarizer });
  registerIdentityRoute(app, { identity });
  registerOracleRoute(app, { oracle });

  // Start HTTP server
  try {
    await app.listen({ port: config.http.port, host: config.http.host });
    logger.info(
      { address: `http://${config.http.host}:${config.http.port}` },
      'HTTP server started'
    );
  } catch (error) {
    logger.fatal({ error }, 'Failed to start HTTP server');
    process.exit(1);
  }

  scheduler?.start();
  summarizer?.start();

  // Graceful shutdown with timeout
  let isShuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    // Prevent multiple shutdown attempts
    if (isShuttingDown) {
      logger.warn({ signal }, 'Shutdown already in progress, forcing exit');
      process.exit(1);
    }
    isShuttingDown = true;

    logger.info({ signal }, 'Shutdown signal received');

    // Set up force exit timeout
    const forceExitTimeout = setTimeout(() => {
      logger.error('Graceful shutdown timeout exceeded, forcing exit');
      process.exit(1);
    }, SHUTDOWN_CONFIG.TIMEOUT_MS);

    try {
      logger.info('Stopping capture and summaries...');
      await Promise.all([scheduler?.stop(), summarizer?.stop()]);

      logger.info('Stopping commit watchers...');
      await watchers.stopAll();

      // Close HTTP server with timeout
      logger.info('Closing HTTP server...');
      if (!(await waitWithTimeout(app.close(), SHUTDOWN_CONFIG.HTTP_CLOSE_TIMEOUT_MS))) {
        logger.warn('HTTP server close timed out, continuing shutdown');
      }

      logger.info('Closing shared store...');
      store.close();

      clearTimeout(forceExitTimeout);
      logger.info('Shutdown complete');
      process.exit(0);
    } catch (error) {
      clearTimeout(forceExitTimeout);
      logger.error({ error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  // Unhandled rejection handler
  process.on('unhandledRejection', (reason, promise) => {
    logger.error({ reason, promise }, 'Unhandled rejection');
  });

  // Uncaught exception handler
  process.on('uncaughtException', (error) => {
    logger.fatal({ error }, 'Uncaught exception');
    process.exit(1);
  });
}

// Run the agent
bootstrap().catch((error: unknown) => {
  console.error('Failed to bootstrap:', error);
  process.exit(1);
});
