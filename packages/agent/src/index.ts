/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export * from './domain/index.js';

export { parseEnv, loadEnv, getEnv, type Env } from './config/env.js';
export { createAgentConfig, type AgentConfig, type ModelConfig } from './config/agent-config.js';

export {
  SessionRegistry,
  type CreateWorkSessionParams,
  type SessionRegistryConfig,
  type SessionRegistryEvents,
} from './application/services/session-registry.js';
export {
  CaptureScheduler,
  describeCaptureContext,
  type CaptureSchedulerConfig,
  type CycleOutcome,
} from './application/services/capture-scheduler.js';
export {
  normalizeClassification,
  defaultActivity,
  type NormalizedActivity,
  type NormalizationResult,
} from './application/services/record-normalizer.js';
export { RemoteSync, type RemoteSyncConfig } from './application/services/remote-sync.js';
export { createBlocklistPrivacyFilter } from './application/services/privacy-filter.js';
export {
  ContextReporter,
  formatTimelineLine,
  type ContextReporterConfig,
} from './application/services/context-reporter.js';
export {
  OracleQueryEngine,
  ORACLE_MESSAGES,
  rankActivity,
  buildOracleContext,
  type OracleAnswer,
  type OracleQuestion,
} from './application/services/oracle-query-engine.js';
export {
  SessionSummarizer,
  type SessionSummarizerConfig,
  type SessionSummaryResult,
} from './application/services/session-summarizer.js';

export { createLogger, type LoggerConfig } from './infrastructure/logging/pino-logger.js';
export { FileArtifactStorage } from './infrastructure/storage/file-artifact-storage.js';
export { SqliteHiveStore, type SqliteHiveStoreConfig } from './infrastructure/persistence/sqlite-hive-store.js';
export { createModelAdapters, type ModelAdapters } from './infrastructure/llm/index.js';
export { MacWindowSensor, parseWindowReport } from './infrastructure/sensors/macos-window-sensor.js';
export { MacScreenSensor } from './infrastructure/sensors/macos-screen-sensor.js';
export { ActiveWindowInspector } from './infrastructure/sensors/active-window-inspector.js';
export { CommitWatcher, parseLatestCommitId } from './infrastructure/git/commit-watcher.js';
export { CommitWatcherPool } from './infrastructure/git/commit-watcher-pool.js';
export { createApp, type App } from './app.js';
