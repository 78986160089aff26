/**
 * @file agent-config.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { join } from 'path';
import type { Env } from './env.js';
import { CAPTURE_CONFIG, SUMMARY_CONFIG } from './constants.js';

/**
 * Model connection settings shared by the classifier and text adapters.
 */
export interface ModelConfig {
  apiKey: string;
  modelName: string;
  visionModelName: string;
  baseUrl?: string;
  temperature: number;
}

/**
 * Explicit runtime configuration, built once at startup and passed to constructors.
 */
export interface AgentConfig {
  http: {
    host: string;
    port: number;
  };
  capture: {
    intervalMs: number;
    idleDelayMs: number;
    stopGraceMs: number;
    historyCapacity: number;
    spoolRoot: string;
    privacyBlocklist: string[];
  };
  identity: {
    orgId: string;
    userId?: string;
    displayName?: string;
  };
  store: {
    path?: string;
  };
  /** Null when no model key is configured */
  model: ModelConfig | null;
  report: {
    windowMinutes: number;
  };
  summary: {
    intervalMs: number;
  };
  oracle: {
    maxContext: number;
  };
}

/**
 * Builds the runtime configuration from validated environment variables.
 */
export function createAgentConfig(env: Env): AgentConfig {
  return {
    http: {
      host: env.HOST,
      port: env.PORT,
    },
    capture: {
      intervalMs: Math.round(env.CAPTURE_INTERVAL_SECONDS * 1000),
      idleDelayMs: env.IDLE_POLL_MS,
      stopGraceMs: CAPTURE_CONFIG.STOP_GRACE_MS,
      historyCapacity: env.HISTORY_CAPACITY,
      spoolRoot: join(env.DATA_DIR, 'spool'),
      privacyBlocklist: env.PRIVACY_APPS,
    },
    identity: {
      orgId: env.ORG_ID,
      userId: env.USER_ID,
      displayName: env.USER_DISPLAY_NAME,
    },
    store: {
      path: env.HIVE_DB_PATH,
    },
    model: env.AGENT_API_KEY
      ? {
          apiKey: env.AGENT_API_KEY,
          modelName: env.AGENT_MODEL_NAME,
          visionModelName: env.AGENT_VISION_MODEL_NAME,
          baseUrl: env.AGENT_BASE_URL,
          temperature: env.AGENT_TEMPERATURE,
        }
      : null,
    report: {
      windowMinutes: env.REPORT_WINDOW_MINUTES,
    },
    summary: {
      intervalMs: Math.max(env.SUMMARY_INTERVAL_SECONDS * 1000, SUMMARY_CONFIG.MIN_INTERVAL_MS),
    },
    oracle: {
      maxContext: env.ORACLE_MAX_CONTEXT,
    },
  };
}
