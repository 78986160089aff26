/**
 * @file constants.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

/**
 * Capture loop timing and naming.
 */
export const CAPTURE_CONFIG = {
  /** Sleep between polls while no session is active */
  IDLE_DELAY_MS: 1_000,

  /** Extra time granted to an in-flight cycle on stop, on top of one interval */
  STOP_GRACE_MS: 2_000,

  /** Default max age of a cached window snapshot */
  WINDOW_CACHE_MAX_AGE_MS: 250,

  /** Timeout for one window introspection call */
  WINDOW_SENSOR_TIMEOUT_MS: 2_000,

  /** Timeout for one screen capture call */
  SCREEN_SENSOR_TIMEOUT_MS: 10_000,

  /** Raw artifact file prefix and extension */
  ARTIFACT_PREFIX: 'frame_',
  ARTIFACT_EXTENSION: '.png',
  ARTIFACT_MIME_TYPE: 'image/png',
} as const;

/**
 * Activity record defaults.
 */
export const RECORD_DEFAULTS = {
  TASK: 'Unknown Task',
  ACTIVITY_TYPE: 'UNKNOWN',
  TECHNICAL_CONTEXT: 'Unparsed response',
  /** Parsed output that named no context */
  MISSING_CONTEXT: 'N/A',
  SOURCE: 'devtrail-vision',
  UNKNOWN_WINDOW: 'Unknown',
  FALLBACK_SLUG: 'project',
} as const;

/**
 * Shared store configuration.
 */
export const STORE_CONFIG = {
  /** Time before a failed connection is attempted again */
  RECONNECT_COOLDOWN_MS: 60_000,

  /** Default number of session summaries fetched per query */
  SUMMARY_QUERY_LIMIT: 5,
} as const;

/**
 * Commit report configuration.
 */
export const REPORT_CONFIG = {
  DEFAULT_WINDOW_MINUTES: 30,

  /** Folder inside the repository that receives reports */
  OUTPUT_DIR: '.devtrail',
  FILE_PREFIX: 'commit_context_',

  /** Bound on waiting for an in-flight report when a watcher stops */
  STOP_TIMEOUT_MS: 5_000,

  SUMMARY_UNAVAILABLE: '_Summary unavailable._',
} as const;

/**
 * Oracle configuration.
 */
export const ORACLE_CONFIG = {
  DEFAULT_MAX_CONTEXT: 40,
  SUMMARY_LIMIT: 5,
  PREVIEW_LINES: 4,
} as const;

/**
 * Session summarizer configuration.
 */
export const SUMMARY_CONFIG = {
  /** Lower bound for the summary interval */
  MIN_INTERVAL_MS: 60_000,
  DEFAULT_INTERVAL_MS: 1_800_000,

  /** Bound on waiting for an in-flight summary when stopping */
  STOP_TIMEOUT_MS: 5_000,
} as const;

/**
 * Process lifecycle configuration.
 */
export const SHUTDOWN_CONFIG = {
  /** Max time for the whole graceful shutdown */
  TIMEOUT_MS: 10_000,

  /** Max time for the HTTP server to close */
  HTTP_CLOSE_TIMEOUT_MS: 2_000,
} as const;

/**
 * Gets the agent package version from package.json.
 */
export function getAgentVersion(): string {
  try {
    const __filename = fileURLToPath(import.meta.url);
    const __dirname = dirname(__filename);
    // "../package.json" from dist/, "../../package.json" from src/config/
    const possiblePaths = [
      join(__dirname, '../package.json'),
      join(__dirname, '../../package.json'),
    ];
    for (const packageJsonPath of possiblePaths) {
      try {
        const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
        if (
          typeof packageJson === 'object' &&
          packageJson !== null &&
          'version' in packageJson &&
          typeof packageJson.version === 'string'
        ) {
          return packageJson.version;
        }
      } catch {
        // Try next path
      }
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}
