/**
 * @file env.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { z } from 'zod';
import { config } from 'dotenv';
import { homedir } from 'os';
import { join } from 'path';

// Load environment variables from .env files
config({ path: '.env.local' });
config({ path: '.env' });

/**
 * Default data directory path.
 */
function getDefaultDataDir(): string {
  return join(homedir(), '.devtrail');
}

const booleanFlag = z
  .string()
  .transform((val) => val.toLowerCase() === 'true')
  .default('false');

const optionalText = z
  .string()
  .optional()
  .transform((val) => {
    const trimmed = val?.trim();
    return trimmed && trimmed.length > 0 ? trimmed : undefined;
  });

/**
 * Schema for environment variables validation.
 */
const EnvSchema = z.object({
  // Server
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  PORT: z.coerce.number().int().positive().default(3210),
  HOST: z.string().default('127.0.0.1'),
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
  LOG_PRETTY: booleanFlag,

  // Data Storage
  DATA_DIR: z
    .string()
    .optional()
    .transform((val) => {
      const trimmed = val?.trim();
      return trimmed && trimmed.length > 0 ? trimmed : getDefaultDataDir();
    }),

  // ─────────────────────────────────────────────────────────────
  // Capture Loop
  // ─────────────────────────────────────────────────────────────
  CAPTURE_INTERVAL_SECONDS: z.coerce.number().min(1).default(10),
  IDLE_POLL_MS: z.coerce.number().int().min(50).default(1000),
  HISTORY_CAPACITY: z.coerce.number().int().min(1).default(180),
  /** Comma-separated list of foreground apps that are never captured */
  PRIVACY_APPS: z
    .string()
    .default('')
    .transform((val) =>
      val
        .split(',')
        .map((app) => app.trim().toLowerCase())
        .filter((app) => app.length > 0)
    ),

  // ─────────────────────────────────────────────────────────────
  // Identity
  // ─────────────────────────────────────────────────────────────
  ORG_ID: z.string().min(1).default('default-org'),
  USER_ID: optionalText,
  USER_DISPLAY_NAME: optionalText,

  // ─────────────────────────────────────────────────────────────
  // Shared Store
  // ─────────────────────────────────────────────────────────────
  /** SQLite file shared by the team; sync and Oracle are disabled when unset */
  HIVE_DB_PATH: optionalText,

  // ─────────────────────────────────────────────────────────────
  // Model (LLM) Configuration
  // ─────────────────────────────────────────────────────────────
  AGENT_API_KEY: optionalText,
  AGENT_MODEL_NAME: z.string().default('gpt-4o-mini'),
  AGENT_VISION_MODEL_NAME: z.string().default('gpt-4o-mini'),
  AGENT_BASE_URL: z.string().url().optional(),
  AGENT_TEMPERATURE: z.coerce.number().min(0).max(2).default(0),

  // ─────────────────────────────────────────────────────────────
  // Reports & Summaries
  // ─────────────────────────────────────────────────────────────
  REPORT_WINDOW_MINUTES: z.coerce.number().int().min(1).default(30),
  SUMMARY_INTERVAL_SECONDS: z.coerce.number().int().min(1).default(1800),
  ORACLE_MAX_CONTEXT: z.coerce.number().int().min(1).default(40),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Validates a raw variable map against the schema.
 */
export function parseEnv(
  source: Record<string, string | undefined>
): ReturnType<typeof EnvSchema.safeParse> {
  return EnvSchema.safeParse(source);
}

/**
 * Loads and validates environment variables.
 * Exits the process if validation fails.
 */
export function loadEnv(): Env {
  const result = parseEnv(process.env);

  if (!result.success) {
    console.error('❌ Invalid environment variables:');
    console.error(result.error.format());
    process.exit(1);
  }

  return result.data;
}

// Singleton env instance
let envInstance: Env | null = null;

/**
 * Gets the environment configuration singleton.
 */
export function getEnv(): Env {
  envInstance ??= loadEnv();
  return envInstance;
}
