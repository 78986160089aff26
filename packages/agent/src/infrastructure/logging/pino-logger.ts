/**
 * @file pino-logger.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import pino, { type Logger, type LoggerOptions } from 'pino';

export interface LoggerConfig {
  level: string;
  name: string;
  pretty?: boolean;
}

/**
 * Creates a configured pino logger instance.
 */
export function createLogger(config: LoggerConfig): Logger {
  const options: LoggerOptions = {
    name: config.name,
    level: config.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    // Redact credentials from logs
    redact: {
      paths: [
        'apiKey',
        'api_key',
        '*.apiKey',
        '*.api_key',
        'config.model.apiKey',
      ],
      censor: '****',
    },
  };

  if (config.pretty) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino(options);
}

export type { Logger } from 'pino';
