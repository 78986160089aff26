/**
 * @file domain-errors.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

/**
 * Base class for all domain errors.
 * Provides structured error information for API responses.
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error thrown when a session with the specified ID is not found.
 */
export class SessionNotFoundError extends DomainError {
  readonly code = 'SESSION_NOT_FOUND';
  readonly statusCode = 404;

  constructor(sessionId: string) {
    super(`Session not found: ${sessionId}`);
  }
}

/**
 * Error thrown when a repository has no commit log to watch.
 */
export class CommitLogNotFoundError extends DomainError {
  readonly code = 'COMMIT_LOG_NOT_FOUND';
  readonly statusCode = 404;

  constructor(logPath: string) {
    super(`Commit log not found: ${logPath}`);
  }
}

/**
 * Error thrown when an activity record violates its invariants.
 */
export class InvalidRecordError extends DomainError {
  readonly code = 'INVALID_RECORD';
  readonly statusCode = 422;

  constructor(message: string) {
    super(message);
  }
}

/**
 * Error thrown when a request payload is invalid.
 */
export class InvalidPayloadError extends DomainError {
  readonly code = 'INVALID_PAYLOAD';
  readonly statusCode = 400;

  constructor(message = 'Invalid request payload') {
    super(message);
  }
}

/**
 * Error thrown when a sensor is used on a platform it does not support.
 */
export class UnsupportedPlatformError extends DomainError {
  readonly code = 'UNSUPPORTED_PLATFORM';
  readonly statusCode = 501;

  constructor(feature: string, platform: string) {
    super(`${feature} is not supported on ${platform}`);
  }
}
