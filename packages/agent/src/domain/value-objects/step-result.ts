/**
 * @file step-result.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

/**
 * Outcome of one fallible step in a pipeline.
 */
export type StepResult<T> = { ok: true; value: T } | { ok: false; reason: string };

export function succeeded<T>(value: T): StepResult<T> {
  return { ok: true, value };
}

export function failed<T>(error: unknown): StepResult<T> {
  return { ok: false, reason: error instanceof Error ? error.message : String(error) };
}
