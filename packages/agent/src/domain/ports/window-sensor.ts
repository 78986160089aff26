/**
 * @file window-sensor.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { WindowSnapshot } from '../value-objects/window-snapshot.js';

/**
 * Port for reading the frontmost application and window.
 * Implementations may throw; callers decide the fallback.
 */
export interface WindowSensor {
  read(): Promise<WindowSnapshot>;
}

/**
 * Cached view over a window sensor. Never rejects.
 */
export interface WindowInspector {
  /**
   * @param options.cacheMaxAgeMs - 0 forces a fresh read
   */
  snapshot(options?: { cacheMaxAgeMs?: number }): Promise<WindowSnapshot>;
}
