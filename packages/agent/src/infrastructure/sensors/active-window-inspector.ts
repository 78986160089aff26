/**
 * @file active-window-inspector.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Logger } from 'pino';
import type { WindowInspector, WindowSensor } from '../../domain/ports/window-sensor.js';
import { UNKNOWN_WINDOW, type WindowSnapshot } from '../../domain/value-objects/window-snapshot.js';
import { CAPTURE_CONFIG } from '../../config/constants.js';

/**
 * Time-cached wrapper around a window sensor. Never rejects: sensor failures
 * yield the Unknown snapshot.
 */
export class ActiveWindowInspector implements WindowInspector {
  private readonly sensor: WindowSensor;
  private readonly logger: Logger;
  private readonly clock: () => number;
  private cached: { snapshot: WindowSnapshot; fetchedAt: number } | null = null;
  private inFlight: Promise<WindowSnapshot> | null = null;

  constructor(sensor: WindowSensor, logger: Logger, clock: () => number = Date.now) {
    this.sensor = sensor;
    this.logger = logger.child({ component: 'window-inspector' });
    this.clock = clock;
  }

  async snapshot(options: { cacheMaxAgeMs?: number } = {}): Promise<WindowSnapshot> {
    const maxAge = options.cacheMaxAgeMs ?? CAPTURE_CONFIG.WINDOW_CACHE_MAX_AGE_MS;

    if (this.cached && maxAge > 0 && this.clock() - this.cached.fetchedAt <= maxAge) {
      return this.cached.snapshot;
    }

    // Concurrent callers share one sensor read
    this.inFlight ??= this.fetch().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  private async fetch(): Promise<WindowSnapshot> {
    let snapshot: WindowSnapshot;
    try {
      snapshot = await this.sensor.read();
    } catch (error) {
      this.logger.debug({ error }, 'Window introspection failed, reporting unknown window');
      snapshot = UNKNOWN_WINDOW;
    }
    this.cached = { snapshot, fetchedAt: this.clock() };
    return snapshot;
  }
}
