/**
 * @file privacy-filter.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { PrivacyFilter } from '../../domain/ports/privacy-filter.js';
import type { WindowInspector } from '../../domain/ports/window-sensor.js';

/**
 * Vetoes capture while a blocklisted application is frontmost.
 * Names are compared case-insensitively; an empty blocklist allows everything.
 */
export function createBlocklistPrivacyFilter(
  windows: WindowInspector,
  blocklist: readonly string[]
): PrivacyFilter {
  const blocked = new Set(
    blocklist.map((app) => app.trim().toLowerCase()).filter((app) => app.length > 0)
  );
  if (blocked.size === 0) {
    return () => true;
  }

  return async () => {
    const snapshot = await windows.snapshot({ cacheMaxAgeMs: 0 });
    return !blocked.has(snapshot.app.toLowerCase());
  };
}
