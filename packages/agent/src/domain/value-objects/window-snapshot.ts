/**
 * @file window-snapshot.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { RECORD_DEFAULTS } from '../../config/constants.js';

/**
 * Screen rectangle of the focused window.
 */
export interface FocusBounds {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * Frontmost application and window at a point in time.
 */
export interface WindowSnapshot {
  app: string;
  title: string;
  bounds: FocusBounds | null;
}

/**
 * Snapshot reported when introspection is unavailable.
 */
export const UNKNOWN_WINDOW: Readonly<WindowSnapshot> = Object.freeze({
  app: RECORD_DEFAULTS.UNKNOWN_WINDOW,
  title: RECORD_DEFAULTS.UNKNOWN_WINDOW,
  bounds: null,
});

/**
 * Renders bounds as "x=.., y=.., width=.., height=.." or "Unknown".
 */
export function formatFocusBounds(bounds: FocusBounds | null): string {
  if (!bounds) {
    return RECORD_DEFAULTS.UNKNOWN_WINDOW;
  }
  return `x=${bounds.x}, y=${bounds.y}, width=${bounds.width}, height=${bounds.height}`;
}
