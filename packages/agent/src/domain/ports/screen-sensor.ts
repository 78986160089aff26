/**
 * @file screen-sensor.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

/**
 * Port for capturing the screen into an image file.
 */
export interface ScreenSensor {
  /**
   * Writes one frame to targetPath. Rejects when nothing was written.
   */
  capture(targetPath: string): Promise<void>;
}
