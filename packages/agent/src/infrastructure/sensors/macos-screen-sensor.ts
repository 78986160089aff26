/**
 * @file macos-screen-sensor.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { execFile } from 'child_process';
import { stat } from 'fs/promises';
import { promisify } from 'util';
import type { ScreenSensor } from '../../domain/ports/screen-sensor.js';
import { UnsupportedPlatformError } from '../../domain/errors/domain-errors.js';
import { CAPTURE_CONFIG } from '../../config/constants.js';

const execFileAsync = promisify(execFile);

/**
 * Captures the main display with the built-in screencapture tool.
 */
export class MacScreenSensor implements ScreenSensor {
  async capture(targetPath: string): Promise<void> {
    if (process.platform !== 'darwin') {
      throw new UnsupportedPlatformError('Screen capture', process.platform);
    }

    // -x: no sound, -t: format
    await execFileAsync('screencapture', ['-x', '-t', 'png', targetPath], {
      timeout: CAPTURE_CONFIG.SCREEN_SENSOR_TIMEOUT_MS,
    });

    // screencapture exits 0 without writing when Screen Recording is denied
    const info = await stat(targetPath);
    if (info.size === 0) {
      throw new Error(`Screen capture produced an empty file: ${targetPath}`);
    }
  }
}
