/**
 * @file macos-window-sensor.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import type { WindowSensor } from '../../domain/ports/window-sensor.js';
import type { FocusBounds, WindowSnapshot } from '../../domain/value-objects/window-snapshot.js';
import { UnsupportedPlatformError } from '../../domain/errors/domain-errors.js';
import { CAPTURE_CONFIG, RECORD_DEFAULTS } from '../../config/constants.js';

const execFileAsync = promisify(execFile);

const FIELD_SEPARATOR = '|||';

const FRONT_WINDOW_SCRIPT = `
tell application "System Events"
  set frontProc to first application process whose frontmost is true
  set appName to name of frontProc
  set winTitle to ""
  set boundsText to ""
  try
    set frontWin to first window of frontProc
    set winTitle to name of frontWin
    set {xPos, yPos} to position of frontWin
    set {winWidth, winHeight} to size of frontWin
    set boundsText to (xPos as text) & "," & (yPos as text) & "," & (winWidth as text) & "," & (winHeight as text)
  end try
end tell
return appName & "${FIELD_SEPARATOR}" & winTitle & "${FIELD_SEPARATOR}" & boundsText
`;

/**
 * Parses "app|||title|||x,y,width,height" as printed by the System Events script.
 */
export function parseWindowReport(stdout: string): WindowSnapshot {
  const [app = '', title = '', boundsText = ''] = stdout.trim().split(FIELD_SEPARATOR);
  return {
    app: app.trim() || RECORD_DEFAULTS.UNKNOWN_WINDOW,
    title: title.trim() || RECORD_DEFAULTS.UNKNOWN_WINDOW,
    bounds: parseBounds(boundsText),
  };
}

function parseBounds(text: string): FocusBounds | null {
  const parts = text.split(',').map((part) => Number.parseInt(part.trim(), 10));
  if (parts.length !== 4 || parts.some((part) => Number.isNaN(part))) {
    return null;
  }
  const [x = 0, y = 0, width = 0, height = 0] = parts;
  if (width <= 0 || height <= 0) {
    return null;
  }
  return { x, y, width, height };
}

/**
 * Reads the frontmost window through osascript (System Events).
 * Requires the Accessibility permission for window titles and bounds.
 */
export class MacWindowSensor implements WindowSensor {
  async read(): Promise<WindowSnapshot> {
    if (process.platform !== 'darwin') {
      throw new UnsupportedPlatformError('Window introspection', process.platform);
    }

    const { stdout } = await execFileAsync('osascript', ['-e', FRONT_WINDOW_SCRIPT], {
      timeout: CAPTURE_CONFIG.WINDOW_SENSOR_TIMEOUT_MS,
    });
    return parseWindowReport(stdout);
  }
}
