/**
 * @file compact-timestamp.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Local-time "YYYYMMDD<sep>HHmmss<sep>SSS", used in file names.
 */
export function compactTimestamp(date: Date, separator: '_' | '-'): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}${separator}${time}${separator}${pad(date.getMilliseconds(), 3)}`;
}
