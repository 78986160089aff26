/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export * from './ring-buffer.js';
export * from './activity-record.js';
export * from './work-session.js';
