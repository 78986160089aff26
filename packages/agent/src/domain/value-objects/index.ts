/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export * from './session-id.js';
export * from './project-slug.js';
export * from './activity-state.js';
export * from './window-snapshot.js';
export * from './step-result.js';
export * from './identity.js';
export * from './compact-timestamp.js';
