/**
 * @file activity-state.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

/**
 * Known activity categories. The set is open: classifiers may report others,
 * which are kept upper-cased as-is.
 */
export const KNOWN_ACTIVITY_TYPES = [
  'CODING',
  'DEBUGGING',
  'RESEARCHING',
  'REVIEWING',
  'COMMUNICATING',
  'TESTING',
  'DESIGN',
  'MONITORING',
  'DEPLOYING',
  'DISTRACTED',
  'UNKNOWN',
] as const;

export const DEEP_WORK_STATES = ['deep_work', 'distracted'] as const;
export type DeepWorkState = (typeof DEEP_WORK_STATES)[number];

export const PRIVACY_STATES = ['allowed', 'blocked'] as const;
export type PrivacyState = (typeof PRIVACY_STATES)[number];
