/**
 * @file privacy-filter.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

/**
 * Decides, before anything is captured, whether this cycle may capture.
 * Resolving false (or throwing) vetoes the cycle.
 */
export type PrivacyFilter = () => boolean | Promise<boolean>;
