/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export * from './activity-classifier.js';
export * from './text-generator.js';
export * from './window-sensor.js';
export * from './screen-sensor.js';
export * from './artifact-storage.js';
export * from './hive-store.js';
export * from './privacy-filter.js';
