/**
 * @file project-slug.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { RECORD_DEFAULTS } from '../../config/constants.js';

/**
 * Filesystem-safe form of a project name.
 * "My App (v2)" -> "my-app-v2"; names without [a-z0-9] become "project".
 */
export function slugifyProjectName(name: string): string {
  const slug = name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug.length > 0 ? slug : RECORD_DEFAULTS.FALLBACK_SLUG;
}
