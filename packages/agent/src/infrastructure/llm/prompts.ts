/**
 * @file prompts.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { KNOWN_ACTIVITY_TYPES } from '../../domain/value-objects/activity-state.js';

const REPORTABLE_TYPES = KNOWN_ACTIVITY_TYPES.filter((type) => type !== 'UNKNOWN').join(', ');

/**
 * System prompt for the screen classifier. The reply must be one JSON object.
 */
export const ACTIVITY_EXTRACTION_PROMPT = `You analyze a developer's screenshot and describe what they are doing.

Reply with ONE JSON object and nothing else, using these keys:
- "task": short description of the concrete task in progress
- "activity_type": one of ${REPORTABLE_TYPES}
- "technical_context": files, functions, errors or tools visible on screen
- "app_name": application in use
- "function_target": function or symbol being worked on, if visible
- "error_code": HTTP or program error code, if visible
- "documentation_title" and "doc_url": documentation being read, if any
- "alignment_score": 0-100, how well the activity matches the session goal
- "is_deep_work": true when the activity serves the session goal
- "deep_work_state": "deep_work" or "distracted"
- "privacy_state": "blocked" only when the screen shows personal or sensitive content such as banking, health records or private chats; omit the key otherwise

Use null for unknown values.`;
