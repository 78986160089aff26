/**
 * @file record-normalizer.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { z } from 'zod';
import {
  DEEP_WORK_STATES,
  PRIVACY_STATES,
  type DeepWorkState,
  type PrivacyState,
} from '../../domain/value-objects/activity-state.js';
import { RECORD_DEFAULTS } from '../../config/constants.js';

/**
 * Canonical fields extracted from classifier output.
 */
export interface NormalizedActivity {
  task: string;
  activityType: string;
  technicalContext: string;
  appName: string | null;
  functionTarget: string | null;
  documentationTitle: string | null;
  docUrl: string | null;
  errorCode: string | null;
  alignmentScore: number | null;
  isDeepWork: boolean;
  deepWorkState: DeepWorkState;
  privacyState: PrivacyState;
}

export interface NormalizationResult {
  activity: NormalizedActivity;
  /** False when no JSON object could be decoded */
  parsed: boolean;
}

// Every field degrades to undefined on a type mismatch instead of failing the object
const text = z.string().trim().min(1).optional().catch(undefined);

const activityType = z
  .string()
  .trim()
  .min(1)
  .transform((val) => val.toUpperCase())
  .optional()
  .catch(undefined);

const score = z
  .union([
    z.number().finite(),
    z.string().trim().min(1).transform(Number).pipe(z.number().finite()),
  ])
  .transform((val) => Math.min(100, Math.max(0, Math.round(val))))
  .optional()
  .catch(undefined);

const flag = z
  .union([
    z.boolean(),
    z.string().trim().toLowerCase().pipe(z.enum(['true', 'false'])).transform((val) => val === 'true'),
  ])
  .optional()
  .catch(undefined);

const deepWorkState = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(DEEP_WORK_STATES))
  .optional()
  .catch(undefined);

const privacyState = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(PRIVACY_STATES))
  .optional()
  .catch(undefined);

const errorCode = z
  .union([z.string().trim().min(1), z.number().int().transform(String)])
  .optional()
  .catch(undefined);

/**
 * Classifier output, including the alternate key names some models use.
 */
const ClassifierOutputSchema = z.object({
  task: text,
  activity_summary: text,
  activity_type: activityType,
  activity_kind: activityType,
  technical_context: text,
  app_name: text,
  app: text,
  function_target: text,
  function_name: text,
  documentation_title: text,
  doc_title: text,
  doc_url: text,
  documentation_url: text,
  alignment_score: score,
  is_deep_work: flag,
  deep_work_state: deepWorkState,
  privacy_state: privacyState,
  error_code: errorCode,
});

const HTTP_ERROR_PATTERN = /\b([45]\d{2})\b/;

/**
 * Record used when the output holds no decodable JSON object.
 */
export function defaultActivity(): NormalizedActivity {
  return {
    task: RECORD_DEFAULTS.TASK,
    activityType: RECORD_DEFAULTS.ACTIVITY_TYPE,
    technicalContext: RECORD_DEFAULTS.TECHNICAL_CONTEXT,
    appName: null,
    functionTarget: null,
    documentationTitle: null,
    docUrl: null,
    errorCode: null,
    alignmentScore: null,
    isDeepWork: false,
    deepWorkState: 'distracted',
    privacyState: 'blocked',
  };
}

/**
 * Slice from the first "{" to the last "}", decoded. Null when absent or invalid.
 */
function extractJsonObject(raw: string): unknown {
  const start = raw.indexOf('{');
  const end = raw.lastIndexOf('}');
  if (start === -1 || end <= start) {
    return null;
  }
  try {
    return JSON.parse(raw.slice(start, end + 1));
  } catch {
    return null;
  }
}

/**
 * Turns free-form classifier output into canonical activity fields. Never throws.
 */
export function normalizeClassification(raw: string): NormalizationResult {
  const decoded = extractJsonObject(raw);
  if (typeof decoded !== 'object' || decoded === null || Array.isArray(decoded)) {
    return { activity: defaultActivity(), parsed: false };
  }

  const result = ClassifierOutputSchema.safeParse(decoded);
  if (!result.success) {
    return { activity: defaultActivity(), parsed: false };
  }
  const data = result.data;

  const isDeepWork = data.is_deep_work ?? data.deep_work_state === 'deep_work';
  let state: DeepWorkState = data.deep_work_state ?? (isDeepWork ? 'deep_work' : 'distracted');
  if (state === 'deep_work' && !isDeepWork) {
    state = 'distracted';
  }
  const privacy: PrivacyState = data.privacy_state ?? (state === 'deep_work' ? 'allowed' : 'blocked');

  const technicalContext = data.technical_context ?? RECORD_DEFAULTS.MISSING_CONTEXT;

  return {
    activity: {
      task: data.task ?? data.activity_summary ?? data.activity_type ?? RECORD_DEFAULTS.TASK,
      activityType: data.activity_type ?? data.activity_kind ?? RECORD_DEFAULTS.ACTIVITY_TYPE,
      technicalContext,
      appName: data.app_name ?? data.app ?? null,
      functionTarget: data.function_target ?? data.function_name ?? null,
      documentationTitle: data.documentation_title ?? data.doc_title ?? null,
      docUrl: data.doc_url ?? data.documentation_url ?? null,
      errorCode: data.error_code ?? HTTP_ERROR_PATTERN.exec(technicalContext)?.[1] ?? null,
      alignmentScore: data.alignment_score ?? null,
      isDeepWork,
      deepWorkState: state,
      privacyState: privacy,
    },
    parsed: true,
  };
}
