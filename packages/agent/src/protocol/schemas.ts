/**
 * @file schemas.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { z } from 'zod';
import { InvalidPayloadError } from '../domain/errors/domain-errors.js';

// ============================================================================
// Session Schemas
// ============================================================================

export const CreateSessionBodySchema = z.object({
  projectName: z.string().trim().min(1, 'Project name is required'),
  repoPath: z.string().trim().min(1, 'Repository path is required'),
  goal: z.string().trim().default(''),
});

export const SessionParamsSchema = z.object({
  id: z.string().min(1, 'Session ID is required'),
});

export const RecordsQuerySchema = z.object({
  /** Only records from the last N minutes */
  minutes: z.coerce.number().positive().optional(),
  allowedOnly: z
    .enum(['true', 'false'])
    .transform((val) => val === 'true')
    .optional(),
});

// ============================================================================
// Identity Schemas
// ============================================================================

export const IdentityBodySchema = z.object({
  userId: z.string().nullable().optional(),
  displayName: z.string().nullable().optional(),
  orgId: z.string().optional(),
});

// ============================================================================
// Oracle Schemas
// ============================================================================

export const OracleAskBodySchema = z.object({
  question: z.string(),
  scope: z.enum(['org', 'project']).default('org'),
  projectName: z.string().optional(),
  timeWindowHours: z.number().nonnegative().optional(),
});

export type CreateSessionBody = z.infer<typeof CreateSessionBodySchema>;
export type RecordsQuery = z.infer<typeof RecordsQuerySchema>;
export type IdentityBody = z.infer<typeof IdentityBodySchema>;
export type OracleAskBody = z.infer<typeof OracleAskBodySchema>;

/**
 * Validates a request part, throwing InvalidPayloadError with the first issue.
 */
export function parseRequest<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new InvalidPayloadError(`${field}${issue?.message ?? 'Invalid request payload'}`);
  }
  return result.data;
}
