/**
 * @file schema.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';

/**
 * Activity logs table - one forwarded activity document per row.
 * Filter columns are copied out of the JSON document.
 */
export const activityLogs = sqliteTable('activity_logs', {
  id: text('id').primaryKey(),
  orgId: text('org_id').notNull(),
  projectName: text('project_name'),
  userId: text('user_id'),
  timestamp: integer('timestamp', { mode: 'timestamp_ms' }).notNull(),
  document: text('document').notNull(), // JSON ActivityDocument
});

/**
 * Session summaries table - high-level summaries of session periods.
 */
export const sessionSummaries = sqliteTable('session_summaries', {
  id: text('id').primaryKey(),
  orgId: text('org_id').notNull(),
  userId: text('user_id').notNull(),
  sessionId: text('session_id').notNull(),
  timestamp: integer('timestamp', { mode: 'timestamp_ms' }).notNull(),
  document: text('document').notNull(), // JSON SessionSummaryDocument
});

export type ActivityLogRow = typeof activityLogs.$inferSelect;
export type NewActivityLogRow = typeof activityLogs.$inferInsert;

export type SessionSummaryRow = typeof sessionSummaries.$inferSelect;
export type NewSessionSummaryRow = typeof sessionSummaries.$inferInsert;
