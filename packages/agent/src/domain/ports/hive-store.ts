/**
 * @file hive-store.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { ActivityPayload } from '../entities/activity-record.js';

/**
 * Cached connection state of the shared store.
 */
export type StoreHealth = 'unknown' | 'healthy' | 'unhealthy';

export type QueryScope = 'org' | 'project';

/**
 * Activity document as written to the shared store.
 */
export interface ActivityDocument extends ActivityPayload {
  summary: string;
  created_at: string;
  org_id: string;
}

/**
 * Activity document as read back. Older or foreign writers may omit fields.
 */
export interface StoredActivity {
  timestamp: Date;
  org_id: string;
  project_name?: string;
  summary?: string;
  task?: string;
  technical_context?: string;
  user_id?: string;
  user_display?: string;
}

/**
 * High-level summary of a session period.
 */
export interface SessionSummaryDocument {
  org_id: string;
  user_id: string;
  user_display?: string;
  session_id: string;
  project_name?: string;
  timestamp: string;
  summary_text: string;
  time_range_minutes: number;
}

export interface StoredSummary {
  timestamp: Date;
  org_id: string;
  summary_text: string;
  user_id?: string;
  user_display?: string;
  session_id?: string;
  project_name?: string;
}

export interface ActivityQuery {
  orgId: string;
  scope: QueryScope;
  projectName?: string;
  since?: Date;
  limit: number;
}

export interface SummaryQuery {
  orgId: string;
  limit?: number;
}

/**
 * Port for the shared document store.
 * Inserts resolve false and queries resolve [] when the store is unavailable.
 */
export interface HiveStore {
  /**
   * Connects lazily if needed and reports whether the store can be used.
   */
  isAvailable(): boolean;

  getHealth(): StoreHealth;

  insertActivity(document: ActivityDocument): Promise<boolean>;

  /**
   * Newest first.
   */
  queryActivity(query: ActivityQuery): Promise<StoredActivity[]>;

  insertSummary(document: SessionSummaryDocument): Promise<boolean>;

  /**
   * Newest first.
   */
  querySummaries(query: SummaryQuery): Promise<StoredSummary[]>;

  close(): void;
}
