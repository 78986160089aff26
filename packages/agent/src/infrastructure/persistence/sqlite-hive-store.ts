/**
 * @file sqlite-hive-store.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { and, desc, eq, gte, type SQL } from 'drizzle-orm';
import { nanoid } from 'nanoid';
import { z } from 'zod';
import type { Logger } from 'pino';
import type {
  ActivityDocument,
  ActivityQuery,
  HiveStore,
  SessionSummaryDocument,
  StoreHealth,
  StoredActivity,
  StoredSummary,
  SummaryQuery,
} from '../../domain/ports/hive-store.js';
import { openHiveDatabase, type HiveConnection } from './database/client.js';
import { activityLogs, sessionSummaries } from './database/schema.js';
import { STORE_CONFIG } from '../../config/constants.js';

const optionalString = z.string().optional().catch(undefined);

const StoredActivitySchema = z.object({
  project_name: optionalString,
  summary: optionalString,
  task: optionalString,
  technical_context: optionalString,
  user_id: optionalString,
  user_display: optionalString,
});

const StoredSummarySchema = z.object({
  summary_text: z.string(),
  user_id: optionalString,
  user_display: optionalString,
  session_id: optionalString,
  project_name: optionalString,
});

export interface SqliteHiveStoreConfig {
  /** Database file; the store is disabled when unset */
  path?: string;
  logger: Logger;
  clock?: () => number;
}

/**
 * Shared store on a SQLite file. Connects on first use and caches the outcome;
 * a failed connection is retried only after a cooldown.
 */
export class SqliteHiveStore implements HiveStore {
  private readonly path?: string;
  private readonly logger: Logger;
  private readonly clock: () => number;
  private connection: HiveConnection | null = null;
  private health: StoreHealth = 'unknown';
  private lastAttemptAt = 0;

  constructor(config: SqliteHiveStoreConfig) {
    this.path = config.path;
    this.logger = config.logger.child({ component: 'hive-store' });
    this.clock = config.clock ?? Date.now;
  }

  isAvailable(): boolean {
    return this.connect() !== null;
  }

  getHealth(): StoreHealth {
    return this.health;
  }

  async insertActivity(document: ActivityDocument): Promise<boolean> {
    const connection = this.connect();
    if (!connection) {
      return false;
    }

    try {
      connection.db
        .insert(activityLogs)
        .values({
          id: nanoid(16),
          orgId: document.org_id,
          projectName: document.project_name,
          userId: document.user_id,
          timestamp: new Date(document.timestamp),
          document: JSON.stringify(document),
        })
        .run();
      return true;
    } catch (error) {
      this.logger.warn({ error }, 'Failed to insert activity document');
      return false;
    }
  }

  async queryActivity(query: ActivityQuery): Promise<StoredActivity[]> {
    const connection = this.connect();
    if (!connection) {
      return [];
    }

    const conditions: SQL[] = [eq(activityLogs.orgId, query.orgId)];
    if (query.scope === 'project' && query.projectName) {
      conditions.push(eq(activityLogs.projectName, query.projectName));
    }
    if (query.since) {
      conditions.push(gte(activityLogs.timestamp, query.since));
    }

    try {
      const rows = connection.db
        .select()
        .from(activityLogs)
        .where(and(...conditions))
        .orderBy(desc(activityLogs.timestamp))
        .limit(query.limit)
        .all();

      const documents: StoredActivity[] = [];
      for (const row of rows) {
        const parsed = StoredActivitySchema.safeParse(parseDocument(row.document));
        if (!parsed.success) {
          this.logger.debug({ id: row.id }, 'Skipping malformed activity document');
          continue;
        }
        documents.push({
          ...parsed.data,
          timestamp: row.timestamp,
          org_id: row.orgId,
        });
      }
      return documents;
    } catch (error) {
      this.logger.warn({ error }, 'Activity query failed');
      return [];
    }
  }

  async insertSummary(document: SessionSummaryDocument): Promise<boolean> {
    const connection = this.connect();
    if (!connection) {
      return false;
    }

    try {
      connection.db
        .insert(sessionSummaries)
        .values({
          id: nanoid(16),
          orgId: document.org_id,
          userId: document.user_id,
          sessionId: document.session_id,
          timestamp: new Date(document.timestamp),
          document: JSON.stringify(document),
        })
        .run();
      return true;
    } catch (error) {
      this.logger.warn({ error }, 'Failed to insert session summary');
      return false;
    }
  }

  async querySummaries(query: SummaryQuery): Promise<StoredSummary[]> {
    const connection = this.connect();
    if (!connection) {
      return [];
    }

    try {
      const rows = connection.db
        .select()
        .from(sessionSummaries)
        .where(eq(sessionSummaries.orgId, query.orgId))
        .orderBy(desc(sessionSummaries.timestamp))
        .limit(query.limit ?? STORE_CONFIG.SUMMARY_QUERY_LIMIT)
        .all();

      const documents: StoredSummary[] = [];
      for (const row of rows) {
        const parsed = StoredSummarySchema.safeParse(parseDocument(row.document));
        if (!parsed.success) {
          this.logger.debug({ id: row.id }, 'Skipping malformed summary document');
          continue;
        }
        documents.push({
          ...parsed.data,
          timestamp: row.timestamp,
          org_id: row.orgId,
        });
      }
      return documents;
    } catch (error) {
      this.logger.warn({ error }, 'Summary query failed');
      return [];
    }
  }

  close(): void {
    if (this.connection) {
      this.connection.close();
      this.connection = null;
      this.health = 'unknown';
    }
  }

  private connect(): HiveConnection | null {
    if (this.connection) {
      return this.connection;
    }

    if (!this.path) {
      if (this.health === 'unknown') {
        this.logger.info('Shared store not configured, sync and Oracle disabled');
        this.health = 'unhealthy';
      }
      return null;
    }

    const now = this.clock();
    if (this.health === 'unhealthy' && now - this.lastAttemptAt < STORE_CONFIG.RECONNECT_COOLDOWN_MS) {
      return null;
    }
    this.lastAttemptAt = now;

    try {
      this.connection = openHiveDatabase(this.path);
      this.health = 'healthy';
      this.logger.info({ path: this.path }, 'Connected to shared store');
      return this.connection;
    } catch (error) {
      this.health = 'unhealthy';
      this.logger.warn({ error, path: this.path }, 'Shared store unavailable');
      return null;
    }
  }
}

function parseDocument(json: string): unknown {
  try {
    return JSON.parse(json);
  } catch {
    return null;
  }
}
