/**
 * @file client.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { dirname } from 'path';
import { mkdirSync } from 'fs';
import * as schema from './schema.js';

export type HiveDatabase = BetterSQLite3Database<typeof schema>;

export interface HiveConnection {
  db: HiveDatabase;
  close: () => void;
}

const IN_MEMORY = ':memory:';

/**
 * Opens the shared store database and creates its tables.
 */
export function openHiveDatabase(dbPath: string): HiveConnection {
  if (dbPath !== IN_MEMORY) {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const sqlite = new Database(dbPath);

  try {
    // WAL lets several agents share one file
    if (dbPath !== IN_MEMORY) {
      sqlite.pragma('journal_mode = WAL');
    }

    sqlite.exec(`
      CREATE TABLE IF NOT EXISTS activity_logs (
        id TEXT PRIMARY KEY,
        org_id TEXT NOT NULL,
        project_name TEXT,
        user_id TEXT,
        timestamp INTEGER NOT NULL,
        document TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS session_summaries (
        id TEXT PRIMARY KEY,
        org_id TEXT NOT NULL,
        user_id TEXT NOT NULL,
        session_id TEXT NOT NULL,
        timestamp INTEGER NOT NULL,
        document TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_activity_logs_org_time ON activity_logs(org_id, timestamp);
      CREATE INDEX IF NOT EXISTS idx_activity_logs_project ON activity_logs(org_id, project_name, timestamp);
      CREATE INDEX IF NOT EXISTS idx_session_summaries_org_time ON session_summaries(org_id, timestamp);
    `);
  } catch (error) {
    sqlite.close();
    throw error;
  }

  return {
    db: drizzle(sqlite, { schema }),
    close: () => sqlite.close(),
  };
}
