/**
 * @file fakes.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 *
 * In-process stand-ins for the domain ports.
 */

import pino from "pino";
import { ActivityRecord, type ActivityRecordProps } from "../../src/domain/entities/activity-record.js";
import type { ArtifactStorage } from "../../src/domain/ports/artifact-storage.js";
import type {
  ActivityDocument,
  ActivityQuery,
  HiveStore,
  SessionSummaryDocument,
  StoreHealth,
  StoredActivity,
  StoredSummary,
  SummaryQuery,
} from "../../src/domain/ports/hive-store.js";
import type { TextGenerator } from "../../src/domain/ports/text-generator.js";

export const silentLogger = pino({ level: "silent" });

export class FakeArtifactStorage implements ArtifactStorage {
  readonly discarded: string[] = [];
  readonly removedDirs: string[] = [];

  async createSpoolDir(name: string): Promise<string> {
    return `/spool/${name}`;
  }

  async removeSpoolDir(dir: string): Promise<void> {
    this.removedDirs.push(dir);
  }

  artifactPath(spoolDir: string, capturedAt: Date): string {
    return `${spoolDir}/frame_${capturedAt.getTime()}.png`;
  }

  async read(_path: string): Promise<Buffer> {
    return Buffer.from("frame");
  }

  async discard(path: string): Promise<boolean> {
    this.discarded.push(path);
    return true;
  }
}

export class FakeHiveStore implements HiveStore {
  available = true;
  readonly activities: ActivityDocument[] = [];
  readonly summaries: SessionSummaryDocument[] = [];
  readonly activityQueries: ActivityQuery[] = [];
  storedActivity: StoredActivity[] = [];
  storedSummaries: StoredSummary[] = [];
  calls = 0;

  isAvailable(): boolean {
    this.calls++;
    return this.available;
  }

  getHealth(): StoreHealth {
    return this.available ? "healthy" : "unhealthy";
  }

  async insertActivity(document: ActivityDocument): Promise<boolean> {
    this.calls++;
    this.activities.push(document);
    return true;
  }

  async queryActivity(query: ActivityQuery): Promise<StoredActivity[]> {
    this.calls++;
    this.activityQueries.push(query);
    return this.storedActivity;
  }

  async insertSummary(document: SessionSummaryDocument): Promise<boolean> {
    this.calls++;
    this.summaries.push(document);
    return true;
  }

  async querySummaries(_query: SummaryQuery): Promise<StoredSummary[]> {
    this.calls++;
    return this.storedSummaries;
  }

  close(): void {}
}

export class FakeTextGenerator implements TextGenerator {
  readonly prompts: Array<{ system: string; user: string }> = [];

  constructor(private readonly reply: string | Error = "generated text") {}

  async generate(systemPrompt: string, userPrompt: string): Promise<string> {
    this.prompts.push({ system: systemPrompt, user: userPrompt });
    if (this.reply instanceof Error) {
      throw this.reply;
    }
    return this.reply;
  }
}

/**
 * Allowed deep-work record with overridable fields.
 */
export function makeRecord(overrides: Partial<ActivityRecordProps> = {}): ActivityRecord {
  return new ActivityRecord({
    timestamp: new Date("2025-03-01T10:00:00.000Z"),
    sessionId: "session-0001",
    projectName: "Payments API",
    projectSlug: "payments-api",
    goal: "Fix refund webhook",
    repoPath: "/repos/payments",
    task: "Editing refund handler",
    activityType: "CODING",
    technicalContext: "refunds.ts",
    appName: "VS Code",
    activeApp: "Code",
    windowTitle: "refunds.ts",
    focusBounds: null,
    isDeepWork: true,
    deepWorkState: "deep_work",
    privacyState: "allowed",
    ...overrides,
  });
}
