/**
 * @file context-reporter.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync } from "fs";
import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { basename, join } from "path";
import {
  ContextReporter,
  formatTimelineLine,
} from "../../../src/application/services/context-reporter.js";
import { SessionRegistry } from "../../../src/application/services/session-registry.js";
import type { WorkSession } from "../../../src/domain/entities/work-session.js";
import type { TextGenerator } from "../../../src/domain/ports/text-generator.js";
import {
  FakeArtifactStorage,
  FakeTextGenerator,
  makeRecord,
  silentLogger,
} from "../../helpers/fakes.js";

const NOW = new Date(2025, 2, 1, 12, 0, 0, 0);
const minutesAgo = (minutes: number) => new Date(NOW.getTime() - minutes * 60_000);
const COMMIT_ID = "abcdef1234567890abcdef1234567890abcdef12";

describe("formatTimelineLine", () => {
  it("should render every field with n/a for missing ones", () => {
    const record = makeRecord();
    expect(formatTimelineLine(record)).toBe(
      "2025-03-01T10:00:00.000Z | type=CODING | task=Editing refund handler | context=refunds.ts | " +
        'error=n/a | function=n/a | doc=n/a | app=VS Code | focus_app=Code | window="refunds.ts" | ' +
        "deep_state=deep_work"
    );
  });

  it("should append the documentation URL when present", () => {
    const record = makeRecord({ docUrl: "https://example.com/docs", errorCode: "502" });
    const line = formatTimelineLine(record);
    expect(line).toContain(" | error=502 | ");
    expect(line.endsWith(" | doc_url=https://example.com/docs")).toBe(true);
  });
});

describe("ContextReporter", () => {
  let repoPath: string;
  let registry: SessionRegistry;
  let session: WorkSession;

  const createReporter = (generator: TextGenerator | null) =>
    new ContextReporter({
      registry,
      generator,
      windowMinutes: 30,
      logger: silentLogger,
      clock: () => NOW,
    });

  const reportPath = () => join(repoPath, ".devtrail", "commit_context_20250301-120000-000.md");

  beforeEach(async () => {
    repoPath = await mkdtemp(join(tmpdir(), "devtrail-report-"));
    registry = new SessionRegistry({
      artifacts: new FakeArtifactStorage(),
      historyCapacity: 20,
      logger: silentLogger,
    });
    session = await registry.create({ projectName: "Payments", repoPath, goal: "Fix refunds" });
  });

  afterEach(async () => {
    await rm(repoPath, { recursive: true, force: true });
  });

  it("should skip the report when no allowed records are in the window", async () => {
    const id = session.id.value;
    await registry.append(id, makeRecord({ timestamp: minutesAgo(45) }));
    await registry.append(
      id,
      makeRecord({
        timestamp: minutesAgo(3),
        isDeepWork: false,
        deepWorkState: "distracted",
        privacyState: "blocked",
      })
    );

    const result = await createReporter(new FakeTextGenerator()).writeReport(id, COMMIT_ID);

    expect(result).toBeNull();
    expect(existsSync(join(repoPath, ".devtrail"))).toBe(false);
  });

  it("should return null for an unknown session", async () => {
    expect(await createReporter(null).writeReport("missing-session", COMMIT_ID)).toBeNull();
  });

  it("should write only allowed records inside the window", async () => {
    const id = session.id.value;
    const recent = makeRecord({ timestamp: minutesAgo(5), task: "Writing refund test" });
    await registry.append(id, makeRecord({ timestamp: minutesAgo(45), task: "Old work" }));
    await registry.append(id, recent);
    await registry.append(
      id,
      makeRecord({
        timestamp: minutesAgo(3),
        task: "Private chat",
        isDeepWork: false,
        deepWorkState: "distracted",
        privacyState: "blocked",
      })
    );
    const generator = new FakeTextGenerator("### What changed\nRefund webhook retries.");

    const path = await createReporter(generator).writeReport(id, COMMIT_ID);

    expect(path).toBe(reportPath());
    const lines = (await readFile(reportPath(), "utf-8")).split("\n");
    expect(lines.slice(0, 7)).toEqual([
      "# Commit Context: abcdef123456",
      "",
      "- Session goal: Fix refunds",
      `- Commit: \`${COMMIT_ID}\``,
      `- Repository: \`${basename(repoPath)}\``,
      `- Generated: ${NOW.toISOString()}`,
      "- Lookback window: last 30 minutes (1 records)",
    ]);
    expect(lines).toContain(`- ${formatTimelineLine(recent)}`);
    expect(lines).toContain("### What changed");
    expect(lines).toContain("Refund webhook retries.");
    expect(lines.filter((line) => line.includes("Old work"))).toEqual([]);
    expect(lines.filter((line) => line.includes("Private chat"))).toEqual([]);

    expect(generator.prompts).toHaveLength(1);
    expect(generator.prompts[0]?.user).toContain(formatTimelineLine(recent));
  });

  it("should render the event table with escaped pipes and the raw payloads", async () => {
    const id = session.id.value;
    const record = makeRecord({ timestamp: minutesAgo(2), technicalContext: "a|b" });
    await registry.append(id, record);

    await createReporter(null).writeReport(id, COMMIT_ID);

    const content = await readFile(reportPath(), "utf-8");
    const lines = content.split("\n");
    expect(lines).toContain(
      `| ${record.timestamp.toISOString()} | CODING | Editing refund handler | a\\|b | n/a | n/a | n/a | VS Code / Code | allowed / deep_work |`
    );
    expect(lines).toContain(`### 1. ${record.timestamp.toISOString()}`);
    expect(content).toContain(JSON.stringify(record.toPayload(), null, 2));
  });

  it("should note an unavailable draft without a generator", async () => {
    await registry.append(session.id.value, makeRecord({ timestamp: minutesAgo(1) }));

    await createReporter(null).writeReport(session.id.value, COMMIT_ID);

    const lines = (await readFile(reportPath(), "utf-8")).split("\n");
    const draftAt = lines.indexOf("## AI Pull Request Draft");
    expect(lines[draftAt + 2]).toBe("_Summary unavailable._");
  });

  it("should note an unavailable draft when generation fails", async () => {
    await registry.append(session.id.value, makeRecord({ timestamp: minutesAgo(1) }));

    await createReporter(new FakeTextGenerator(new Error("quota exceeded"))).writeReport(
      session.id.value,
      COMMIT_ID
    );

    const lines = (await readFile(reportPath(), "utf-8")).split("\n");
    const draftAt = lines.indexOf("## AI Pull Request Draft");
    expect(lines[draftAt + 2]).toBe("_Summary unavailable._");
  });
});
