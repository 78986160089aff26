/**
 * @file commit-watcher.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from "vitest";
import { appendFile, mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import {
  CommitWatcher,
  parseLatestCommitId,
} from "../../../src/infrastructure/git/commit-watcher.js";
import { CommitWatcherPool } from "../../../src/infrastructure/git/commit-watcher-pool.js";
import { SessionRegistry } from "../../../src/application/services/session-registry.js";
import { CommitLogNotFoundError } from "../../../src/domain/errors/domain-errors.js";
import { FakeArtifactStorage, silentLogger } from "../../helpers/fakes.js";

const ZERO = "0000000000000000000000000000000000000000";
const FIRST = "1111111111111111111111111111111111111111";
const SECOND = "2222222222222222222222222222222222222222";

const reflogLine = (from: string, to: string, message: string) =>
  `${from} ${to} Dev One <dev@example.com> 1740823200 +0000\tcommit: ${message}\n`;

describe("parseLatestCommitId", () => {
  it("should take the new id from the last line", () => {
    const reflog = reflogLine(ZERO, FIRST, "init") + reflogLine(FIRST, SECOND, "fix refunds") + "\n";
    expect(parseLatestCommitId(reflog)).toBe(SECOND);
  });

  it("should return null for an empty reflog", () => {
    expect(parseLatestCommitId("\n \n")).toBeNull();
  });

  it("should return null for a line without a second field", () => {
    expect(parseLatestCommitId("garbage")).toBeNull();
  });
});

describe("CommitWatcher", () => {
  let repoPath: string;
  let headLog: string;
  let writeReport: Mock<(sessionId: string, commitId: string) => Promise<string | null>>;
  let onReport: Mock<(reportPath: string) => void>;

  const createWatcher = () =>
    new CommitWatcher({
      repoPath,
      sessionId: "session-0001",
      reporter: { writeReport },
      logger: silentLogger,
      onReport,
    });

  beforeEach(async () => {
    repoPath = await mkdtemp(join(tmpdir(), "devtrail-repo-"));
    headLog = join(repoPath, ".git", "logs", "HEAD");
    writeReport = vi.fn<(sessionId: string, commitId: string) => Promise<string | null>>(
      async (_sessionId, commitId) => `/reports/${commitId}.md`
    );
    onReport = vi.fn<(reportPath: string) => void>();
  });

  afterEach(async () => {
    await rm(repoPath, { recursive: true, force: true });
  });

  const initReflog = async (content: string) => {
    await mkdir(join(repoPath, ".git", "logs"), { recursive: true });
    await writeFile(headLog, content);
  };

  it("should refuse to start without a reflog", () => {
    const watcher = createWatcher();
    expect(() => watcher.start()).toThrow(CommitLogNotFoundError);
    expect(watcher.isWatching()).toBe(false);
  });

  it("should report each commit once", async () => {
    await initReflog(reflogLine(ZERO, FIRST, "init"));
    const watcher = createWatcher();

    expect(await watcher.processLatestCommit()).toBe(`/reports/${FIRST}.md`);
    expect(await watcher.processLatestCommit()).toBeNull();

    await appendFile(headLog, reflogLine(FIRST, SECOND, "fix refunds"));
    expect(await watcher.processLatestCommit()).toBe(`/reports/${SECOND}.md`);

    expect(writeReport.mock.calls).toEqual([
      ["session-0001", FIRST],
      ["session-0001", SECOND],
    ]);
    expect(onReport.mock.calls).toEqual([[`/reports/${FIRST}.md`], [`/reports/${SECOND}.md`]]);
  });

  it("should not notify when the reporter skips the commit", async () => {
    await initReflog(reflogLine(ZERO, FIRST, "init"));
    writeReport.mockResolvedValueOnce(null);

    expect(await createWatcher().processLatestCommit()).toBeNull();
    expect(onReport).not.toHaveBeenCalled();
  });

  it("should contain reporter failures", async () => {
    await initReflog(reflogLine(ZERO, FIRST, "init"));
    writeReport.mockRejectedValueOnce(new Error("disk full"));

    await expect(createWatcher().processLatestCommit()).resolves.toBeNull();
  });

  it("should react to reflog changes until stopped", async () => {
    await initReflog(reflogLine(ZERO, FIRST, "init"));
    const watcher = createWatcher();

    watcher.start();
    expect(watcher.isWatching()).toBe(true);
    await appendFile(headLog, reflogLine(FIRST, SECOND, "fix refunds"));

    await vi.waitFor(() => expect(writeReport).toHaveBeenCalledWith("session-0001", SECOND), {
      timeout: 3000,
    });

    await watcher.stop();
    await watcher.stop();
    expect(watcher.isWatching()).toBe(false);
  });
});

describe("CommitWatcherPool", () => {
  let root: string;
  let registry: SessionRegistry;
  let pool: CommitWatcherPool;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "devtrail-pool-"));
    registry = new SessionRegistry({
      artifacts: new FakeArtifactStorage(),
      historyCapacity: 5,
      logger: silentLogger,
    });
    pool = new CommitWatcherPool({
      registry,
      reporter: { writeReport: async () => null },
      logger: silentLogger,
    });
  });

  afterEach(async () => {
    await pool.stopAll();
    await rm(root, { recursive: true, force: true });
  });

  it("should watch only sessions whose repository has a reflog", async () => {
    const repoWithHistory = join(root, "with-history");
    await mkdir(join(repoWithHistory, ".git", "logs"), { recursive: true });
    await writeFile(join(repoWithHistory, ".git", "logs", "HEAD"), reflogLine(ZERO, FIRST, "init"));
    pool.attach();

    const tracked = await registry.create({ projectName: "A", repoPath: repoWithHistory, goal: "" });
    const untracked = await registry.create({ projectName: "B", repoPath: join(root, "plain"), goal: "" });

    expect(pool.has(tracked.id.value)).toBe(true);
    expect(pool.has(untracked.id.value)).toBe(false);

    await registry.delete(tracked.id.value);
    expect(pool.has(tracked.id.value)).toBe(false);
  });
});
