/**
 * @file file-artifact-storage.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync } from "fs";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { FileArtifactStorage } from "../../../src/infrastructure/storage/file-artifact-storage.js";
import { silentLogger } from "../../helpers/fakes.js";

describe("FileArtifactStorage", () => {
  let root: string;
  let storage: FileArtifactStorage;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "devtrail-spool-"));
    storage = new FileArtifactStorage(root, silentLogger);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("should create and remove spool directories", async () => {
    const dir = await storage.createSpoolDir("payments-abc12345");
    expect(dir).toBe(join(root, "payments-abc12345"));
    expect(existsSync(dir)).toBe(true);

    await writeFile(join(dir, "frame.png"), "png");
    await storage.removeSpoolDir(dir);
    expect(existsSync(dir)).toBe(false);
  });

  it("should ignore a missing spool directory", async () => {
    await expect(storage.removeSpoolDir(join(root, "missing"))).resolves.toBeUndefined();
  });

  it("should name artifacts by capture time", () => {
    const path = storage.artifactPath("/spool/demo", new Date(2025, 2, 1, 9, 5, 7, 42));
    expect(path).toBe(join("/spool/demo", "frame_20250301_090507_042.png"));
  });

  it("should read and discard artifacts", async () => {
    const path = join(root, "frame.png");
    await writeFile(path, "png-bytes");

    expect((await storage.read(path)).toString()).toBe("png-bytes");
    expect(await storage.discard(path)).toBe(true);
    expect(existsSync(path)).toBe(false);
  });

  it("should report an already missing artifact", async () => {
    expect(await storage.discard(join(root, "gone.png"))).toBe(false);
  });
});
