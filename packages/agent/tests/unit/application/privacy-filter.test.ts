/**
 * @file privacy-filter.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { describe, it, expect, vi } from "vitest";
import { createBlocklistPrivacyFilter } from "../../../src/application/services/privacy-filter.js";
import type { WindowInspector } from "../../../src/domain/ports/window-sensor.js";

function inspectorFor(app: string) {
  const snapshot = vi.fn(async () => ({ app, title: "Window", bounds: null }));
  const windows: WindowInspector = { snapshot };
  return { windows, snapshot };
}

describe("createBlocklistPrivacyFilter", () => {
  it("should allow everything without reading windows for an empty blocklist", async () => {
    const { windows, snapshot } = inspectorFor("1Password");
    const filter = createBlocklistPrivacyFilter(windows, [" ", ""]);

    expect(await filter()).toBe(true);
    expect(snapshot).not.toHaveBeenCalled();
  });

  it("should veto a blocklisted frontmost app case-insensitively", async () => {
    const filter = createBlocklistPrivacyFilter(inspectorFor("1Password").windows, ["1password"]);
    expect(await filter()).toBe(false);
  });

  it("should allow other apps with a fresh window read", async () => {
    const { windows, snapshot } = inspectorFor("Code");
    const filter = createBlocklistPrivacyFilter(windows, ["Messages"]);

    expect(await filter()).toBe(true);
    expect(snapshot).toHaveBeenCalledWith({ cacheMaxAgeMs: 0 });
  });
});
