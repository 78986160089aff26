/**
 * @file remote-sync.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { describe, it, expect, beforeEach } from "vitest";
import { RemoteSync } from "../../../src/application/services/remote-sync.js";
import { IdentityState } from "../../../src/domain/value-objects/identity.js";
import { FakeHiveStore, makeRecord, silentLogger } from "../../helpers/fakes.js";

describe("RemoteSync", () => {
  let store: FakeHiveStore;
  let identity: IdentityState;
  let sync: RemoteSync;

  beforeEach(() => {
    store = new FakeHiveStore();
    identity = new IdentityState({ orgId: "acme", userId: "dev-1", displayName: "Dev One" });
    sync = new RemoteSync({
      store,
      identity,
      logger: silentLogger,
      clock: () => new Date("2025-03-01T10:00:05.000Z"),
    });
  });

  it("should never touch the store for blocked records", async () => {
    const record = makeRecord({ privacyState: "blocked", deepWorkState: "distracted", isDeepWork: false });

    expect(await sync.publish(record)).toBe(false);
    expect(store.calls).toBe(0);
  });

  it("should never touch the store for allowed records outside deep work", async () => {
    const record = makeRecord({ isDeepWork: false, deepWorkState: "distracted", privacyState: "allowed" });

    expect(await sync.publish(record)).toBe(false);
    expect(store.calls).toBe(0);
  });

  it("should keep records local without a user identity", async () => {
    identity.update({ userId: null });

    expect(await sync.publish(makeRecord())).toBe(false);
    expect(store.calls).toBe(0);
  });

  it("should skip an unavailable store", async () => {
    store.available = false;
    expect(await sync.publish(makeRecord())).toBe(false);
    expect(store.activities).toEqual([]);
  });

  it("should write a summarized document with current identity", async () => {
    expect(await sync.publish(makeRecord())).toBe(true);

    const [document] = store.activities;
    expect(document?.user_id).toBe("dev-1");
    expect(document?.user_display).toBe("Dev One");
    expect(document?.org_id).toBe("acme");
    expect(document?.summary).toBe("Editing refund handler | refunds.ts");
    expect(document?.created_at).toBe("2025-03-01T10:00:05.000Z");
    expect(document?.timestamp).toBe("2025-03-01T10:00:00.000Z");
  });

  it("should prefer the identity stamped on the record", async () => {
    await sync.publish(makeRecord({ userId: "dev-9", userDisplay: "Nine", orgId: "beta" }));

    expect(store.activities[0]?.user_id).toBe("dev-9");
    expect(store.activities[0]?.user_display).toBe("Nine");
    expect(store.activities[0]?.org_id).toBe("beta");
  });

  it("should swallow store failures", async () => {
    store.insertActivity = async () => {
      throw new Error("disk full");
    };
    expect(await sync.publish(makeRecord())).toBe(false);
  });
});
