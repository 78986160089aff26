/**
 * @file http-routes.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from "vitest";
import { createApp, type App } from "../../../src/app.js";
import { registerHealthRoute } from "../../../src/infrastructure/http/health-route.js";
import { registerSessionRoutes } from "../../../src/infrastructure/http/session-routes.js";
import { registerIdentityRoute } from "../../../src/infrastructure/http/identity-route.js";
import { registerOracleRoute } from "../../../src/infrastructure/http/oracle-route.js";
import { SessionRegistry } from "../../../src/application/services/session-registry.js";
import type {
  OracleAnswer,
  OracleQuestion,
} from "../../../src/application/services/oracle-query-engine.js";
import { IdentityState } from "../../../src/domain/value-objects/identity.js";
import { FakeArtifactStorage, FakeHiveStore, makeRecord, silentLogger } from "../../helpers/fakes.js";

const NOW = new Date("2025-03-01T12:00:00.000Z");
const minutesAgo = (minutes: number) => new Date(NOW.getTime() - minutes * 60_000);

const ANSWER: OracleAnswer = {
  question: "Status?",
  answer: "All good.",
  scope: "org",
  projectName: null,
  timeWindowHours: null,
  logCount: 1,
  summaryCount: 0,
  generatedAt: NOW.toISOString(),
  contextPreview: [],
};

describe("HTTP routes", () => {
  let app: App;
  let registry: SessionRegistry;
  let identity: IdentityState;
  let ask: Mock<(input: OracleQuestion) => Promise<OracleAnswer>>;

  beforeEach(async () => {
    registry = new SessionRegistry({
      artifacts: new FakeArtifactStorage(),
      historyCapacity: 10,
      logger: silentLogger,
    });
    identity = new IdentityState({ orgId: "acme", userId: "dev-1" });
    ask = vi.fn(async (_input: OracleQuestion) => ANSWER);

    app = createApp({ logger: silentLogger });
    registerHealthRoute(
      app,
      { version: "0.1.0" },
      { registry, store: new FakeHiveStore(), isCaptureRunning: null }
    );
    registerSessionRoutes(app, { registry, summarizer: null, clock: () => NOW });
    registerIdentityRoute(app, { identity });
    registerOracleRoute(app, { oracle: { ask } });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  const createSession = async (projectName = "Payments") => {
    const response = await app.inject({
      method: "POST",
      url: "/sessions",
      payload: { projectName, repoPath: "/repos/payments", goal: "Fix refunds" },
    });
    return response;
  };

  describe("health", () => {
    it("should answer the liveness probe", async () => {
      const response = await app.inject({ method: "GET", url: "/healthz" });
      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ status: "ok" });
    });

    it("should report sessions and store health", async () => {
      await createSession();

      const body = (await app.inject({ method: "GET", url: "/health" })).json();

      expect(body.status).toBe("healthy");
      expect(body.version).toBe("0.1.0");
      expect(body.capture).toEqual({ enabled: false, running: false });
      expect(body.sessions.total).toBe(1);
      expect(body.sessions.activeSessionId).toBe(registry.getActiveSessionId());
      expect(body.store).toEqual({ health: "healthy" });
    });
  });

  describe("sessions", () => {
    it("should create a session", async () => {
      const response = await createSession("Payments API");

      expect(response.statusCode).toBe(201);
      const body = response.json();
      expect(body.projectName).toBe("Payments API");
      expect(body.projectSlug).toBe("payments-api");
      expect(body.goal).toBe("Fix refunds");
      expect(body.recordCount).toBe(0);
      expect(registry.getActiveSessionId()).toBe(body.sessionId);
    });

    it("should reject an incomplete body", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/sessions",
        payload: { repoPath: "/repos/payments" },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({ error: "projectName: Required", code: "INVALID_PAYLOAD" });
    });

    it("should list sessions with the active pointer", async () => {
      const first = (await createSession("One")).json();
      await createSession("Two");

      const body = (await app.inject({ method: "GET", url: "/sessions" })).json();

      expect(body.activeSessionId).toBe(first.sessionId);
      expect(body.sessions).toHaveLength(2);
    });

    it("should switch the active session", async () => {
      await createSession("One");
      const second = (await createSession("Two")).json();

      const response = await app.inject({
        method: "POST",
        url: `/sessions/${second.sessionId}/activate`,
      });

      expect(response.statusCode).toBe(200);
      expect(registry.getActiveSessionId()).toBe(second.sessionId);
    });

    it("should return 404 for an unknown session", async () => {
      const response = await app.inject({ method: "POST", url: "/sessions/missing-id/activate" });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({
        error: "Session not found: missing-id",
        code: "SESSION_NOT_FOUND",
      });
    });

    it("should delete idempotently", async () => {
      const created = (await createSession()).json();

      const first = await app.inject({ method: "DELETE", url: `/sessions/${created.sessionId}` });
      const second = await app.inject({ method: "DELETE", url: `/sessions/${created.sessionId}` });

      expect(first.statusCode).toBe(204);
      expect(second.statusCode).toBe(204);
      expect(registry.count()).toBe(0);
    });

    it("should window records by age and privacy", async () => {
      const created = (await createSession()).json();
      const id: string = created.sessionId;
      await registry.append(id, makeRecord({ sessionId: id, timestamp: minutesAgo(45), task: "Old" }));
      await registry.append(
        id,
        makeRecord({ sessionId: id, timestamp: minutesAgo(5), task: "Recent", artifactPath: "/spool/f.png" })
      );
      await registry.append(
        id,
        makeRecord({
          sessionId: id,
          timestamp: minutesAgo(3),
          task: "Private",
          isDeepWork: false,
          deepWorkState: "distracted",
          privacyState: "blocked",
        })
      );

      const windowed = (
        await app.inject({ method: "GET", url: `/sessions/${id}/records?minutes=30&allowedOnly=true` })
      ).json();
      const all = (await app.inject({ method: "GET", url: `/sessions/${id}/records` })).json();

      expect(windowed.sessionId).toBe(id);
      expect(windowed.records).toHaveLength(1);
      expect(windowed.records[0].task).toBe("Recent");
      expect(windowed.records[0].artifact_path).toBe("/spool/f.png");
      expect(all.records.map((record: { task: string }) => record.task)).toEqual(["Old", "Recent", "Private"]);
    });

    it("should report summaries as unavailable without a summarizer", async () => {
      const created = (await createSession()).json();

      const response = await app.inject({ method: "POST", url: `/sessions/${created.sessionId}/summary` });

      expect(response.statusCode).toBe(503);
      expect(response.json().code).toBe("SUMMARY_UNAVAILABLE");
    });
  });

  describe("identity", () => {
    it("should update the identity and clear blank fields", async () => {
      const response = await app.inject({
        method: "PUT",
        url: "/identity",
        payload: { userId: "dev-2", displayName: "" },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ userId: "dev-2", displayName: null, orgId: "acme" });
      expect(identity.snapshot().userId).toBe("dev-2");
    });

    it("should return the current identity", async () => {
      const body = (await app.inject({ method: "GET", url: "/identity" })).json();
      expect(body).toEqual({ userId: "dev-1", displayName: null, orgId: "acme" });
    });
  });

  describe("oracle", () => {
    it("should forward the question with the default scope", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/oracle/ask",
        payload: { question: "Status?" },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual(ANSWER);
      expect(ask).toHaveBeenCalledWith({ question: "Status?", scope: "org" });
    });

    it("should reject an unknown scope", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/oracle/ask",
        payload: { question: "Status?", scope: "team" },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().code).toBe("INVALID_PAYLOAD");
      expect(ask).not.toHaveBeenCalled();
    });
  });

  it("should answer unknown routes with 404", async () => {
    const response = await app.inject({ method: "GET", url: "/nope" });
    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ error: "Not Found", code: "NOT_FOUND" });
  });
});
