/**
 * @file record-normalizer.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { describe, it, expect } from "vitest";
import {
  defaultActivity,
  normalizeClassification,
} from "../../../src/application/services/record-normalizer.js";

describe("normalizeClassification", () => {
  it("should fall back to defaults for output without a JSON object", () => {
    const result = normalizeClassification("I could not tell what is on screen.");

    expect(result.parsed).toBe(false);
    expect(result.activity).toEqual(defaultActivity());
    expect(result.activity.technicalContext).toBe("Unparsed response");
    expect(result.activity.privacyState).toBe("blocked");
  });

  it("should fall back to defaults for malformed JSON", () => {
    const result = normalizeClassification("{task: 'Coding', broken}");
    expect(result.parsed).toBe(false);
    expect(result.activity.task).toBe("Unknown Task");
  });

  it("should fall back to defaults for empty and truncated output", () => {
    expect(normalizeClassification("").parsed).toBe(false);
    expect(normalizeClassification('{"task": "Coding", "is_deep_work": tr').parsed).toBe(false);
  });

  it("should default ill-typed fields individually", () => {
    const { activity, parsed } = normalizeClassification(
      '{"task": "Coding", "activity_type": 42, "is_deep_work": "yes", "alignment_score": null}'
    );

    expect(parsed).toBe(true);
    expect(activity.task).toBe("Coding");
    expect(activity.activityType).toBe("UNKNOWN");
    expect(activity.isDeepWork).toBe(false);
    expect(activity.deepWorkState).toBe("distracted");
    expect(activity.privacyState).toBe("blocked");
    expect(activity.alignmentScore).toBeNull();
  });

  it("should extract the object embedded in surrounding prose", () => {
    const raw =
      'Here you go:\n```json\n{"task": "Reviewing PR", "activity_type": "review", ' +
      '"technical_context": "diff view", "is_deep_work": true, "deep_work_state": "deep_work"}\n```';

    const { activity, parsed } = normalizeClassification(raw);

    expect(parsed).toBe(true);
    expect(activity.task).toBe("Reviewing PR");
    expect(activity.activityType).toBe("REVIEW");
    expect(activity.isDeepWork).toBe(true);
    expect(activity.deepWorkState).toBe("deep_work");
    expect(activity.privacyState).toBe("allowed");
  });

  it("should accept alternate key names", () => {
    const { activity } = normalizeClassification(
      JSON.stringify({
        activity_summary: "Reading docs",
        activity_kind: "research",
        app: "Safari",
        function_name: "parseToken",
        doc_title: "JWT spec",
        documentation_url: "https://example.com/jwt",
      })
    );

    expect(activity.task).toBe("Reading docs");
    expect(activity.activityType).toBe("RESEARCH");
    expect(activity.appName).toBe("Safari");
    expect(activity.functionTarget).toBe("parseToken");
    expect(activity.documentationTitle).toBe("JWT spec");
    expect(activity.docUrl).toBe("https://example.com/jwt");
    expect(activity.technicalContext).toBe("N/A");
  });

  it("should fall back to the activity type for the task", () => {
    const { activity } = normalizeClassification('{"activity_type": "debugging"}');

    expect(activity.task).toBe("DEBUGGING");
    expect(activity.activityType).toBe("DEBUGGING");
  });

  it("should coerce and clamp the alignment score", () => {
    expect(normalizeClassification('{"alignment_score": "87.6"}').activity.alignmentScore).toBe(88);
    expect(normalizeClassification('{"alignment_score": 140}').activity.alignmentScore).toBe(100);
    expect(normalizeClassification('{"alignment_score": -3}').activity.alignmentScore).toBe(0);
    expect(normalizeClassification('{"alignment_score": "high"}').activity.alignmentScore).toBeNull();
  });

  it("should parse string flags and case-insensitive states", () => {
    const { activity } = normalizeClassification(
      '{"is_deep_work": "TRUE", "deep_work_state": "Deep_Work", "privacy_state": "Allowed"}'
    );

    expect(activity.isDeepWork).toBe(true);
    expect(activity.deepWorkState).toBe("deep_work");
    expect(activity.privacyState).toBe("allowed");
  });

  it("should derive the deep work flag from the state", () => {
    const { activity } = normalizeClassification('{"deep_work_state": "deep_work"}');
    expect(activity.isDeepWork).toBe(true);
    expect(activity.privacyState).toBe("allowed");
  });

  it("should resolve a contradicting flag and state to distracted and blocked", () => {
    const { activity } = normalizeClassification(
      '{"is_deep_work": false, "deep_work_state": "deep_work"}'
    );

    expect(activity.isDeepWork).toBe(false);
    expect(activity.deepWorkState).toBe("distracted");
    expect(activity.privacyState).toBe("blocked");
  });

  it("should ignore unknown state values", () => {
    const { activity } = normalizeClassification(
      '{"is_deep_work": true, "deep_work_state": "flow", "privacy_state": "maybe"}'
    );

    expect(activity.deepWorkState).toBe("deep_work");
    expect(activity.privacyState).toBe("allowed");
  });

  it("should keep an explicit privacy state that differs from the derived one", () => {
    const { activity } = normalizeClassification(
      '{"is_deep_work": true, "deep_work_state": "deep_work", "privacy_state": "blocked"}'
    );
    expect(activity.privacyState).toBe("blocked");
  });

  it("should find an HTTP error code in the technical context", () => {
    const { activity } = normalizeClassification(
      '{"technical_context": "POST /refunds returned 502 Bad Gateway"}'
    );
    expect(activity.errorCode).toBe("502");
  });

  it("should prefer an explicit numeric error code", () => {
    const { activity } = normalizeClassification(
      '{"technical_context": "got 404", "error_code": 1205}'
    );
    expect(activity.errorCode).toBe("1205");
  });
});
