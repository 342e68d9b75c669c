import { createHash } from "node:crypto";

import { describe, expect, it } from "vitest";

import {
  DEFAULT_REDACTION_POLICY,
  redactPromptText,
  redactToolOutput,
  redactTrajectoryEvent,
  resolveRedactionPolicy,
} from "../src/logging/redaction.js";
import type { TrajectoryEvent } from "../src/types.js";

const policy = resolveRedactionPolicy({
  maxPromptChars: 8,
  maxResponseChars: 8,
  maxToolOutputChars: 8,
  headChars: 3,
  tailChars: 2,
});

describe("redaction", () => {
  it("fills unset policy fields from the defaults", () => {
    expect(resolveRedactionPolicy({ headChars: 10 })).toEqual({ ...DEFAULT_REDACTION_POLICY, headChars: 10 });
  });

  it("leaves short text untouched", () => {
    expect(redactPromptText("short", policy)).toEqual({
      text: "short",
      redacted: false,
      originalLength: 5,
      digest: null,
    });
  });

  it("keeps head and tail around a digest of the original", () => {
    const original = "0123456789abc";
    const digest = createHash("sha256").update(original).digest("hex");

    expect(redactToolOutput(original, policy)).toEqual({
      text: `012\n... [truncated 8 chars; sha256=${digest}] ...\nbc`,
      redacted: true,
      originalLength: 13,
      digest,
    });
  });

  it("redacts prompt, response and tool results of an event", () => {
    const event: TrajectoryEvent = {
      trajectoryId: "t",
      callId: "c",
      parentCallId: null,
      depth: 0,
      prompt: "p".repeat(20),
      response: null,
      toolCalls: [{ id: "x", name: "read", arguments: {} }],
      toolResults: [{ toolCallId: "x", content: "r".repeat(20), isError: false }],
      inputTokens: 1,
      outputTokens: 1,
      durationMs: 1,
      timestamp: "2026-01-01T00:00:00.000Z",
    };

    const redacted = redactTrajectoryEvent(event, policy);

    expect(redacted.prompt.startsWith("ppp\n... [truncated 15 chars;")).toBe(true);
    expect(redacted.response).toBeNull();
    expect(redacted.toolResults[0]?.content.endsWith("] ...\nrr")).toBe(true);
    expect(event.prompt).toBe("p".repeat(20));
  });
});
