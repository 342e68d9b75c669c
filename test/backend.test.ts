import { APICallError, RetryError } from "ai";
import { describe, expect, it } from "vitest";

import { toBackendError, toToolSet } from "../src/backends/aiSdkBackend.js";
import { toModelMessages, toToolArguments } from "../src/backends/messages.js";
import {
  BackendAuthError,
  BackendConnectionError,
  BackendRateLimitError,
  TokenBudgetExhausted,
} from "../src/errors.js";
import { objectParameters } from "../src/tools/types.js";
import type { Message } from "../src/types.js";

const apiError = (statusCode: number, responseHeaders?: Record<string, string>) =>
  new APICallError({
    message: "Internal error",
    url: "https://gateway.test/v1/chat/completions",
    requestBodyValues: {},
    statusCode,
    responseHeaders,
  });

describe("toModelMessages", () => {
  it("converts roles and groups consecutive tool results", () => {
    const messages: Message[] = [
      { role: "system", content: "sys", toolCalls: [] },
      { role: "user", content: "hi", toolCalls: [] },
      {
        role: "assistant",
        content: "let me check",
        toolCalls: [
          { id: "c1", name: "read", arguments: { path: "a" } },
          { id: "c2", name: "list", arguments: {} },
        ],
      },
      { role: "tool", content: "file a", toolCalls: [], toolCallId: "c1" },
      { role: "tool", content: "boom", toolCalls: [], toolCallId: "c2", isError: true },
      { role: "assistant", content: "done", toolCalls: [] },
    ];

    expect(toModelMessages(messages)).toEqual([
      { role: "system", content: "sys" },
      { role: "user", content: "hi" },
      {
        role: "assistant",
        content: [
          { type: "text", text: "let me check" },
          { type: "tool-call", toolCallId: "c1", toolName: "read", input: { path: "a" } },
          { type: "tool-call", toolCallId: "c2", toolName: "list", input: {} },
        ],
      },
      {
        role: "tool",
        content: [
          { type: "tool-result", toolCallId: "c1", toolName: "read", output: { type: "text", value: "file a" } },
          { type: "tool-result", toolCallId: "c2", toolName: "list", output: { type: "error-text", value: "boom" } },
        ],
      },
      { role: "assistant", content: "done" },
    ]);
  });

  it("omits the text part of a pure tool-call turn", () => {
    const converted = toModelMessages([
      { role: "assistant", content: null, toolCalls: [{ id: "c1", name: "read", arguments: {} }] },
    ]);

    expect(converted).toEqual([
      { role: "assistant", content: [{ type: "tool-call", toolCallId: "c1", toolName: "read", input: {} }] },
    ]);
  });
});

describe("toToolArguments", () => {
  it("accepts objects and JSON object strings", () => {
    expect(toToolArguments({ a: 1 })).toEqual({ a: 1 });
    expect(toToolArguments('{"a":1}')).toEqual({ a: 1 });
  });

  it("falls back to an empty record", () => {
    expect(toToolArguments("not json")).toEqual({});
    expect(toToolArguments('"text"')).toEqual({});
    expect(toToolArguments([1, 2])).toEqual({});
    expect(toToolArguments(null)).toEqual({});
  });
});

describe("toToolSet", () => {
  it("declares every tool by name without an executor", () => {
    const toolSet = toToolSet([
      { name: "read", description: "Read a file", parameters: objectParameters({}), execute: async () => "" },
    ]);

    expect(Object.keys(toolSet)).toEqual(["read"]);
    expect(toolSet.read?.description).toBe("Read a file");
    expect(toolSet.read?.execute).toBeUndefined();
  });
});

describe("toBackendError", () => {
  it("passes runtime errors and aborts through", () => {
    const budget = new TokenBudgetExhausted(10, 5);
    const abort = new Error("aborted");
    abort.name = "AbortError";

    expect(toBackendError(budget)).toBe(budget);
    expect(toBackendError(abort)).toBe(abort);
  });

  it("maps authentication failures", () => {
    expect(toBackendError(apiError(401))).toBeInstanceOf(BackendAuthError);
    expect(toBackendError(apiError(403))).toBeInstanceOf(BackendAuthError);
  });

  it("maps rate limits with the retry-after header", () => {
    const mapped = toBackendError(apiError(429, { "retry-after": "12" }));

    expect(mapped).toBeInstanceOf(BackendRateLimitError);
    expect(mapped).toMatchObject({ retryAfterSeconds: 12 });
  });

  it("unwraps the last error of a retry failure", () => {
    const retry = new RetryError({
      message: "Failed after 3 attempts",
      reason: "maxRetriesExceeded",
      errors: [apiError(500), apiError(429)],
    });

    const mapped = toBackendError(retry);

    expect(mapped).toBeInstanceOf(BackendRateLimitError);
    expect(mapped).toMatchObject({ retryAfterSeconds: null });
  });

  it("treats everything else as a connection failure", () => {
    expect(toBackendError(apiError(500))).toMatchObject({
      message: "Backend connection failed: Internal error (backend=ai-sdk, provider=openai-compatible)",
    });
    expect(toBackendError(new Error("socket hang up"))).toBeInstanceOf(BackendConnectionError);
    expect(toBackendError("weird")).toMatchObject({ error: "weird" });
  });
});
