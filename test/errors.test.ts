import { describe, expect, it } from "vitest";

import {
  BackendAuthError,
  BackendConnectionError,
  BackendError,
  BackendRateLimitError,
  ConfigNotFoundError,
  ConfigValidationError,
  CostBudgetExhausted,
  MaxDepthExceeded,
  RLMError,
  SandboxError,
  SandboxExecutionError,
  SandboxImportError,
  SandboxSecurityError,
  SandboxTimeoutError,
  SubCallCostExceeded,
  TimeoutExceeded,
  ToolError,
  ToolExecutionError,
  ToolNotFoundError,
  ToolValidationError,
  errorMessage,
} from "../src/errors.js";

describe("RLMError", () => {
  it("renders its context into the message", () => {
    const error = new RLMError("Something failed", { attempt: 2, stage: "dispatch" });

    expect(error.message).toBe("Something failed (attempt=2, stage=dispatch)");
    expect(error.detail).toBe("Something failed");
    expect(error.context).toEqual({ attempt: 2, stage: "dispatch" });
    expect(error.name).toBe("RLMError");
  });

  it("names subclasses after themselves", () => {
    const error = new TimeoutExceeded(3.04, 2);

    expect(error).toBeInstanceOf(RLMError);
    expect(error.name).toBe("TimeoutExceeded");
    expect(error.message).toBe("Completion timed out after 3.0s (limit 2s)");
  });
});

describe("guard errors", () => {
  it("distinguishes the depth and backend-call ceilings", () => {
    const depth = new MaxDepthExceeded(4, 4);
    const calls = new MaxDepthExceeded(12, 12, "subcalls");

    expect(depth.limit).toBe("depth");
    expect(depth.message).toBe("Maximum recursion depth exceeded: 4/4");
    expect(calls.limit).toBe("subcalls");
    expect(calls.message).toBe("Maximum backend calls per completion exceeded: 12/12");
  });

  it("formats dollar amounts to four places", () => {
    expect(new CostBudgetExhausted(0.5, 0.25).message).toBe("Cost budget exhausted: $0.5000/$0.2500");
    expect(new SubCallCostExceeded(1, 1).message).toBe("Sub-call cost cap reached: $1.0000/$1.0000");
  });
});

describe("tool errors", () => {
  it("lists available tools when one is missing", () => {
    expect(new ToolNotFoundError("fetch", ["add", "search"]).message).toBe(
      "Tool 'fetch' not found. Available tools: add, search",
    );
    expect(new ToolNotFoundError("fetch").message).toBe("Tool 'fetch' not found. Available tools: (none)");
  });

  it("truncates long execution errors", () => {
    const error = new ToolExecutionError("parse", "x".repeat(300), { input: "abc" });

    expect(error).toBeInstanceOf(ToolError);
    expect(error.message).toBe(`Tool 'parse' failed: ${"x".repeat(200)}...`);
    expect(error.error).toHaveLength(300);
    expect(error.args).toEqual({ input: "abc" });
  });

  it("describes invalid arguments", () => {
    expect(new ToolValidationError("add", "x: Required").message).toBe("Invalid arguments for tool 'add': x: Required");
  });
});

describe("backend errors", () => {
  it("carries backend and provider in the context", () => {
    const error = new BackendConnectionError("ai-sdk", "openai-compatible", "ECONNRESET");

    expect(error).toBeInstanceOf(BackendError);
    expect(error.message).toBe("Backend connection failed: ECONNRESET (backend=ai-sdk, provider=openai-compatible)");
  });

  it("includes retry-after only when known", () => {
    expect(new BackendRateLimitError("ai-sdk", "openai-compatible", 30).message).toBe(
      "Backend rate limit exceeded (backend=ai-sdk, provider=openai-compatible, retryAfterSeconds=30)",
    );
    expect(new BackendRateLimitError("ai-sdk", "openai-compatible").context).toEqual({
      backend: "ai-sdk",
      provider: "openai-compatible",
    });
  });

  it("points at the API key on auth failures", () => {
    expect(new BackendAuthError("ai-sdk", "openai-compatible").detail).toBe(
      "Backend authentication failed; check the API key",
    );
  });
});

describe("sandbox and config errors", () => {
  it("share their family base classes", () => {
    const sandboxErrors = [
      new SandboxExecutionError("1/0", "boom"),
      new SandboxTimeoutError("while(true){}", 5),
      new SandboxImportError("fs", ["math"]),
      new SandboxSecurityError("process access"),
    ];

    expect(sandboxErrors.every((error) => error instanceof SandboxError)).toBe(true);
    expect(sandboxErrors.map((error) => error.message)).toEqual([
      "Sandbox execution failed: boom",
      "Sandbox execution timeout after 5s",
      "Import of 'fs' is blocked in the sandbox",
      "Sandbox security violation: process access",
    ]);
  });

  it("reports the path or field that failed", () => {
    expect(new ConfigNotFoundError("/etc/rlm.json").message).toBe("Config file not found: /etc/rlm.json");
    expect(new ConfigValidationError("maxDepth", "must be an integer").message).toBe(
      "Invalid config value for 'maxDepth': must be an integer",
    );
  });
});

describe("errorMessage", () => {
  it("reads Error messages and stringifies anything else", () => {
    expect(errorMessage(new Error("bad"))).toBe("bad");
    expect(errorMessage("plain")).toBe("plain");
    expect(errorMessage(404)).toBe("404");
  });
});
