import { describe, expect, it } from "vitest";

import { ToolValidationError } from "../src/errors.js";
import { VmSandbox } from "../src/sandbox/vmSandbox.js";
import { createSandboxTools, formatSandboxResult } from "../src/tools/builtin.js";
import type { Tool } from "../src/tools/types.js";

const toolNamed = (tools: Tool[], name: string): Tool => {
  const found = tools.find((tool) => tool.name === name);
  if (!found) {
    throw new Error(`missing tool ${name}`);
  }
  return found;
};

describe("VmSandbox", () => {
  it("captures print and console.log output", async () => {
    const sandbox = new VmSandbox();

    const result = await sandbox.execute('print(1, "two", { three: 3 }); console.log("done")');

    expect(result.output).toBe('1 two {"three":3}\ndone');
    expect(result.error).toBeNull();
    expect(result.truncated).toBe(false);
  });

  it("appends a value left in result", async () => {
    const result = await new VmSandbox().execute("result = [1, 2].map((n) => n * 10)");

    expect(result.output).toBe("result = [10,20]");
  });

  it("keeps context between executions", async () => {
    const sandbox = new VmSandbox();
    await sandbox.execute("context.total = 40");
    sandbox.setContext("extra", 2);

    const result = await sandbox.execute("print(context.total + context.extra)");

    expect(result.output).toBe("42");
    expect(sandbox.getContext()).toEqual({ total: 40, extra: 2 });

    sandbox.clearContext();
    expect(sandbox.getContext()).toEqual({});
  });

  it("reports thrown errors with their name", async () => {
    const sandbox = new VmSandbox();

    expect((await sandbox.execute('print("before"); throw new TypeError("bad input")')).error).toBe(
      "TypeError: bad input",
    );
    expect((await sandbox.execute("missingName + 1")).error).toBe("ReferenceError: missingName is not defined");
  });

  it("stops runaway code at the timeout", async () => {
    const result = await new VmSandbox().execute("while (true) {}", 0.05);

    expect(result.error).toBe("SandboxTimeoutError: Sandbox execution timeout after 0.05s");
  });

  it("truncates long output", async () => {
    const result = await new VmSandbox({ maxOutputChars: 5 }).execute('print("abcdefghij")');

    expect(result.truncated).toBe(true);
    expect(result.output).toBe("abcde\n... [truncated 5 chars]");
  });
});

describe("sandbox tools", () => {
  it("formats output, errors and truncation", () => {
    expect(formatSandboxResult({ output: "", error: null, truncated: false, executionTimeMs: 1 })).toBe("(no output)");
    expect(formatSandboxResult({ output: "partial", error: "Error: late", truncated: true, executionTimeMs: 1 })).toBe(
      "partial\nError: Error: late\n[output truncated]",
    );
  });

  it("executes code and manages context through tools", async () => {
    const sandbox = new VmSandbox();
    const tools = createSandboxTools(sandbox);

    expect(await toolNamed(tools, "set_sandbox_context").execute({ key: "rows", value: [1, 2, 3] })).toBe(
      "Set context['rows']",
    );
    expect(await toolNamed(tools, "execute_code").execute({ code: "print(context.rows.length)" })).toBe("3");
    expect(await toolNamed(tools, "get_sandbox_context").execute({})).toEqual({ rows: [1, 2, 3] });
  });

  it("validates tool arguments", async () => {
    const tools = createSandboxTools(new VmSandbox());

    await expect(toolNamed(tools, "execute_code").execute({})).rejects.toBeInstanceOf(ToolValidationError);
    await expect(toolNamed(tools, "set_sandbox_context").execute({ key: "", value: 1 })).rejects.toBeInstanceOf(
      ToolValidationError,
    );
  });
});
