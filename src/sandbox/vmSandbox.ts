import vm from "node:vm";

import { SandboxTimeoutError } from "../errors.js";
import { truncateText } from "../parsing.js";
import { type SandboxResult } from "../types.js";
import { type Sandbox } from "./types.js";

export interface VmSandboxOptions {
  timeoutSeconds?: number;
  maxOutputChars?: number;
}

const DEFAULT_TIMEOUT_SECONDS = 30;
const DEFAULT_MAX_OUTPUT_CHARS = 10_000;

interface SandboxGlobals {
  context: Record<string, unknown>;
  result: unknown;
  print: (...values: unknown[]) => void;
  console: { log: (...values: unknown[]) => void };
}

/**
 * Runs synchronous JavaScript snippets in a dedicated `node:vm` context.
 * Globals declared by one snippet stay visible to the next; `context` is the
 * shared namespace also reachable through get/setContext, and a value left in
 * `result` is echoed at the end of the output.
 */
export class VmSandbox implements Sandbox {
  private readonly timeoutSeconds: number;
  private readonly maxOutputChars: number;
  private readonly globals: SandboxGlobals;
  private readonly vmContext: vm.Context;
  private outputLines: string[] = [];

  constructor(options: VmSandboxOptions = {}) {
    this.timeoutSeconds = options.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS;
    this.maxOutputChars = options.maxOutputChars ?? DEFAULT_MAX_OUTPUT_CHARS;

    const print = (...values: unknown[]): void => {
      this.outputLines.push(values.map(formatValue).join(" "));
    };

    this.globals = {
      context: {},
      result: undefined,
      print,
      console: { log: print },
    };
    this.vmContext = vm.createContext(this.globals, {
      name: "rlm-sandbox",
      codeGeneration: { strings: false, wasm: false },
    });
  }

  async execute(code: string, timeoutSeconds: number = this.timeoutSeconds): Promise<SandboxResult> {
    const startedAt = Date.now();
    this.outputLines = [];
    this.globals.result = undefined;

    let error: string | null = null;
    try {
      const script = new vm.Script(code, { filename: "sandbox.js" });
      script.runInContext(this.vmContext, { timeout: Math.max(1, Math.round(timeoutSeconds * 1000)) });
    } catch (caught) {
      error = describeError(isTimeout(caught) ? new SandboxTimeoutError(code, timeoutSeconds) : caught);
    }

    this.syncContext();

    if (error === null && this.globals.result !== undefined) {
      this.outputLines.push(`result = ${formatJson(this.globals.result)}`);
    }

    const output = this.outputLines.join("\n");
    this.outputLines = [];

    return {
      output: truncateText(output, this.maxOutputChars),
      error,
      truncated: output.length > this.maxOutputChars,
      executionTimeMs: Date.now() - startedAt,
    };
  }

  getContext(): Record<string, unknown> {
    return { ...this.globals.context };
  }

  setContext(key: string, value: unknown): void {
    this.globals.context[key] = value;
  }

  clearContext(): void {
    this.globals.context = {};
  }

  // Snippets may rebind `context`; keep reading whatever object it now names.
  private syncContext(): void {
    const current: unknown = this.globals.context;
    if (current === null || typeof current !== "object" || Array.isArray(current)) {
      this.globals.context = {};
    }
  }
}

function isTimeout(error: unknown): boolean {
  return (
    error !== null &&
    typeof error === "object" &&
    "code" in error &&
    error.code === "ERR_SCRIPT_EXECUTION_TIMEOUT"
  );
}

// Errors thrown inside the context come from another realm, so `instanceof Error` is false for them.
function describeError(error: unknown): string {
  if (error !== null && typeof error === "object" && "message" in error && typeof error.message === "string") {
    const name = "name" in error && typeof error.name === "string" ? error.name : "Error";
    return `${name}: ${error.message}`;
  }
  return `Error: ${String(error)}`;
}

function formatValue(value: unknown): string {
  return typeof value === "string" ? value : formatJson(value);
}

function formatJson(value: unknown): string {
  if (value === undefined) {
    return "undefined";
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
