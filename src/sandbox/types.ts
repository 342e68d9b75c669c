import { type SandboxResult } from "../types.js";

/**
 * Code executor with a variable namespace that persists across `execute`
 * calls on the same instance. Failures are reported in `SandboxResult.error`.
 */
export interface Sandbox {
  execute(code: string, timeoutSeconds?: number): Promise<SandboxResult>;
  getContext(): Record<string, unknown>;
  setContext(key: string, value: unknown): void;
  clearContext(): void;
}
