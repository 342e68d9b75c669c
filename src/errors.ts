export type ErrorContext = Record<string, unknown>;

const MAX_ERROR_PREVIEW_CHARS = 200;

/**
 * Base class for every condition the runtime raises. The string form appends
 * the context record as `(key=value, ...)`.
 */
export class RLMError extends Error {
  readonly context: ErrorContext;

  constructor(
    readonly detail: string,
    context: ErrorContext = {},
  ) {
    super(formatMessage(detail, context));
    this.name = new.target.name;
    this.context = context;
  }
}

function formatMessage(detail: string, context: ErrorContext): string {
  const entries = Object.entries(context);
  if (entries.length === 0) {
    return detail;
  }
  const rendered = entries.map(([key, value]) => `${key}=${formatValue(value)}`).join(", ");
  return `${detail} (${rendered})`;
}

function formatValue(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

function preview(text: string): string {
  return text.length > MAX_ERROR_PREVIEW_CHARS ? `${text.slice(0, MAX_ERROR_PREVIEW_CHARS)}...` : text;
}

// Budget and guard conditions

export type DepthLimitKind = "depth" | "subcalls";

/**
 * Raised for both the recursion-depth ceiling and the absolute backend-call
 * ceiling; `limit` records which one tripped.
 */
export class MaxDepthExceeded extends RLMError {
  constructor(
    readonly depth: number,
    readonly maxDepth: number,
    readonly limit: DepthLimitKind = "depth",
  ) {
    super(
      limit === "depth"
        ? `Maximum recursion depth exceeded: ${depth}/${maxDepth}`
        : `Maximum backend calls per completion exceeded: ${depth}/${maxDepth}`,
    );
  }
}

export class TokenBudgetExhausted extends RLMError {
  constructor(
    readonly tokensUsed: number,
    readonly budget: number,
  ) {
    super(`Token budget exhausted: ${tokensUsed}/${budget} tokens used`);
  }
}

export class CostBudgetExhausted extends RLMError {
  constructor(
    readonly costUsed: number,
    readonly budget: number,
  ) {
    super(`Cost budget exhausted: $${costUsed.toFixed(4)}/$${budget.toFixed(4)}`);
  }
}

export class ToolBudgetExhausted extends RLMError {
  constructor(
    readonly callsMade: number,
    readonly budget: number,
  ) {
    super(`Tool budget exhausted: ${callsMade}/${budget} tool calls`);
  }
}

export class TimeoutExceeded extends RLMError {
  constructor(
    readonly elapsedSeconds: number,
    readonly timeoutSeconds: number,
  ) {
    super(`Completion timed out after ${elapsedSeconds.toFixed(1)}s (limit ${timeoutSeconds}s)`);
  }
}

export class SubCallBudgetExhausted extends RLMError {
  constructor(
    readonly callsMade: number,
    readonly maxPerTurn: number,
  ) {
    super(`Sub-call limit reached: ${callsMade}/${maxPerTurn} sub-calls this turn`);
  }
}

export class SubCallCostExceeded extends RLMError {
  constructor(
    readonly sessionCost: number,
    readonly maxCost: number,
  ) {
    super(`Sub-call cost cap reached: $${sessionCost.toFixed(4)}/$${maxCost.toFixed(4)}`);
  }
}

// Tools

export class ToolError extends RLMError {}

export class ToolNotFoundError extends ToolError {
  constructor(
    readonly toolName: string,
    readonly availableTools: string[] = [],
  ) {
    super(
      `Tool '${toolName}' not found. Available tools: ${
        availableTools.length > 0 ? availableTools.join(", ") : "(none)"
      }`,
    );
  }
}

export class ToolExecutionError extends ToolError {
  constructor(
    readonly toolName: string,
    readonly error: string,
    readonly args: Record<string, unknown> = {},
  ) {
    super(`Tool '${toolName}' failed: ${preview(error)}`);
  }
}

export class ToolValidationError extends ToolError {
  constructor(
    readonly toolName: string,
    readonly validationError: string,
    readonly args: Record<string, unknown> = {},
  ) {
    super(`Invalid arguments for tool '${toolName}': ${validationError}`);
  }
}

// Backend transport

export class BackendError extends RLMError {}

export class BackendConnectionError extends BackendError {
  constructor(
    readonly backend: string,
    readonly provider: string,
    readonly error: string,
  ) {
    super(`Backend connection failed: ${preview(error)}`, { backend, provider });
  }
}

export class BackendRateLimitError extends BackendError {
  constructor(
    readonly backend: string,
    readonly provider: string,
    readonly retryAfterSeconds: number | null = null,
  ) {
    super(
      "Backend rate limit exceeded",
      retryAfterSeconds === null ? { backend, provider } : { backend, provider, retryAfterSeconds },
    );
  }
}

export class BackendAuthError extends BackendError {
  constructor(
    readonly backend: string,
    readonly provider: string,
  ) {
    super("Backend authentication failed; check the API key", { backend, provider });
  }
}

// Sandbox

export class SandboxError extends RLMError {}

export class SandboxExecutionError extends SandboxError {
  constructor(
    readonly code: string,
    readonly error: string,
    readonly output: string = "",
  ) {
    super(`Sandbox execution failed: ${preview(error)}`);
  }
}

export class SandboxTimeoutError extends SandboxError {
  constructor(
    readonly code: string,
    readonly timeoutSeconds: number,
  ) {
    super(`Sandbox execution timeout after ${timeoutSeconds}s`);
  }
}

export class SandboxImportError extends SandboxError {
  constructor(
    readonly moduleName: string,
    readonly allowed: string[] = [],
  ) {
    super(`Import of '${moduleName}' is blocked in the sandbox`);
  }
}

export class SandboxSecurityError extends SandboxError {
  constructor(readonly violation: string) {
    super(`Sandbox security violation: ${violation}`);
  }
}

// Configuration

export class ConfigError extends RLMError {}

export class ConfigNotFoundError extends ConfigError {
  constructor(readonly configPath: string) {
    super(`Config file not found: ${configPath}`);
  }
}

export class ConfigValidationError extends ConfigError {
  constructor(
    readonly field: string,
    readonly reason: string,
  ) {
    super(`Invalid config value for '${field}': ${reason}`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
