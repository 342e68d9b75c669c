export type MessageRole = "system" | "user" | "assistant" | "tool";

export interface ToolCall {
  /** Provider-supplied id, echoed back verbatim in the matching ToolResult. */
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface ToolResult {
  toolCallId: string;
  content: string;
  isError: boolean;
}

export interface Message {
  role: MessageRole;
  /** Null on a pure tool-call assistant turn. */
  content: string | null;
  toolCalls: ToolCall[];
  /** Only set on `tool` messages. */
  toolCallId?: string;
  name?: string;
  /** Set on `tool` messages that carry an error result. */
  isError?: boolean;
}

/**
 * Estimated USD cost of one event.
 *
 * - `number`: known
 * - `null`: unknown (model missing from the pricing table)
 * - `undefined`: never computed (error-only events that made no backend call)
 */
export type CostEstimate = number | null | undefined;

export interface TrajectoryEvent {
  trajectoryId: string;
  callId: string;
  parentCallId: string | null;
  depth: number;
  prompt: string;
  response: string | null;
  toolCalls: ToolCall[];
  toolResults: ToolResult[];
  inputTokens: number;
  outputTokens: number;
  durationMs: number;
  error?: string;
  estimatedCostUsd?: number | null;
  timestamp: string;
}

export interface CompletionOptions {
  readonly maxDepth: number;
  readonly maxSubcalls: number;
  readonly tokenBudget: number;
  readonly toolBudget: number;
  readonly timeoutSeconds: number;
  readonly costBudgetUsd: number | null;
  readonly parallelTools: boolean;
  readonly maxParallel: number;
  readonly includeTrajectory: boolean;
}

/** Lets a caller cancel a completion together with its nested sub-calls. */
export interface CompletionControl {
  signal?: AbortSignal;
}

export interface StreamOptions {
  costBudgetUsd?: number | null;
  timeoutSeconds?: number;
}

export interface RLMResult {
  response: string;
  trajectoryId: string;
  totalCalls: number;
  totalTokens: number;
  totalInputTokens: number;
  totalOutputTokens: number;
  totalToolCalls: number;
  /** Null when any contributing event has an unknown cost. */
  totalCostUsd: number | null;
  durationMs: number;
  /** Empty unless `includeTrajectory` was requested. */
  events: TrajectoryEvent[];
  success: boolean;
  error?: string;
}

export interface SandboxResult {
  output: string;
  error: string | null;
  truncated: boolean;
  executionTimeMs: number;
}

export function createMessage(
  role: MessageRole,
  content: string | null,
  extra: Partial<Pick<Message, "toolCalls" | "toolCallId" | "name" | "isError">> = {},
): Message {
  return {
    role,
    content,
    toolCalls: extra.toolCalls ?? [],
    ...(extra.toolCallId !== undefined ? { toolCallId: extra.toolCallId } : {}),
    ...(extra.name !== undefined ? { name: extra.name } : {}),
    ...(extra.isError !== undefined ? { isError: extra.isError } : {}),
  };
}

export function messageText(message: Message | undefined): string {
  return message?.content ?? "";
}
