import { randomUUID } from "node:crypto";

import { type Backend } from "./backends/types.js";
import { abortReason, mapWithConcurrency, withTimeout } from "./concurrency.js";
import { DEFAULT_CONFIG, defaultCompletionOptions, type RuntimeConfig } from "./config.js";
import {
  CostBudgetExhausted,
  MaxDepthExceeded,
  TimeoutExceeded,
  TokenBudgetExhausted,
  ToolBudgetExhausted,
  ToolError,
  ToolExecutionError,
  ToolNotFoundError,
  errorMessage,
} from "./errors.js";
import { createEventEmitter, logVerbose } from "./logging/events.js";
import { type EventSink, type RuntimeEventEmitter } from "./logging/traceTypes.js";
import { type TrajectoryLogger } from "./logging/trajectoryLogger.js";
import { resolveCompletionOptions } from "./options.js";
import { estimateTokens, previewText } from "./parsing.js";
import { estimateCost, formatCost, sumCosts, sumKnownCosts } from "./pricing.js";
import { type Sandbox } from "./sandbox/types.js";
import { createSandboxTools } from "./tools/builtin.js";
import { ToolRegistry } from "./tools/registry.js";
import { SubCallContext, createSubCallTools } from "./tools/subCalls.js";
import { serializeToolOutput, type Tool } from "./tools/types.js";
import {
  createMessage,
  messageText,
  type CompletionControl,
  type CompletionOptions,
  type Message,
  type RLMResult,
  type StreamOptions,
  type ToolCall,
  type ToolResult,
  type TrajectoryEvent,
} from "./types.js";

export const TOOL_BUDGET_EXCEEDED_MESSAGE = "Error: Tool budget exceeded. No more tool calls will be executed.";

export interface RLMOrchestratorOptions {
  backend: Backend;
  registry?: ToolRegistry;
  /** Registered on the registry at construction. */
  tools?: Tool[];
  /** When set, the execute_code and sandbox context tools are registered. */
  sandbox?: Sandbox;
  config?: RuntimeConfig;
  trajectoryLogger?: TrajectoryLogger;
  eventSink?: EventSink;
  verbose?: boolean;
}

interface RecursionState {
  readonly trajectoryId: string;
  readonly options: CompletionOptions;
  readonly messages: Message[];
  readonly events: TrajectoryEvent[];
  readonly extraTools: Tool[];
  readonly signal: AbortSignal;
  toolCallsExecuted: number;
}

export class RLMOrchestrator {
  readonly backend: Backend;
  readonly registry: ToolRegistry;
  readonly config: RuntimeConfig;
  readonly sandbox?: Sandbox;
  private readonly defaultOptions: CompletionOptions;
  private readonly trajectoryLogger?: TrajectoryLogger;
  private readonly verbose: boolean;
  private readonly emit: RuntimeEventEmitter;

  constructor(options: RLMOrchestratorOptions) {
    this.backend = options.backend;
    this.registry = options.registry ?? new ToolRegistry();
    this.config = options.config ?? DEFAULT_CONFIG;
    this.sandbox = options.sandbox;
    this.defaultOptions = defaultCompletionOptions(this.config);
    this.trajectoryLogger = options.trajectoryLogger;
    this.verbose = options.verbose ?? this.config.verbose;
    this.emit = createEventEmitter(options.eventSink, this.verbose);

    if (options.sandbox) {
      for (const tool of createSandboxTools(options.sandbox, { timeoutSeconds: this.config.sandboxTimeoutSeconds })) {
        this.registry.register(tool);
      }
    }
    for (const tool of options.tools ?? []) {
      this.registry.register(tool);
    }

    logVerbose(this.verbose, `orchestrator ready: backend=${this.backend.name} model=${this.backend.model} tools=${this.registry.size}`);
  }

  /**
   * Runs one completion to its final answer or first tripped limit. Never
   * rejects: failures come back with `success: false` and a response of the
   * form `Error: <message>`. Aborting `control.signal` ends the completion
   * and every sub-call it started.
   */
  async completion(
    prompt: string,
    system?: string,
    overrides: Partial<CompletionOptions> = {},
    control: CompletionControl = {},
  ): Promise<RLMResult> {
    const trajectoryId = randomUUID();
    const startedAt = Date.now();
    const events: TrajectoryEvent[] = [];
    let includeTrajectory = overrides.includeTrajectory ?? this.defaultOptions.includeTrajectory;

    let response: string;
    let failure: string | undefined;

    try {
      const options = resolveCompletionOptions(overrides, this.defaultOptions);
      includeTrajectory = options.includeTrajectory;

      const messages = buildInitialMessages(prompt, system);
      const extraTools = this.config.subCalls.enabled
        ? createSubCallTools({
            runner: this,
            context: new SubCallContext(this.config.subCalls),
            parentOptions: options,
            parentTokensUsed: () => totalTokens(events),
            emit: this.emit,
          })
        : [];

      logVerbose(this.verbose, `completion ${trajectoryId} started (prompt ${prompt.length} chars)`);
      await this.emit({
        kind: "completion.started",
        summary: "Completion started",
        payload: {
          trajectoryId,
          model: this.backend.model,
          promptChars: prompt.length,
          maxDepth: options.maxDepth,
          tokenBudget: options.tokenBudget,
          toolBudget: options.toolBudget,
          timeoutSeconds: options.timeoutSeconds,
        },
      });

      response = await withTimeout(
        (signal) =>
          this.recursiveComplete(
            { trajectoryId, options, messages, events, extraTools, signal, toolCallsExecuted: 0 },
            0,
            null,
          ),
        options.timeoutSeconds * 1000,
        () => new TimeoutExceeded((Date.now() - startedAt) / 1000, options.timeoutSeconds),
        control.signal,
      );
    } catch (error) {
      failure = errorMessage(error);
      response = `Error: ${failure}`;
      logVerbose(this.verbose, `completion ${trajectoryId} failed: ${failure}`);

      events.push({
        trajectoryId,
        callId: randomUUID(),
        parentCallId: null,
        depth: 0,
        prompt,
        response: null,
        toolCalls: [],
        toolResults: [],
        inputTokens: 0,
        outputTokens: 0,
        durationMs: 0,
        error: failure,
        timestamp: new Date().toISOString(),
      });
      await this.emit({
        kind: "completion.failed",
        summary: "Completion failed",
        payload: { trajectoryId, error: failure },
      });
    }

    // A timed-out recursion may still be appending; aggregate a stable copy.
    const finalEvents = [...events];
    const result = aggregate({
      response,
      trajectoryId,
      events: finalEvents,
      durationMs: Date.now() - startedAt,
      includeTrajectory,
      failure,
    });

    await this.persistTrajectory(trajectoryId, finalEvents);

    logVerbose(
      this.verbose,
      `completion ${trajectoryId} finished: calls=${result.totalCalls} tokens=${result.totalTokens} cost=${formatCost(result.totalCostUsd)} duration=${result.durationMs}ms`,
    );
    await this.emit({
      kind: "completion.finished",
      summary: result.success ? "Completion finished" : "Completion finished with error",
      payload: {
        trajectoryId,
        success: result.success,
        totalCalls: result.totalCalls,
        totalTokens: result.totalTokens,
        totalToolCalls: result.totalToolCalls,
        totalCostUsd: result.totalCostUsd,
        durationMs: result.durationMs,
      },
    });

    return result;
  }

  /**
   * Streams a plain completion without tools. Rejects with
   * `CostBudgetExhausted` before contacting the backend when the estimated
   * input cost already reaches the budget, and with `TimeoutExceeded` once the
   * timeout passes.
   */
  async *stream(prompt: string, system?: string, options: StreamOptions = {}): AsyncGenerator<string, void, undefined> {
    const messages = buildInitialMessages(prompt, system);
    const estimatedInputTokens = estimateTokens(messages.map((message) => messageText(message)).join(""));

    const costBudget = options.costBudgetUsd ?? null;
    if (costBudget !== null) {
      const inputCost = estimateCost(this.backend.model, estimatedInputTokens, 0);
      if (inputCost !== null && inputCost >= costBudget) {
        throw new CostBudgetExhausted(inputCost, costBudget);
      }
    }

    const timeoutSeconds = options.timeoutSeconds ?? this.defaultOptions.timeoutSeconds;
    const startedAt = Date.now();
    const controller = new AbortController();
    const deadline: { error: TimeoutExceeded | null } = { error: null };
    const timer = setTimeout(() => {
      deadline.error = new TimeoutExceeded((Date.now() - startedAt) / 1000, timeoutSeconds);
      controller.abort(deadline.error);
    }, timeoutSeconds * 1000);

    logVerbose(this.verbose, `stream started (~${estimatedInputTokens} input tokens)`);

    let outputChars = 0;
    try {
      for await (const chunk of this.backend.stream(messages, { signal: controller.signal })) {
        if (deadline.error) {
          throw deadline.error;
        }
        outputChars += chunk.length;
        yield chunk;
      }
      if (deadline.error) {
        throw deadline.error;
      }
    } catch (error) {
      throw deadline.error ?? error;
    } finally {
      clearTimeout(timer);
    }

    const estimatedOutputTokens = Math.floor(outputChars / 4);
    logVerbose(
      this.verbose,
      `stream completed (~${estimatedOutputTokens} output tokens, cost ${formatCost(estimateCost(this.backend.model, estimatedInputTokens, estimatedOutputTokens))})`,
    );
  }

  private async recursiveComplete(state: RecursionState, depth: number, parentCallId: string | null): Promise<string> {
    const { options, events } = state;
    throwIfAborted(state.signal);

    if (depth >= options.maxDepth) {
      throw new MaxDepthExceeded(depth, options.maxDepth, "depth");
    }
    if (events.length >= options.maxSubcalls) {
      throw new MaxDepthExceeded(events.length, options.maxSubcalls, "subcalls");
    }
    const tokensUsed = totalTokens(events);
    if (tokensUsed >= options.tokenBudget) {
      throw new TokenBudgetExhausted(tokensUsed, options.tokenBudget);
    }
    if (options.costBudgetUsd !== null) {
      const costUsed = sumKnownCosts(events.map((event) => event.estimatedCostUsd));
      if (costUsed >= options.costBudgetUsd) {
        throw new CostBudgetExhausted(costUsed, options.costBudgetUsd);
      }
    }

    const tools = [...this.registry.getAll(), ...state.extraTools];
    const callId = randomUUID();
    const callStartedAt = Date.now();
    const response = await this.backend.complete(state.messages, tools, { signal: state.signal });
    const durationMs = Date.now() - callStartedAt;

    const event: TrajectoryEvent = {
      trajectoryId: state.trajectoryId,
      callId,
      parentCallId,
      depth,
      prompt: messageText(state.messages.at(-1)),
      response: response.content,
      toolCalls: response.toolCalls,
      toolResults: [],
      inputTokens: response.inputTokens,
      outputTokens: response.outputTokens,
      durationMs,
      estimatedCostUsd: estimateCost(this.backend.model, response.inputTokens, response.outputTokens),
      timestamp: new Date(callStartedAt).toISOString(),
    };
    events.push(event);

    logVerbose(
      this.verbose,
      `depth ${depth}: ${response.inputTokens}+${response.outputTokens} tokens, ${response.toolCalls.length} tool calls (${durationMs}ms)`,
    );
    await this.emit({
      kind: "backend.call.completed",
      summary: `Backend call at depth ${depth} completed`,
      payload: {
        trajectoryId: state.trajectoryId,
        callId,
        depth,
        inputTokens: response.inputTokens,
        outputTokens: response.outputTokens,
        toolCalls: response.toolCalls.map((call) => call.name),
        finishReason: response.finishReason,
        durationMs,
        responsePreview: previewText(response.content ?? "", 1000),
      },
    });

    if (response.toolCalls.length === 0) {
      return response.content ?? "";
    }

    const remaining = Math.max(0, options.toolBudget - state.toolCallsExecuted);
    const allowed = response.toolCalls.slice(0, remaining);
    const rejected = response.toolCalls.slice(remaining);
    state.toolCallsExecuted += allowed.length;

    throwIfAborted(state.signal);
    const executed = await this.dispatchTools(allowed, state);

    if (rejected.length > 0) {
      const exhausted = new ToolBudgetExhausted(state.toolCallsExecuted, options.toolBudget);
      logVerbose(this.verbose, `${exhausted.message}; skipping ${rejected.length} tool calls`);
      await this.emit({
        kind: "tool.budget_exceeded",
        summary: exhausted.message,
        payload: { trajectoryId: state.trajectoryId, callId, skipped: rejected.map((call) => call.name) },
      });
    }

    const toolResults: ToolResult[] = [
      ...executed,
      ...rejected.map((call) => ({ toolCallId: call.id, content: TOOL_BUDGET_EXCEEDED_MESSAGE, isError: true })),
    ];
    event.toolResults = toolResults;

    state.messages.push(createMessage("assistant", response.content, { toolCalls: response.toolCalls }));
    for (const [index, result] of toolResults.entries()) {
      state.messages.push(
        createMessage("tool", result.content, {
          toolCallId: result.toolCallId,
          name: response.toolCalls[index]?.name,
          isError: result.isError,
        }),
      );
    }

    return this.recursiveComplete(state, depth + 1, callId);
  }

  private async dispatchTools(calls: ToolCall[], state: RecursionState): Promise<ToolResult[]> {
    if (state.options.parallelTools && calls.length > 1) {
      return mapWithConcurrency(calls, state.options.maxParallel, async (call) => {
        try {
          return await this.executeTool(call, state);
        } catch (error) {
          return { toolCallId: call.id, content: `Error: ${errorMessage(error)}`, isError: true };
        }
      });
    }

    const results: ToolResult[] = [];
    for (const call of calls) {
      throwIfAborted(state.signal);
      results.push(await this.executeTool(call, state));
    }
    return results;
  }

  private async executeTool(call: ToolCall, state: RecursionState): Promise<ToolResult> {
    const tool = this.registry.get(call.name) ?? state.extraTools.find((candidate) => candidate.name === call.name);
    const startedAt = Date.now();

    let result: ToolResult;
    if (!tool) {
      const available = [...this.registry.listNames(), ...state.extraTools.map((candidate) => candidate.name)];
      result = { toolCallId: call.id, content: new ToolNotFoundError(call.name, available).message, isError: true };
    } else {
      try {
        const output = await tool.execute(call.arguments, { signal: state.signal });
        result = { toolCallId: call.id, content: serializeToolOutput(output), isError: false };
      } catch (error) {
        const failure = error instanceof ToolError ? error : new ToolExecutionError(call.name, errorMessage(error), call.arguments);
        result = { toolCallId: call.id, content: failure.message, isError: true };
      }
    }

    logVerbose(this.verbose, `tool ${call.name} ${result.isError ? "failed" : "ok"} (${Date.now() - startedAt}ms)`);
    await this.emit({
      kind: "tool.executed",
      summary: `Tool ${call.name} executed`,
      payload: {
        trajectoryId: state.trajectoryId,
        toolCallId: call.id,
        tool: call.name,
        isError: result.isError,
        durationMs: Date.now() - startedAt,
        outputPreview: previewText(result.content, 500),
      },
    });
    return result;
  }

  private async persistTrajectory(trajectoryId: string, events: TrajectoryEvent[]): Promise<void> {
    if (!this.trajectoryLogger) {
      return;
    }
    try {
      await this.trajectoryLogger.logTrajectory(trajectoryId, events);
    } catch (error) {
      process.stderr.write(`[rlm] failed to write trajectory ${trajectoryId}: ${errorMessage(error)}\n`);
    }
  }
}

function buildInitialMessages(prompt: string, system: string | undefined): Message[] {
  const messages: Message[] = [];
  if (system) {
    messages.push(createMessage("system", system));
  }
  messages.push(createMessage("user", prompt));
  return messages;
}

function totalTokens(events: readonly TrajectoryEvent[]): number {
  return events.reduce((sum, event) => sum + event.inputTokens + event.outputTokens, 0);
}

function throwIfAborted(signal: AbortSignal): void {
  if (signal.aborted) {
    throw abortReason(signal);
  }
}

function aggregate(input: {
  response: string;
  trajectoryId: string;
  events: TrajectoryEvent[];
  durationMs: number;
  includeTrajectory: boolean;
  failure: string | undefined;
}): RLMResult {
  const { events } = input;
  const totalInputTokens = events.reduce((sum, event) => sum + event.inputTokens, 0);
  const totalOutputTokens = events.reduce((sum, event) => sum + event.outputTokens, 0);

  return {
    response: input.response,
    trajectoryId: input.trajectoryId,
    totalCalls: events.length,
    totalTokens: totalInputTokens + totalOutputTokens,
    totalInputTokens,
    totalOutputTokens,
    totalToolCalls: events.reduce((sum, event) => sum + event.toolCalls.length, 0),
    totalCostUsd: sumCosts(events.map((event) => event.estimatedCostUsd)),
    durationMs: input.durationMs,
    events: input.includeTrajectory ? events : [],
    success: input.failure === undefined,
    ...(input.failure !== undefined ? { error: input.failure } : {}),
  };
}
