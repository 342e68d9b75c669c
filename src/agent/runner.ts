import { randomUUID } from "node:crypto";

import { withTimeout } from "../concurrency.js";
import { TimeoutExceeded } from "../errors.js";
import { createEventEmitter, logVerbose } from "../logging/events.js";
import { type EventSink, type RuntimeEventEmitter } from "../logging/traceTypes.js";
import { type RLMOrchestrator } from "../orchestrator.js";
import { extractFinalDirective } from "../parsing.js";
import { type RLMResult, type TrajectoryEvent } from "../types.js";
import { createAgentConfig, type AgentConfig } from "./config.js";
import { checkIterationAllowed } from "./guardrails.js";
import { AGENT_SYSTEM_PROMPT, buildIterationPrompt } from "./prompts.js";
import { createAgentState, createTerminalTools, markTerminal, resolveFinalVar, type AgentState } from "./terminal.js";

export type AnswerSource = "final" | "final_var" | "forced" | "error";

export interface IterationSummary {
  iteration: number;
  tokens: number;
  cost: number | null;
  toolCalls: number;
  responsePreview: string;
}

export interface AgentResult {
  answer: string;
  answerSource: AnswerSource;
  iterations: number;
  totalTokens: number;
  totalCost: number;
  durationMs: number;
  forcedTermination: boolean;
  runId: string;
  trajectory: TrajectoryEvent[];
  iterationSummaries: IterationSummary[];
  /** True only when the agent ended itself through FINAL or FINAL_VAR. */
  success: boolean;
}

export interface AgentStatus {
  runId: string | null;
  iteration: number;
  totalTokens: number;
  totalCost: number;
  isTerminal: boolean;
  cancelled: boolean;
}

export interface AgentRunnerOptions {
  config?: Partial<AgentConfig>;
  eventSink?: EventSink;
  verbose?: boolean;
}

/**
 * Loops one orchestrator completion per iteration until the model calls
 * FINAL or FINAL_VAR, a guardrail trips, the run times out, or `cancel()` is
 * called. Cancellation is observed between iterations.
 */
export class AgentRunner {
  readonly config: AgentConfig;
  private readonly emit: RuntimeEventEmitter;
  private readonly verbose: boolean;

  private runId: string | null = null;
  private cancelled = false;
  private state: AgentState | null = null;
  private iteration = 0;
  private totalTokens = 0;
  private totalCost = 0;

  constructor(
    private readonly orchestrator: RLMOrchestrator,
    options: AgentRunnerOptions = {},
  ) {
    this.config = createAgentConfig(options.config);
    this.verbose = options.verbose ?? orchestrator.config.verbose;
    this.emit = createEventEmitter(options.eventSink, this.verbose);
  }

  get status(): AgentStatus {
    return {
      runId: this.runId,
      iteration: this.iteration,
      totalTokens: this.totalTokens,
      totalCost: this.totalCost,
      isTerminal: this.state?.isTerminal ?? false,
      cancelled: this.cancelled,
    };
  }

  cancel(): void {
    this.cancelled = true;
  }

  async run(task: string): Promise<AgentResult> {
    const runId = randomUUID().slice(0, 8);
    const startedAt = Date.now();
    const timeoutMs = this.config.timeoutSeconds * 1000;
    this.runId = runId;
    this.cancelled = false;
    this.iteration = 0;
    this.totalTokens = 0;
    this.totalCost = 0;

    const state = createAgentState();
    this.state = state;
    const sandbox = this.orchestrator.sandbox;
    const terminalTools = createTerminalTools(state, sandbox);
    for (const tool of terminalTools) {
      this.orchestrator.registry.register(tool);
    }

    const previousActions: string[] = [];
    const trajectory: TrajectoryEvent[] = [];
    const iterationSummaries: IterationSummary[] = [];

    const finish = async (answer: string, answerSource: AnswerSource, forcedTermination: boolean): Promise<AgentResult> => {
      const result: AgentResult = {
        answer,
        answerSource,
        iterations: this.iteration,
        totalTokens: this.totalTokens,
        totalCost: this.totalCost,
        durationMs: Date.now() - startedAt,
        forcedTermination,
        runId,
        trajectory,
        iterationSummaries,
        success: !forcedTermination && (answerSource === "final" || answerSource === "final_var"),
      };
      logVerbose(this.verbose, `agent ${runId} finished (${answerSource}) after ${result.iterations} iterations`);
      await this.emit({
        kind: "agent.finished",
        summary: `Agent finished (${answerSource})`,
        payload: {
          runId,
          answerSource,
          iterations: result.iterations,
          totalTokens: result.totalTokens,
          totalCost: result.totalCost,
          durationMs: result.durationMs,
          success: result.success,
        },
      });
      return result;
    };

    try {
      while (this.iteration < this.config.maxIterations) {
        if (this.cancelled) {
          return await finish("Agent was cancelled.", "error", true);
        }

        const elapsedMs = Date.now() - startedAt;
        if (elapsedMs >= timeoutMs) {
          return await finish("Agent timed out.", "error", true);
        }

        const check = checkIterationAllowed(this.iteration, this.config, this.totalCost, this.totalTokens);
        if (!check.allowed) {
          logVerbose(this.verbose, `agent ${runId}: ${check.reason}`);
          break;
        }

        const remaining = this.config.tokenBudget - this.totalTokens;
        const prompt = buildIterationPrompt({
          task,
          iteration: this.iteration,
          maxIterations: this.config.maxIterations,
          previousActions,
          remainingBudget: remaining,
        });

        await this.emit({
          kind: "agent.iteration.started",
          summary: `Agent iteration ${this.iteration + 1} started`,
          payload: { runId, iteration: this.iteration, tokensUsed: this.totalTokens, cost: this.totalCost },
        });

        const toolCallsSoFar = iterationSummaries.reduce((sum, summary) => sum + summary.toolCalls, 0);
        let result: RLMResult;
        try {
          result = await withTimeout(
            (signal) =>
              this.orchestrator.completion(
                prompt,
                AGENT_SYSTEM_PROMPT,
                {
                  maxDepth: this.config.maxDepth,
                  tokenBudget: Math.min(remaining, Math.floor(this.config.tokenBudget / this.config.maxIterations) * 2),
                  toolBudget: Math.max(0, this.config.toolBudget - toolCallsSoFar),
                  timeoutSeconds: (timeoutMs - elapsedMs) / 1000,
                  // summarizeIteration reads tool names from the events.
                  includeTrajectory: true,
                },
                { signal },
              ),
            timeoutMs - elapsedMs,
            () => new TimeoutExceeded((Date.now() - startedAt) / 1000, this.config.timeoutSeconds),
          );
        } catch (error) {
          if (error instanceof TimeoutExceeded) {
            return await finish("Agent timed out.", "error", true);
          }
          throw error;
        }

        this.totalTokens += result.totalTokens;
        this.totalCost += result.totalCostUsd ?? 0;
        if (this.config.includeTrajectory) {
          trajectory.push(...result.events);
        }
        iterationSummaries.push({
          iteration: this.iteration,
          tokens: result.totalTokens,
          cost: result.totalCostUsd,
          toolCalls: result.totalToolCalls,
          responsePreview: result.response.slice(0, 200),
        });
        previousActions.push(summarizeIteration(this.iteration, result));
        this.iteration += 1;

        if (!state.isTerminal && result.success) {
          this.applyTextDirective(state, result.response);
        }
        if (state.isTerminal && state.terminalKind !== null) {
          return await finish(state.terminalValue ?? "", state.terminalKind, false);
        }
      }

      logVerbose(this.verbose, `agent ${runId} forced termination after ${this.iteration} iterations`);
      return await finish(previousActions.at(-1) ?? "No answer produced.", "forced", true);
    } finally {
      for (const tool of terminalTools) {
        this.orchestrator.registry.unregister(tool.name);
      }
    }
  }

  /** A model that writes `FINAL(...)` as text instead of calling the tool still ends the run. */
  private applyTextDirective(state: AgentState, response: string): void {
    const directive = extractFinalDirective(response);
    if (!directive) {
      return;
    }
    if (directive.kind === "final") {
      markTerminal(state, "final", directive.value);
      return;
    }
    const outcome = resolveFinalVar(state, this.orchestrator.sandbox, directive.value);
    if (!state.isTerminal) {
      logVerbose(this.verbose, outcome);
    }
  }
}

function summarizeIteration(iteration: number, result: RLMResult): string {
  const prefix = `[Iter ${iteration + 1}] `;
  if (result.totalToolCalls > 0) {
    const toolNames = result.events.flatMap((event) => event.toolCalls.map((call) => call.name));
    const tools = `Tools: ${toolNames.slice(0, 5).join(", ")}`;
    return result.response ? `${prefix}${tools} → ${result.response.slice(0, 80)}` : `${prefix}${tools}`;
  }
  return result.response ? `${prefix}Response: ${result.response.slice(0, 100)}` : `${prefix}No response`;
}
