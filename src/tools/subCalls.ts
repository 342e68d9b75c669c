import { z } from "zod";

import { mapWithConcurrency } from "../concurrency.js";
import { type SubCallSettings } from "../config.js";
import { SubCallBudgetExhausted, SubCallCostExceeded, ToolValidationError, errorMessage } from "../errors.js";
import { type RuntimeEventEmitter } from "../logging/traceTypes.js";
import { describeZodError } from "../options.js";
import { type CompletionControl, type CompletionOptions, type RLMResult } from "../types.js";
import { objectParameters, type Tool } from "./types.js";

export const SUB_COMPLETE_TOOL = "sub_complete";
export const BATCH_COMPLETE_TOOL = "batch_complete";

const DEFAULT_BATCH_PARALLEL = 3;

export type SubCallLimits = SubCallSettings;

export const DEFAULT_SUB_CALL_LIMITS: SubCallLimits = {
  enabled: true,
  maxPerTurn: 5,
  budgetInheritance: 0.5,
  maxCostPerSession: 1.0,
};

/** Anything that can run a full completion; the orchestrator in practice. */
export interface SubCompletionRunner {
  completion(
    prompt: string,
    system?: string,
    options?: Partial<CompletionOptions>,
    control?: CompletionControl,
  ): Promise<RLMResult>;
}

/**
 * Per-completion sub-call bookkeeping. A slot is reserved before a sub-call
 * starts, so concurrent batch entries cannot overshoot `maxPerTurn`.
 */
export class SubCallContext {
  callsThisTurn = 0;
  sessionCost = 0;

  constructor(readonly limits: SubCallLimits = DEFAULT_SUB_CALL_LIMITS) {}

  checkBudget(): void {
    if (this.callsThisTurn >= this.limits.maxPerTurn) {
      throw new SubCallBudgetExhausted(this.callsThisTurn, this.limits.maxPerTurn);
    }
    if (this.sessionCost >= this.limits.maxCostPerSession) {
      throw new SubCallCostExceeded(this.sessionCost, this.limits.maxCostPerSession);
    }
  }

  reserve(): void {
    this.checkBudget();
    this.callsThisTurn += 1;
  }

  /** Unknown costs count as zero toward the session cap. */
  recordCost(cost: number | null): void {
    this.sessionCost += cost ?? 0;
  }

  remainingSessionCost(): number {
    return Math.max(0, this.limits.maxCostPerSession - this.sessionCost);
  }
}

/**
 * Token budget for a sub-call: `floor(parentRemaining * fraction)`, further
 * capped by an explicit request.
 */
export function calculateInheritedBudget(
  requested: number | null | undefined,
  parentRemaining: number,
  inheritanceFraction: number,
): number {
  const inherited = Math.max(0, Math.floor(parentRemaining * inheritanceFraction));
  return requested === null || requested === undefined ? inherited : Math.min(requested, inherited);
}

/** Hard ceilings every sub-call runs under, whatever the caller asked for. */
export function constrainSubCallOptions(
  parent: CompletionOptions,
  tokenBudget: number,
  costBudgetUsd: number | null,
): Partial<CompletionOptions> {
  return {
    maxDepth: Math.max(0, Math.min(2, parent.maxDepth - 1)),
    maxSubcalls: Math.min(4, parent.maxSubcalls),
    tokenBudget,
    toolBudget: Math.min(10, parent.toolBudget),
    timeoutSeconds: Math.min(60, parent.timeoutSeconds),
    costBudgetUsd,
    parallelTools: parent.parallelTools,
    maxParallel: parent.maxParallel,
    includeTrajectory: false,
  };
}

export interface SubCallToolOptions {
  runner: SubCompletionRunner;
  context: SubCallContext;
  parentOptions: CompletionOptions;
  /** Live reading of the parent's token usage so far. */
  parentTokensUsed: () => number;
  emit?: RuntimeEventEmitter;
}

const subCompleteArgsSchema = z.object({
  query: z.string().min(1),
  max_tokens: z.number().int().nonnegative().nullish(),
  system: z.string().nullish(),
});

const batchCompleteArgsSchema = z.object({
  queries: z.array(
    z.object({
      query: z.string().min(1),
      system: z.string().nullish(),
    }),
  ),
  max_parallel: z.number().int().min(1).nullish(),
  total_budget: z.number().int().nonnegative().nullish(),
});

export interface SubCompleteOutput {
  response: string;
  trajectory_id: string;
  tokens_used: number;
  cost: number | null;
  calls: number;
  success: boolean;
}

export type BatchEntry =
  | { query: string; response: string; tokens_used: number; cost: number | null }
  | { query: string; response: null; error: string; tokens_used: number; cost: number | null };

export function createSubCallTools(options: SubCallToolOptions): Tool[] {
  const { runner, context, parentOptions, parentTokensUsed } = options;
  const emit: RuntimeEventEmitter = options.emit ?? (async () => {});

  const parentRemaining = (): number => parentOptions.tokenBudget - parentTokensUsed();
  const subCostBudget = (): number | null =>
    parentOptions.costBudgetUsd === null ? null : context.remainingSessionCost();

  const reserveOrReject = async (toolName: string, query: string): Promise<void> => {
    try {
      context.reserve();
    } catch (error) {
      await emit({
        kind: "subcall.rejected",
        summary: `${toolName} rejected`,
        payload: { query: query.slice(0, 500), reason: errorMessage(error) },
      });
      throw error;
    }
  };

  const runOne = async (
    toolName: string,
    query: string,
    system: string | undefined,
    tokenBudget: number,
    signal: AbortSignal | undefined,
  ): Promise<RLMResult> => {
    await emit({
      kind: "subcall.started",
      summary: `${toolName} started`,
      payload: { query: query.slice(0, 500), tokenBudget, callsThisTurn: context.callsThisTurn },
    });

    const result = await runner.completion(
      query,
      system,
      constrainSubCallOptions(parentOptions, tokenBudget, subCostBudget()),
      { signal },
    );
    context.recordCost(result.totalCostUsd);

    await emit({
      kind: "subcall.completed",
      summary: `${toolName} completed`,
      payload: {
        trajectoryId: result.trajectoryId,
        success: result.success,
        tokensUsed: result.totalTokens,
        costUsd: result.totalCostUsd,
        sessionCostUsd: context.sessionCost,
      },
    });
    return result;
  };

  const subComplete: Tool = {
    name: SUB_COMPLETE_TOOL,
    description:
      "Delegate a focused sub-problem to a fresh completion with its own context window and budget. " +
      "Use this when the current task can be broken into independent sub-tasks.",
    parameters: objectParameters(
      {
        query: { type: "string", description: "The sub-problem to solve" },
        max_tokens: { type: "integer", description: "Optional token budget for the sub-call" },
        system: { type: "string", description: "Optional system prompt for the sub-call" },
      },
      ["query"],
    ),
    execute: async (args, executionContext): Promise<SubCompleteOutput> => {
      const parsed = subCompleteArgsSchema.safeParse(args);
      if (!parsed.success) {
        throw new ToolValidationError(SUB_COMPLETE_TOOL, describeZodError(parsed.error), args);
      }
      const { query, max_tokens, system } = parsed.data;

      await reserveOrReject(SUB_COMPLETE_TOOL, query);
      const tokenBudget = calculateInheritedBudget(max_tokens, parentRemaining(), context.limits.budgetInheritance);
      const result = await runOne(SUB_COMPLETE_TOOL, query, system ?? undefined, tokenBudget, executionContext?.signal);

      return {
        response: result.response,
        trajectory_id: result.trajectoryId,
        tokens_used: result.totalTokens,
        cost: result.totalCostUsd,
        calls: result.totalCalls,
        success: result.success,
      };
    },
  };

  const batchComplete: Tool = {
    name: BATCH_COMPLETE_TOOL,
    description:
      "Run several sub-problems as parallel sub-completions. Each query gets an equal share of the " +
      "total budget. Use for independent sub-tasks that can run concurrently.",
    parameters: objectParameters(
      {
        queries: {
          type: "array",
          description: "Sub-problems to solve in parallel",
          items: {
            type: "object",
            properties: {
              query: { type: "string" },
              system: { type: "string" },
            },
            required: ["query"],
          },
        },
        max_parallel: { type: "integer", description: "Maximum concurrent sub-calls (default: 3)" },
        total_budget: { type: "integer", description: "Total token budget split across all queries" },
      },
      ["queries"],
    ),
    execute: async (args, executionContext): Promise<{ results: BatchEntry[] }> => {
      const parsed = batchCompleteArgsSchema.safeParse(args);
      if (!parsed.success) {
        throw new ToolValidationError(BATCH_COMPLETE_TOOL, describeZodError(parsed.error), args);
      }
      const { queries, max_parallel, total_budget } = parsed.data;
      if (queries.length === 0) {
        return { results: [] };
      }

      const totalBudget = calculateInheritedBudget(total_budget, parentRemaining(), context.limits.budgetInheritance);
      const perQueryBudget = Math.floor(totalBudget / queries.length);

      const results = await mapWithConcurrency(
        queries,
        max_parallel ?? DEFAULT_BATCH_PARALLEL,
        async ({ query, system }): Promise<BatchEntry> => {
          try {
            await reserveOrReject(BATCH_COMPLETE_TOOL, query);
            const result = await runOne(
              BATCH_COMPLETE_TOOL,
              query,
              system ?? undefined,
              perQueryBudget,
              executionContext?.signal,
            );
            if (!result.success) {
              return {
                query,
                response: null,
                error: result.error ?? result.response,
                tokens_used: result.totalTokens,
                cost: result.totalCostUsd,
              };
            }
            return { query, response: result.response, tokens_used: result.totalTokens, cost: result.totalCostUsd };
          } catch (error) {
            return { query, response: null, error: errorMessage(error), tokens_used: 0, cost: 0 };
          }
        },
      );

      return { results };
    },
  };

  return [subComplete, batchComplete];
}
