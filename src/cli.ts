#!/usr/bin/env node
import dotenv from "dotenv";

import { AgentRunner } from "./agent/runner.js";
import { AiSdkBackend } from "./backends/aiSdkBackend.js";
import { loadConfig, type RuntimeConfig } from "./config.js";
import { TrajectoryLogger } from "./logging/trajectoryLogger.js";
import { RLMOrchestrator } from "./orchestrator.js";
import { VmSandbox } from "./sandbox/vmSandbox.js";
import { type CompletionOptions } from "./types.js";

dotenv.config();

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  const prompt = args.get("prompt") ?? process.env.RLM_PROMPT;
  if (!prompt || prompt === "true") {
    throw new Error("A prompt is required: pass --prompt <text> or set RLM_PROMPT");
  }
  if (!process.env.AI_GATEWAY_API_KEY) {
    throw new Error("AI_GATEWAY_API_KEY is required in environment (for example in .env)");
  }

  const config = applyFlags(await loadConfig({ configPath: args.get("config") }), args);
  const system = args.get("system");
  const overrides = completionOverrides(args);

  const orchestrator = new RLMOrchestrator({
    backend: new AiSdkBackend({ model: config.model, temperature: config.temperature, verbose: config.verbose }),
    sandbox: new VmSandbox({ timeoutSeconds: config.sandboxTimeoutSeconds }),
    config,
    trajectoryLogger: args.has("trajectory")
      ? new TrajectoryLogger({ logDir: config.logDir, verbose: config.verbose })
      : undefined,
  });

  if (args.has("stream")) {
    for await (const chunk of orchestrator.stream(prompt, system, { timeoutSeconds: overrides.timeoutSeconds })) {
      process.stdout.write(chunk);
    }
    process.stdout.write("\n");
    return;
  }

  if (args.has("agent")) {
    const runner = new AgentRunner(orchestrator, {
      config: {
        maxDepth: overrides.maxDepth,
        tokenBudget: overrides.tokenBudget,
        toolBudget: overrides.toolBudget,
        timeoutSeconds: overrides.timeoutSeconds,
        includeTrajectory: overrides.includeTrajectory,
      },
    });
    const result = await runner.run(prompt);
    const output = {
      answer: result.answer,
      answerSource: result.answerSource,
      iterations: result.iterations,
      totalTokens: result.totalTokens,
      totalCost: result.totalCost,
      durationMs: result.durationMs,
      forcedTermination: result.forcedTermination,
      runId: result.runId,
      success: result.success,
    };
    process.stdout.write(`${JSON.stringify(output, null, 2)}\n`);
    if (result.answerSource === "error") {
      process.exitCode = 1;
    }
    return;
  }

  const result = await orchestrator.completion(prompt, system, overrides);
  const output = {
    response: result.response,
    trajectoryId: result.trajectoryId,
    totalCalls: result.totalCalls,
    totalTokens: result.totalTokens,
    totalToolCalls: result.totalToolCalls,
    totalCostUsd: result.totalCostUsd,
    durationMs: result.durationMs,
    success: result.success,
    error: result.error,
    events: overrides.includeTrajectory ? result.events : undefined,
  };
  process.stdout.write(`${JSON.stringify(output, null, 2)}\n`);
  if (!result.success) {
    process.exitCode = 1;
  }
}

function applyFlags(config: RuntimeConfig, args: Map<string, string>): RuntimeConfig {
  return {
    ...config,
    model: args.get("model") ?? config.model,
    verbose: args.has("verbose") || config.verbose,
  };
}

function completionOverrides(args: Map<string, string>): Partial<CompletionOptions> {
  return {
    maxDepth: parseIntSafe(args.get("max-depth")) ?? undefined,
    tokenBudget: parseIntSafe(args.get("token-budget")) ?? undefined,
    toolBudget: parseIntSafe(args.get("tool-budget")) ?? undefined,
    timeoutSeconds: parseIntSafe(args.get("timeout")) ?? undefined,
    parallelTools: args.has("parallel") ? true : undefined,
    includeTrajectory: args.has("trajectory") ? true : undefined,
  };
}

function parseArgs(argv: string[]): Map<string, string> {
  const parsed = new Map<string, string>();

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (!arg || !arg.startsWith("--")) {
      continue;
    }

    const key = arg.slice(2);
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) {
      parsed.set(key, "true");
      continue;
    }

    parsed.set(key, next);
    i += 1;
  }

  return parsed;
}

function parseIntSafe(value: string | undefined): number | null {
  if (!value) {
    return null;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : null;
}

main().catch((error) => {
  const message = error instanceof Error ? error.stack ?? error.message : String(error);
  process.stderr.write(`${message}\n`);
  process.exitCode = 1;
});
