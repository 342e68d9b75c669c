import { describe, expect, it } from "vitest";

import { DEFAULT_AGENT_CONFIG, createAgentConfig } from "../src/agent/config.js";
import { checkIterationAllowed } from "../src/agent/guardrails.js";
import { AGENT_SYSTEM_PROMPT, buildIterationPrompt } from "../src/agent/prompts.js";
import { AgentRunner } from "../src/agent/runner.js";
import { createAgentState, createTerminalTools } from "../src/agent/terminal.js";
import { parseConfig } from "../src/config.js";
import { RLMOrchestrator, TOOL_BUDGET_EXCEEDED_MESSAGE } from "../src/orchestrator.js";
import { VmSandbox } from "../src/sandbox/vmSandbox.js";
import { objectParameters, type Tool } from "../src/tools/types.js";
import { ScriptedBackend, callTools, delay, reply, toolCall, type ScriptStep } from "./support/scriptedBackend.js";

const config = parseConfig({ subCalls: { enabled: false } });

const noopTool: Tool = {
  name: "noop",
  description: "Does nothing",
  parameters: objectParameters({}),
  execute: async () => "ok",
};

const setup = (steps: ScriptStep[], options: { sandbox?: VmSandbox } = {}) => {
  const backend = new ScriptedBackend(steps);
  const orchestrator = new RLMOrchestrator({ backend, config, tools: [noopTool], sandbox: options.sandbox });
  return { backend, orchestrator };
};

describe("createAgentConfig", () => {
  it("uses the defaults", () => {
    expect(createAgentConfig()).toEqual(DEFAULT_AGENT_CONFIG);
  });

  it("clamps to the absolute limits", () => {
    expect(createAgentConfig({ maxIterations: 100, costLimit: 50, timeoutSeconds: 1000, maxDepth: 9 })).toMatchObject({
      maxIterations: 50,
      costLimit: 10,
      timeoutSeconds: 600,
      maxDepth: 5,
    });
  });
});

describe("checkIterationAllowed", () => {
  const agentConfig = createAgentConfig({ maxIterations: 3, costLimit: 1, tokenBudget: 100 });

  it("allows iterations under every limit", () => {
    expect(checkIterationAllowed(2, agentConfig, 0.99, 99)).toEqual({ allowed: true, reason: null });
  });

  it("checks iterations, then cost, then tokens", () => {
    expect(checkIterationAllowed(3, agentConfig, 5, 500)).toEqual({
      allowed: false,
      reason: "Iteration limit reached (3/3)",
    });
    expect(checkIterationAllowed(0, agentConfig, 1, 500)).toEqual({
      allowed: false,
      reason: "Cost limit reached ($1.0000/$1.0000)",
    });
    expect(checkIterationAllowed(0, agentConfig, 0, 100)).toEqual({
      allowed: false,
      reason: "Token budget exhausted (100/100)",
    });
  });
});

describe("buildIterationPrompt", () => {
  it("shows the task, progress and remaining budget", () => {
    expect(
      buildIterationPrompt({ task: "Sum the list", iteration: 0, maxIterations: 5, previousActions: [], remainingBudget: 900 }),
    ).toBe("Task: Sum the list\n\nIteration: 1/5\nRemaining token budget: 900");
  });

  it("lists only the last five actions and warns on the final iteration", () => {
    const actions = ["a1", "a2", "a3", "a4", "a5", "a6"];

    expect(buildIterationPrompt({ task: "T", iteration: 2, maxIterations: 3, previousActions: actions })).toBe(
      [
        "Task: T",
        "\nIteration: 3/3",
        "\nPrevious actions:",
        "  1. a2",
        "  2. a3",
        "  3. a4",
        "  4. a5",
        "  5. a6",
        "\nTHIS IS YOUR FINAL ITERATION. You MUST call FINAL or FINAL_VAR now with your best answer.",
      ].join("\n"),
    );
  });
});

describe("terminal tools", () => {
  it("FINAL records the answer", async () => {
    const state = createAgentState();
    const [final] = createTerminalTools(state);

    expect(await final?.execute({ answer: "Paris" })).toBe("Agent terminated with answer: Paris");
    expect(state).toEqual({ isTerminal: true, terminalValue: "Paris", terminalKind: "final" });
  });

  it("FINAL_VAR reads the sandbox context", async () => {
    const sandbox = new VmSandbox();
    sandbox.setContext("total", { sum: 6 });
    const state = createAgentState();
    const [, finalVar] = createTerminalTools(state, sandbox);

    expect(await finalVar?.execute({ variable_name: "total" })).toBe(`Agent terminated with variable 'total' = {"sum":6}`);
    expect(state.terminalValue).toBe('{"sum":6}');
    expect(state.terminalKind).toBe("final_var");
  });

  it("FINAL_VAR leaves the state alone for a missing variable or sandbox", async () => {
    const sandbox = new VmSandbox();
    sandbox.setContext("total", 6);
    const state = createAgentState();

    const [, withSandbox] = createTerminalTools(state, sandbox);
    const [, withoutSandbox] = createTerminalTools(state);

    expect(await withSandbox?.execute({ variable_name: "answer" })).toBe(
      "Error: Variable 'answer' not found in sandbox context. Available: total",
    );
    expect(await withoutSandbox?.execute({ variable_name: "answer" })).toBe(
      "Error: No sandbox is configured; cannot read variable 'answer'.",
    );
    expect(state.isTerminal).toBe(false);
  });
});

describe("AgentRunner", () => {
  it("finishes when the model calls FINAL", async () => {
    const { backend, orchestrator } = setup([callTools([toolCall("f1", "FINAL", { answer: "Paris" })]), reply("done")]);
    const runner = new AgentRunner(orchestrator);

    const result = await runner.run("What is the capital of France?");

    expect(result).toMatchObject({
      answer: "Paris",
      answerSource: "final",
      iterations: 1,
      totalTokens: 30,
      forcedTermination: false,
      success: true,
    });
    expect(result.trajectory).toHaveLength(2);
    expect(backend.calls[0]?.toolNames).toEqual(["noop", "FINAL", "FINAL_VAR"]);
    expect(backend.calls[0]?.messages.map((message) => message.content)).toEqual([
      AGENT_SYSTEM_PROMPT,
      "Task: What is the capital of France?\n\nIteration: 1/10\nRemaining token budget: 50000",
    ]);
    expect(orchestrator.registry.listNames()).toEqual(["noop"]);
  });

  it("finishes with a sandbox variable through FINAL_VAR", async () => {
    const sandbox = new VmSandbox();
    const { orchestrator } = setup(
      [
        callTools([toolCall("c1", "execute_code", { code: "context.answer = 6 * 7" })]),
        callTools([toolCall("f1", "FINAL_VAR", { variable_name: "answer" })]),
        reply("done"),
      ],
      { sandbox },
    );

    const result = await new AgentRunner(orchestrator).run("Compute six times seven");

    expect(result.answer).toBe("42");
    expect(result.answerSource).toBe("final_var");
    expect(result.success).toBe(true);
  });

  it("accepts a FINAL directive written as text", async () => {
    const { orchestrator } = setup([reply("FINAL(The answer is 4)")]);

    const result = await new AgentRunner(orchestrator).run("What is 2+2?");

    expect(result.answer).toBe("The answer is 4");
    expect(result.answerSource).toBe("final");
  });

  it("forces termination at the iteration limit", async () => {
    const { backend, orchestrator } = setup([reply("thinking 1"), reply("thinking 2")]);
    const runner = new AgentRunner(orchestrator, { config: { maxIterations: 2 } });

    const result = await runner.run("Ponder");

    expect(result).toMatchObject({
      answer: "[Iter 2] Response: thinking 2",
      answerSource: "forced",
      iterations: 2,
      forcedTermination: true,
      success: false,
    });
    expect(result.iterationSummaries.map((summary) => summary.responsePreview)).toEqual(["thinking 1", "thinking 2"]);
    expect(backend.calls[1]?.messages[1]?.content).toBe(
      buildIterationPrompt({
        task: "Ponder",
        iteration: 1,
        maxIterations: 2,
        previousActions: ["[Iter 1] Response: thinking 1"],
        remainingBudget: 49985,
      }),
    );
  });

  it("stops when the token budget is spent", async () => {
    const { orchestrator } = setup([reply("a", 15, 10), reply("unreachable")]);

    const result = await new AgentRunner(orchestrator, { config: { tokenBudget: 20 } }).run("Go");

    expect(result.iterations).toBe(1);
    expect(result.answerSource).toBe("forced");
    expect(result.answer).toBe("[Iter 1] Response: a");
  });

  it("shares one tool budget across iterations", async () => {
    const { backend, orchestrator } = setup([
      callTools([toolCall("n1", "noop")]),
      reply("step one"),
      callTools([toolCall("f1", "FINAL", { answer: "too late" })]),
      reply("gave up"),
    ]);

    const result = await new AgentRunner(orchestrator, { config: { maxIterations: 2, toolBudget: 1 } }).run("Go");

    expect(backend.calls[3]?.messages.at(-1)?.content).toBe(TOOL_BUDGET_EXCEEDED_MESSAGE);
    expect(result.answerSource).toBe("forced");
    expect(result.answer).toBe("[Iter 2] Tools: FINAL → gave up");
  });

  it("stops after cancel() between iterations", async () => {
    let runner: AgentRunner | undefined;
    const { orchestrator } = setup([
      () => {
        runner?.cancel();
        return reply("working");
      },
    ]);
    runner = new AgentRunner(orchestrator);

    const result = await runner.run("Go");

    expect(result).toMatchObject({ answer: "Agent was cancelled.", answerSource: "error", iterations: 1, success: false });
    expect(runner.status).toMatchObject({ runId: result.runId, iteration: 1, totalTokens: 15, cancelled: true });
  });

  it("times out the whole run", async () => {
    const { orchestrator } = setup([
      async () => {
        await delay(150);
        return reply("late");
      },
    ]);

    const result = await new AgentRunner(orchestrator, { config: { timeoutSeconds: 0.05 } }).run("Go");

    expect(result.answer).toBe("Agent timed out.");
    expect(result.answerSource).toBe("error");
    expect(result.forcedTermination).toBe(true);
  });

  it("cancels the in-flight completion when the run times out", async () => {
    const { backend, orchestrator } = setup([
      async () => {
        await delay(150);
        return reply("still thinking");
      },
      async () => {
        await delay(100);
        return callTools([toolCall("f1", "FINAL", { answer: "late" })]);
      },
      reply("after the deadline"),
    ]);

    const result = await new AgentRunner(orchestrator, { config: { timeoutSeconds: 0.2 } }).run("Go");
    const callsAtReturn = backend.calls.length;
    await delay(200);

    expect(result.answer).toBe("Agent timed out.");
    expect(callsAtReturn).toBe(2);
    expect(backend.calls).toHaveLength(2);
    expect(orchestrator.registry.listNames()).toEqual(["noop"]);
  });

  it("names the tools in action summaries without a trajectory", async () => {
    const { backend, orchestrator } = setup([
      callTools([toolCall("n1", "noop")]),
      reply("checked"),
      reply("FINAL(done)"),
    ]);

    const result = await new AgentRunner(orchestrator, { config: { includeTrajectory: false } }).run("Go");

    expect(result.answer).toBe("done");
    expect(result.trajectory).toEqual([]);
    expect(backend.calls[2]?.messages[1]?.content).toBe(
      buildIterationPrompt({
        task: "Go",
        iteration: 1,
        maxIterations: 10,
        previousActions: ["[Iter 1] Tools: noop → checked"],
        remainingBudget: 49970,
      }),
    );
  });

  it("reports status after a natural finish", async () => {
    const { orchestrator } = setup([callTools([toolCall("f1", "FINAL", { answer: "ok" })]), reply("done")]);
    const runner = new AgentRunner(orchestrator);

    const result = await runner.run("Go");

    expect(runner.status).toEqual({
      runId: result.runId,
      iteration: 1,
      totalTokens: 30,
      totalCost: 0,
      isTerminal: true,
      cancelled: false,
    });
    expect(result.runId).toHaveLength(8);
  });
});
