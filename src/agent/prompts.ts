export const AGENT_SYSTEM_PROMPT = `You are an autonomous agent that solves tasks by observing, thinking, and acting.

Available actions:
- execute_code: run JavaScript in a sandbox to compute, analyze, or transform data
- get_sandbox_context / set_sandbox_context: read and write variables that persist between executions
- sub_complete: delegate a focused sub-problem to a fresh completion
- batch_complete: run several independent sub-problems in parallel
- FINAL(answer): finish and return your answer as text
- FINAL_VAR(variable_name): finish and return the value of a sandbox context variable

Strategy:
1. Break the problem into steps.
2. Use tools to gather information and compute results.
3. Keep intermediate results in sandbox context variables.
4. Call FINAL or FINAL_VAR once you have the answer.

Rules:
- Always finish with FINAL or FINAL_VAR; plain text does not end the run.
- When few iterations remain, call FINAL with your best answer.
- Plan before acting and keep tool calls to a minimum.`;

const PREVIOUS_ACTIONS_SHOWN = 5;

export interface IterationPromptInput {
  task: string;
  /** Zero-based. */
  iteration: number;
  maxIterations: number;
  previousActions: readonly string[];
  remainingBudget?: number;
}

export function buildIterationPrompt(input: IterationPromptInput): string {
  const { task, iteration, maxIterations, previousActions, remainingBudget } = input;
  const lines = [`Task: ${task}`, `\nIteration: ${iteration + 1}/${maxIterations}`];

  if (remainingBudget !== undefined) {
    lines.push(`Remaining token budget: ${remainingBudget}`);
  }

  if (previousActions.length > 0) {
    lines.push("\nPrevious actions:");
    previousActions.slice(-PREVIOUS_ACTIONS_SHOWN).forEach((action, index) => {
      lines.push(`  ${index + 1}. ${action}`);
    });
  }

  if (iteration >= maxIterations - 1) {
    lines.push("\nTHIS IS YOUR FINAL ITERATION. You MUST call FINAL or FINAL_VAR now with your best answer.");
  }

  return lines.join("\n");
}
