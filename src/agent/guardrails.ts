import { type AgentConfig } from "./config.js";

export type IterationCheck = { allowed: true; reason: null } | { allowed: false; reason: string };

/** Checked before every iteration, in order: iterations, cost, tokens. */
export function checkIterationAllowed(
  iteration: number,
  config: AgentConfig,
  totalCost: number,
  totalTokens: number,
): IterationCheck {
  if (iteration >= config.maxIterations) {
    return { allowed: false, reason: `Iteration limit reached (${iteration}/${config.maxIterations})` };
  }
  if (totalCost >= config.costLimit) {
    return {
      allowed: false,
      reason: `Cost limit reached ($${totalCost.toFixed(4)}/$${config.costLimit.toFixed(4)})`,
    };
  }
  if (totalTokens >= config.tokenBudget) {
    return { allowed: false, reason: `Token budget exhausted (${totalTokens}/${config.tokenBudget})` };
  }
  return { allowed: true, reason: null };
}
