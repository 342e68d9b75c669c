export const ABSOLUTE_MAX_ITERATIONS = 50;
export const ABSOLUTE_MAX_COST = 10.0;
export const ABSOLUTE_MAX_TIMEOUT_SECONDS = 600;
export const ABSOLUTE_MAX_DEPTH = 5;

export interface AgentConfig {
  readonly maxIterations: number;
  readonly maxDepth: number;
  readonly tokenBudget: number;
  readonly costLimit: number;
  readonly timeoutSeconds: number;
  /** Tool calls allowed across all iterations of one run. */
  readonly toolBudget: number;
  readonly includeTrajectory: boolean;
}

export const DEFAULT_AGENT_CONFIG: AgentConfig = Object.freeze({
  maxIterations: 10,
  maxDepth: 3,
  tokenBudget: 50_000,
  costLimit: 2.0,
  timeoutSeconds: 120,
  toolBudget: 50,
  includeTrajectory: true,
});

/** Fills defaults and clamps to the absolute limits, which callers cannot raise. */
export function createAgentConfig(overrides: Partial<AgentConfig> = {}): AgentConfig {
  const defaults = DEFAULT_AGENT_CONFIG;
  return Object.freeze({
    maxIterations: Math.min(overrides.maxIterations ?? defaults.maxIterations, ABSOLUTE_MAX_ITERATIONS),
    maxDepth: Math.min(overrides.maxDepth ?? defaults.maxDepth, ABSOLUTE_MAX_DEPTH),
    tokenBudget: overrides.tokenBudget ?? defaults.tokenBudget,
    costLimit: Math.min(overrides.costLimit ?? defaults.costLimit, ABSOLUTE_MAX_COST),
    timeoutSeconds: Math.min(overrides.timeoutSeconds ?? defaults.timeoutSeconds, ABSOLUTE_MAX_TIMEOUT_SECONDS),
    toolBudget: overrides.toolBudget ?? defaults.toolBudget,
    includeTrajectory: overrides.includeTrajectory ?? defaults.includeTrajectory,
  });
}
