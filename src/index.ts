export { RLMOrchestrator, TOOL_BUDGET_EXCEEDED_MESSAGE, type RLMOrchestratorOptions } from "./orchestrator.js";
export {
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
  defaultCompletionOptions,
  loadConfig,
  parseConfig,
  type LoadConfigOptions,
  type RuntimeConfig,
  type RuntimeConfigInput,
  type SubCallSettings,
} from "./config.js";
export { DEFAULT_COMPLETION_OPTIONS, resolveCompletionOptions } from "./options.js";
export * from "./errors.js";
export type {
  CompletionControl,
  CompletionOptions,
  CostEstimate,
  Message,
  MessageRole,
  RLMResult,
  SandboxResult,
  StreamOptions,
  ToolCall,
  ToolResult,
  TrajectoryEvent,
} from "./types.js";
export { createMessage } from "./types.js";

export { AiSdkBackend, type AiSdkBackendOptions } from "./backends/aiSdkBackend.js";
export type { Backend, BackendCallOptions, BackendResponse } from "./backends/types.js";

export { ToolRegistry } from "./tools/registry.js";
export {
  objectParameters,
  toAnthropicFormat,
  toOpenAIFormat,
  type AnthropicToolFormat,
  type OpenAIToolFormat,
  type Tool,
  type ToolExecutionContext,
  type ToolParameters,
} from "./tools/types.js";
export { createSandboxTools, EXECUTE_CODE_TOOL, GET_CONTEXT_TOOL, SET_CONTEXT_TOOL } from "./tools/builtin.js";
export {
  BATCH_COMPLETE_TOOL,
  SUB_COMPLETE_TOOL,
  SubCallContext,
  calculateInheritedBudget,
  createSubCallTools,
  type SubCallLimits,
} from "./tools/subCalls.js";

export { VmSandbox, type VmSandboxOptions } from "./sandbox/vmSandbox.js";
export type { Sandbox } from "./sandbox/types.js";

export { MODEL_PRICING, estimateCost, formatCost, getPricing, type ModelPricing } from "./pricing.js";

export { TrajectoryLogger, type TrajectoryLoggerOptions, type TrajectorySummary } from "./logging/trajectoryLogger.js";
export { DEFAULT_REDACTION_POLICY, resolveRedactionPolicy, type RedactedText } from "./logging/redaction.js";
export type { EventSink, RedactionPolicy, RLMRuntimeEvent, RuntimeEventKind } from "./logging/traceTypes.js";

export { AgentRunner, type AgentResult, type AgentRunnerOptions, type AnswerSource } from "./agent/runner.js";
export { createAgentConfig, DEFAULT_AGENT_CONFIG, type AgentConfig } from "./agent/config.js";
export { checkIterationAllowed } from "./agent/guardrails.js";
export { FINAL_TOOL, FINAL_VAR_TOOL } from "./agent/terminal.js";
