export interface RedactionPolicy {
  maxPromptChars: number;
  maxResponseChars: number;
  maxToolOutputChars: number;
  headChars: number;
  tailChars: number;
}

export type RuntimeEventKind =
  | "completion.started"
  | "completion.finished"
  | "completion.failed"
  | "backend.call.completed"
  | "tool.executed"
  | "tool.budget_exceeded"
  | "subcall.started"
  | "subcall.completed"
  | "subcall.rejected"
  | "agent.iteration.started"
  | "agent.finished";

export interface RLMRuntimeEvent {
  ts: number;
  kind: RuntimeEventKind;
  summary: string;
  payload?: Record<string, unknown>;
}

export type EventSink = (event: RLMRuntimeEvent) => void | Promise<void>;

export type RuntimeEventEmitter = (event: Omit<RLMRuntimeEvent, "ts">) => Promise<void>;

export interface TrajectoryMetadata {
  _type: "trajectory_metadata";
  trajectoryId: string;
  eventCount: number;
  totalTokens: number;
  totalDurationMs: number;
  totalCostUsd: number | null;
  createdAt: string;
}
