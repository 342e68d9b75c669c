import { type Tool } from "../tools/types.js";
import { type Message, type ToolCall } from "../types.js";

export interface BackendResponse {
  content: string | null;
  toolCalls: ToolCall[];
  inputTokens: number;
  outputTokens: number;
  finishReason: string;
}

export interface BackendCallOptions {
  signal?: AbortSignal;
}

/**
 * Provider-agnostic LLM transport. `stream` yields text chunks only; tool
 * calling is not available while streaming.
 */
export interface Backend {
  readonly name: string;
  /** Model id used for pricing lookups. */
  readonly model: string;
  complete(messages: Message[], tools: Tool[], options?: BackendCallOptions): Promise<BackendResponse>;
  stream(messages: Message[], options?: BackendCallOptions): AsyncIterable<string>;
}
