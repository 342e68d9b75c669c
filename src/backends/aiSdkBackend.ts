import { createOpenAI, type OpenAIProvider } from "@ai-sdk/openai";
import { APICallError, RetryError, generateText, jsonSchema, streamText, tool, type ToolSet } from "ai";

import { BackendAuthError, BackendConnectionError, BackendRateLimitError, RLMError, errorMessage } from "../errors.js";
import { type Tool } from "../tools/types.js";
import { type Message } from "../types.js";
import { toModelMessages, toToolArguments } from "./messages.js";
import { type Backend, type BackendCallOptions, type BackendResponse } from "./types.js";

export interface AiSdkBackendOptions {
  provider?: OpenAIProvider;
  model?: string;
  temperature?: number;
  maxOutputTokens?: number;
  verbose?: boolean;
}

const BACKEND_NAME = "ai-sdk";
const PROVIDER_NAME = "openai-compatible";

/**
 * Backend over the AI SDK. Tools are declared without `execute`, so the SDK
 * stops after the first step and hands tool calls back to the orchestrator.
 */
export class AiSdkBackend implements Backend {
  readonly name = BACKEND_NAME;
  readonly model: string;
  private readonly provider: OpenAIProvider;
  private readonly temperature?: number;
  private readonly maxOutputTokens?: number;
  private readonly verbose: boolean;

  constructor(options: AiSdkBackendOptions = {}) {
    const gatewayBaseUrl = process.env.AI_GATEWAY_BASE_URL ?? "https://ai-gateway.vercel.sh/v1";

    this.provider =
      options.provider ??
      createOpenAI({
        apiKey: process.env.AI_GATEWAY_API_KEY,
        baseURL: gatewayBaseUrl,
      });

    this.model = options.model ?? process.env.RLM_MODEL ?? "gpt-4o-mini";
    this.temperature = options.temperature;
    this.maxOutputTokens = options.maxOutputTokens;
    this.verbose = options.verbose ?? false;
  }

  async complete(messages: Message[], tools: Tool[], options: BackendCallOptions = {}): Promise<BackendResponse> {
    if (this.verbose) {
      process.stderr.write(`[rlm] backend call -> ${this.model} with ${messages.length} messages, ${tools.length} tools\n`);
    }

    try {
      const result = await generateText({
        model: this.provider(this.model),
        messages: toModelMessages(messages),
        tools: tools.length > 0 ? toToolSet(tools) : undefined,
        temperature: this.temperature,
        maxOutputTokens: this.maxOutputTokens,
        abortSignal: options.signal,
      });

      return {
        content: result.text.length > 0 ? result.text : null,
        toolCalls: result.toolCalls.map((call) => ({
          id: call.toolCallId,
          name: call.toolName,
          arguments: toToolArguments(call.input),
        })),
        inputTokens: result.usage.inputTokens ?? 0,
        outputTokens: result.usage.outputTokens ?? 0,
        finishReason: result.finishReason,
      };
    } catch (error) {
      throw toBackendError(error);
    }
  }

  async *stream(messages: Message[], options: BackendCallOptions = {}): AsyncIterable<string> {
    if (this.verbose) {
      process.stderr.write(`[rlm] backend stream -> ${this.model}\n`);
    }

    const result = streamText({
      model: this.provider(this.model),
      messages: toModelMessages(messages),
      temperature: this.temperature,
      maxOutputTokens: this.maxOutputTokens,
      abortSignal: options.signal,
    });

    for await (const part of result.fullStream) {
      if (part.type === "text-delta") {
        yield part.text;
      } else if (part.type === "error") {
        throw toBackendError(part.error);
      }
    }
  }
}

export function toToolSet(tools: Tool[]): ToolSet {
  const toolSet: ToolSet = {};
  for (const entry of tools) {
    toolSet[entry.name] = tool({
      description: entry.description,
      inputSchema: jsonSchema(entry.parameters),
    });
  }
  return toolSet;
}

/**
 * Maps transport failures onto the backend error family. Aborts and errors
 * that are already runtime errors pass through unchanged.
 */
export function toBackendError(error: unknown): unknown {
  if (error instanceof RLMError) {
    return error;
  }
  if (error instanceof Error && error.name === "AbortError") {
    return error;
  }

  const cause = RetryError.isInstance(error) ? error.lastError : error;

  if (APICallError.isInstance(cause)) {
    const status = cause.statusCode;
    if (status === 401 || status === 403) {
      return new BackendAuthError(BACKEND_NAME, PROVIDER_NAME);
    }
    if (status === 429) {
      return new BackendRateLimitError(BACKEND_NAME, PROVIDER_NAME, parseRetryAfter(cause.responseHeaders));
    }
  }

  return new BackendConnectionError(BACKEND_NAME, PROVIDER_NAME, errorMessage(cause));
}

function parseRetryAfter(headers: Record<string, string> | undefined): number | null {
  const raw = headers?.["retry-after"];
  if (raw === undefined) {
    return null;
  }
  const seconds = Number(raw);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : null;
}
