import type { AssistantModelMessage, ModelMessage, ToolCallPart, ToolModelMessage, ToolResultPart } from "ai";

import { type Message, type ToolCall } from "../types.js";

/**
 * Converts the runtime's message list into AI SDK model messages. Consecutive
 * `tool` messages collapse into one tool message whose parts keep call order.
 */
export function toModelMessages(messages: Message[]): ModelMessage[] {
  const converted: ModelMessage[] = [];
  const toolNames = new Map<string, string>();

  for (const message of messages) {
    switch (message.role) {
      case "system":
        converted.push({ role: "system", content: message.content ?? "" });
        break;
      case "user":
        converted.push({ role: "user", content: message.content ?? "" });
        break;
      case "assistant":
        for (const call of message.toolCalls) {
          toolNames.set(call.id, call.name);
        }
        converted.push(toAssistantMessage(message));
        break;
      case "tool": {
        const part = toToolResultPart(message, toolNames);
        const previous = converted.at(-1);
        if (previous?.role === "tool") {
          previous.content.push(part);
        } else {
          const toolMessage: ToolModelMessage = { role: "tool", content: [part] };
          converted.push(toolMessage);
        }
        break;
      }
    }
  }

  return converted;
}

function toAssistantMessage(message: Message): AssistantModelMessage {
  if (message.toolCalls.length === 0) {
    return { role: "assistant", content: message.content ?? "" };
  }

  const parts: Exclude<AssistantModelMessage["content"], string> = [];
  if (message.content) {
    parts.push({ type: "text", text: message.content });
  }
  for (const call of message.toolCalls) {
    parts.push(toToolCallPart(call));
  }
  return { role: "assistant", content: parts };
}

function toToolCallPart(call: ToolCall): ToolCallPart {
  return {
    type: "tool-call",
    toolCallId: call.id,
    toolName: call.name,
    input: call.arguments,
  };
}

function toToolResultPart(message: Message, toolNames: Map<string, string>): ToolResultPart {
  const toolCallId = message.toolCallId ?? "";
  const value = message.content ?? "";
  return {
    type: "tool-result",
    toolCallId,
    toolName: message.name ?? toolNames.get(toolCallId) ?? "unknown",
    output: message.isError ? { type: "error-text", value } : { type: "text", value },
  };
}

export function toToolArguments(input: unknown): Record<string, unknown> {
  if (input !== null && typeof input === "object" && !Array.isArray(input)) {
    return Object.fromEntries(Object.entries(input));
  }
  if (typeof input === "string") {
    try {
      return toToolArguments(JSON.parse(input));
    } catch {
      return {};
    }
  }
  return {};
}
