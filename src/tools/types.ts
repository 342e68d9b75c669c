import type { JSONSchema7 } from "ai";

export interface ToolParameters extends JSONSchema7 {
  type: "object";
  properties: Record<string, JSONSchema7>;
  required?: string[];
}

/**
 * A named capability the model may invoke. Non-string results are
 * JSON-serialised before they are handed back to the model.
 */
export interface Tool {
  name: string;
  description: string;
  parameters: ToolParameters;
  execute(args: Record<string, unknown>, context?: ToolExecutionContext): Promise<unknown>;
}

export interface ToolExecutionContext {
  /** Aborted when the completion that dispatched the call times out or is cancelled. */
  signal?: AbortSignal;
}

export interface OpenAIToolFormat {
  type: "function";
  function: {
    name: string;
    description: string;
    parameters: ToolParameters;
  };
}

export interface AnthropicToolFormat {
  name: string;
  description: string;
  input_schema: ToolParameters;
}

export function toOpenAIFormat(tool: Tool): OpenAIToolFormat {
  return {
    type: "function",
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    },
  };
}

export function toAnthropicFormat(tool: Tool): AnthropicToolFormat {
  return {
    name: tool.name,
    description: tool.description,
    input_schema: tool.parameters,
  };
}

export function objectParameters(
  properties: Record<string, JSONSchema7>,
  required: string[] = [],
): ToolParameters {
  return { type: "object", properties, required };
}

export function serializeToolOutput(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (value === undefined) {
    return "null";
  }
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}
