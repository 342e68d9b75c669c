import { z } from "zod";

import { ToolValidationError } from "../errors.js";
import { describeZodError } from "../options.js";
import { type Sandbox } from "../sandbox/types.js";
import { type SandboxResult } from "../types.js";
import { objectParameters, type Tool } from "./types.js";

export const EXECUTE_CODE_TOOL = "execute_code";
export const GET_CONTEXT_TOOL = "get_sandbox_context";
export const SET_CONTEXT_TOOL = "set_sandbox_context";

const executeCodeArgsSchema = z.object({ code: z.string() });
const setContextArgsSchema = z.object({ key: z.string().min(1), value: z.unknown() });

export function formatSandboxResult(result: SandboxResult): string {
  const sections: string[] = [];
  if (result.output.trim().length > 0) {
    sections.push(result.output);
  }
  if (result.error) {
    sections.push(`Error: ${result.error}`);
  }
  if (result.truncated) {
    sections.push("[output truncated]");
  }
  return sections.length > 0 ? sections.join("\n") : "(no output)";
}

export function createSandboxTools(sandbox: Sandbox, options: { timeoutSeconds?: number } = {}): Tool[] {
  return [
    {
      name: EXECUTE_CODE_TOOL,
      description:
        "Execute a JavaScript snippet in a persistent sandbox. Use print(...) to produce output; " +
        "assign to `result` to return a value and store data on `context` to keep it between calls.",
      parameters: objectParameters({ code: { type: "string", description: "JavaScript source to run" } }, ["code"]),
      execute: async (args) => {
        const parsed = executeCodeArgsSchema.safeParse(args);
        if (!parsed.success) {
          throw new ToolValidationError(EXECUTE_CODE_TOOL, describeZodError(parsed.error), args);
        }
        return formatSandboxResult(await sandbox.execute(parsed.data.code, options.timeoutSeconds));
      },
    },
    {
      name: GET_CONTEXT_TOOL,
      description: "Return the variables stored in the sandbox `context` namespace.",
      parameters: objectParameters({}),
      execute: async () => sandbox.getContext(),
    },
    {
      name: SET_CONTEXT_TOOL,
      description: "Store a value under `key` in the sandbox `context` namespace.",
      parameters: objectParameters(
        {
          key: { type: "string", description: "Variable name" },
          value: { description: "Any JSON value" },
        },
        ["key", "value"],
      ),
      execute: async (args) => {
        const parsed = setContextArgsSchema.safeParse(args);
        if (!parsed.success) {
          throw new ToolValidationError(SET_CONTEXT_TOOL, describeZodError(parsed.error), args);
        }
        sandbox.setContext(parsed.data.key, parsed.data.value);
        return `Set context['${parsed.data.key}']`;
      },
    },
  ];
}
