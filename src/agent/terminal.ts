import { z } from "zod";

import { ToolValidationError } from "../errors.js";
import { describeZodError } from "../options.js";
import { type Sandbox } from "../sandbox/types.js";
import { objectParameters, serializeToolOutput, type Tool } from "../tools/types.js";

export const FINAL_TOOL = "FINAL";
export const FINAL_VAR_TOOL = "FINAL_VAR";

export type TerminalKind = "final" | "final_var";

export interface AgentState {
  isTerminal: boolean;
  terminalValue: string | null;
  terminalKind: TerminalKind | null;
}

export function createAgentState(): AgentState {
  return { isTerminal: false, terminalValue: null, terminalKind: null };
}

export function markTerminal(state: AgentState, kind: TerminalKind, value: string): void {
  state.isTerminal = true;
  state.terminalValue = value;
  state.terminalKind = kind;
}

const finalArgsSchema = z.object({ answer: z.string() });
const finalVarArgsSchema = z.object({ variable_name: z.string().min(1) });

export function createTerminalTools(state: AgentState, sandbox?: Sandbox): Tool[] {
  const final: Tool = {
    name: FINAL_TOOL,
    description:
      "Terminate the agent and return your answer. Call this when the task is fully solved and you are ready to report the result.",
    parameters: objectParameters({ answer: { type: "string", description: "The final answer to the task" } }, ["answer"]),
    execute: async (args) => {
      const parsed = finalArgsSchema.safeParse(args);
      if (!parsed.success) {
        throw new ToolValidationError(FINAL_TOOL, describeZodError(parsed.error), args);
      }
      markTerminal(state, "final", parsed.data.answer);
      return `Agent terminated with answer: ${parsed.data.answer.slice(0, 100)}`;
    },
  };

  const finalVar: Tool = {
    name: FINAL_VAR_TOOL,
    description:
      "Terminate the agent and return the value of a sandbox context variable. Use this when the answer is stored in a computed variable.",
    parameters: objectParameters(
      { variable_name: { type: "string", description: "Name of the sandbox context variable to return" } },
      ["variable_name"],
    ),
    execute: async (args) => {
      const parsed = finalVarArgsSchema.safeParse(args);
      if (!parsed.success) {
        throw new ToolValidationError(FINAL_VAR_TOOL, describeZodError(parsed.error), args);
      }
      return resolveFinalVar(state, sandbox, parsed.data.variable_name);
    },
  };

  return [final, finalVar];
}

/**
 * Ends the run with a context variable's value. Returns an error string,
 * leaving the state untouched, when there is no sandbox or no such variable.
 */
export function resolveFinalVar(state: AgentState, sandbox: Sandbox | undefined, variableName: string): string {
  if (!sandbox) {
    return `Error: No sandbox is configured; cannot read variable '${variableName}'.`;
  }
  const context = sandbox.getContext();
  if (!Object.hasOwn(context, variableName)) {
    const available = Object.keys(context);
    return `Error: Variable '${variableName}' not found in sandbox context. Available: ${available.length > 0 ? available.join(", ") : "(none)"}`;
  }
  const value = serializeToolOutput(context[variableName]);
  markTerminal(state, "final_var", value);
  return `Agent terminated with variable '${variableName}' = ${value.slice(0, 100)}`;
}
