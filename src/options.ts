import { z } from "zod";

import { ConfigValidationError } from "./errors.js";
import { type CompletionOptions } from "./types.js";

export const DEFAULT_COMPLETION_OPTIONS: CompletionOptions = Object.freeze({
  maxDepth: 4,
  maxSubcalls: 12,
  tokenBudget: 8000,
  toolBudget: 20,
  timeoutSeconds: 120,
  costBudgetUsd: null,
  parallelTools: false,
  maxParallel: 5,
  includeTrajectory: false,
});

const completionOptionsSchema = z.object({
  maxDepth: z.number().int().nonnegative(),
  maxSubcalls: z.number().int().nonnegative(),
  tokenBudget: z.number().int().nonnegative(),
  toolBudget: z.number().int().nonnegative(),
  timeoutSeconds: z.number().positive(),
  costBudgetUsd: z.number().nonnegative().nullable(),
  parallelTools: z.boolean(),
  maxParallel: z.number().int().min(1),
  includeTrajectory: z.boolean(),
});

/**
 * Fills unset fields from `base` and validates the result. The returned
 * object is frozen.
 */
export function resolveCompletionOptions(
  overrides: Partial<CompletionOptions> = {},
  base: CompletionOptions = DEFAULT_COMPLETION_OPTIONS,
): CompletionOptions {
  const merged = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined && key in merged) {
      Object.assign(merged, { [key]: value });
    }
  }

  const parsed = completionOptionsSchema.safeParse(merged);
  if (!parsed.success) {
    throw toValidationError(parsed.error);
  }
  return Object.freeze(parsed.data);
}

/** Reports the first failing field. */
export function toValidationError(error: z.ZodError): ConfigValidationError {
  const issue = error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.map(String).join(".") : "(root)";
  return new ConfigValidationError(field, issue?.message ?? error.message);
}

/** `path: message` for every issue, joined with `; `. */
export function describeZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.map(String).join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
