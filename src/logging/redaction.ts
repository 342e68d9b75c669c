import { createHash } from "node:crypto";

import { type TrajectoryEvent } from "../types.js";
import { type RedactionPolicy } from "./traceTypes.js";

export const DEFAULT_REDACTION_POLICY: RedactionPolicy = {
  maxPromptChars: 12_000,
  maxResponseChars: 12_000,
  maxToolOutputChars: 20_000,
  headChars: 4_000,
  tailChars: 1_500,
};

export interface RedactedText {
  text: string;
  redacted: boolean;
  originalLength: number;
  digest: string | null;
}

export function resolveRedactionPolicy(policy?: Partial<RedactionPolicy>): RedactionPolicy {
  return {
    maxPromptChars: policy?.maxPromptChars ?? DEFAULT_REDACTION_POLICY.maxPromptChars,
    maxResponseChars: policy?.maxResponseChars ?? DEFAULT_REDACTION_POLICY.maxResponseChars,
    maxToolOutputChars: policy?.maxToolOutputChars ?? DEFAULT_REDACTION_POLICY.maxToolOutputChars,
    headChars: policy?.headChars ?? DEFAULT_REDACTION_POLICY.headChars,
    tailChars: policy?.tailChars ?? DEFAULT_REDACTION_POLICY.tailChars,
  };
}

export function redactPromptText(text: string, policy: RedactionPolicy): RedactedText {
  return redactLongText(text, policy.maxPromptChars, policy);
}

export function redactResponseText(text: string, policy: RedactionPolicy): RedactedText {
  return redactLongText(text, policy.maxResponseChars, policy);
}

export function redactToolOutput(text: string, policy: RedactionPolicy): RedactedText {
  return redactLongText(text, policy.maxToolOutputChars, policy);
}

/** Copy of `event` with long prompt, response and tool-result text truncated. */
export function redactTrajectoryEvent(event: TrajectoryEvent, policy: RedactionPolicy): TrajectoryEvent {
  return {
    ...event,
    prompt: redactPromptText(event.prompt, policy).text,
    response: event.response === null ? null : redactResponseText(event.response, policy).text,
    toolResults: event.toolResults.map((result) => ({
      ...result,
      content: redactToolOutput(result.content, policy).text,
    })),
  };
}

function redactLongText(text: string, threshold: number, policy: RedactionPolicy): RedactedText {
  if (text.length <= threshold) {
    return {
      text,
      redacted: false,
      originalLength: text.length,
      digest: null,
    };
  }

  const head = text.slice(0, policy.headChars);
  const tail = text.slice(Math.max(text.length - policy.tailChars, policy.headChars));
  const omitted = text.length - head.length - tail.length;
  const digest = sha256(text);

  const rendered = [
    head,
    `\n... [truncated ${omitted} chars; sha256=${digest}] ...\n`,
    tail,
  ].join("");

  return {
    text: rendered,
    redacted: true,
    originalLength: text.length,
    digest,
  };
}

function sha256(text: string): string {
  return createHash("sha256").update(text).digest("hex");
}
