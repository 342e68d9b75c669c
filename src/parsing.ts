export interface FinalDirective {
  kind: "final" | "final_var";
  value: string;
}

export function extractFinalDirective(text: string): FinalDirective | null {
  const finalVarPattern = /^\s*FINAL_VAR\((.*?)\)/ms;
  const finalVarMatch = text.match(finalVarPattern);
  if (finalVarMatch?.[1]) {
    return {
      kind: "final_var",
      value: finalVarMatch[1].trim().replace(/^['"]|['"]$/g, ""),
    };
  }

  const finalPattern = /^\s*FINAL\((.*)\)\s*$/ms;
  const finalMatch = text.match(finalPattern);
  if (finalMatch?.[1]) {
    return {
      kind: "final",
      value: finalMatch[1].trim(),
    };
  }

  return null;
}

export function truncateText(text: string, maxChars: number): string {
  if (text.length <= maxChars) {
    return text;
  }

  const omitted = text.length - maxChars;
  return `${text.slice(0, maxChars)}\n... [truncated ${omitted} chars]`;
}

/** Rough token estimate at four characters per token. */
export function estimateTokens(text: string): number {
  return Math.floor(text.length / 4);
}

export function previewText(text: string, maxChars: number): string {
  return text.length > maxChars ? `${text.slice(0, maxChars)}...` : text;
}
