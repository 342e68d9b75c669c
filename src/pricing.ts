import { type CostEstimate } from "./types.js";

/** USD per 1K tokens. */
export interface ModelPricing {
  inputPricePer1k: number;
  outputPricePer1k: number;
}

export const MODEL_PRICING: Readonly<Record<string, ModelPricing>> = {
  // OpenAI
  "gpt-4o": { inputPricePer1k: 0.0025, outputPricePer1k: 0.01 },
  "gpt-4o-mini": { inputPricePer1k: 0.00015, outputPricePer1k: 0.0006 },
  "gpt-4.1": { inputPricePer1k: 0.002, outputPricePer1k: 0.008 },
  "gpt-4.1-mini": { inputPricePer1k: 0.0004, outputPricePer1k: 0.0016 },
  "gpt-4-turbo": { inputPricePer1k: 0.01, outputPricePer1k: 0.03 },
  "gpt-4": { inputPricePer1k: 0.03, outputPricePer1k: 0.06 },
  "gpt-3.5-turbo": { inputPricePer1k: 0.0005, outputPricePer1k: 0.0015 },
  // Anthropic
  "claude-3-5-sonnet": { inputPricePer1k: 0.003, outputPricePer1k: 0.015 },
  "claude-3-5-haiku": { inputPricePer1k: 0.0008, outputPricePer1k: 0.004 },
  "claude-3-opus": { inputPricePer1k: 0.015, outputPricePer1k: 0.075 },
  "claude-3-sonnet": { inputPricePer1k: 0.003, outputPricePer1k: 0.015 },
  "claude-3-haiku": { inputPricePer1k: 0.00025, outputPricePer1k: 0.00125 },
  // Google
  "gemini-1.5-pro": { inputPricePer1k: 0.00125, outputPricePer1k: 0.005 },
  "gemini-1.5-flash": { inputPricePer1k: 0.000075, outputPricePer1k: 0.0003 },
  // Mistral
  "mistral-large": { inputPricePer1k: 0.002, outputPricePer1k: 0.006 },
  "mistral-small": { inputPricePer1k: 0.0002, outputPricePer1k: 0.0006 },
  "mixtral-8x7b": { inputPricePer1k: 0.0007, outputPricePer1k: 0.0007 },
};

/**
 * Resolves pricing for a model id. Tries an exact match, then the id without
 * its provider prefix (`openai/gpt-4o`), then the longest table key the id
 * extends with a `-` suffix (`gpt-4o-2024-05-01` → `gpt-4o`).
 */
export function getPricing(
  model: string,
  table: Readonly<Record<string, ModelPricing>> = MODEL_PRICING,
): ModelPricing | null {
  const exact = table[model];
  if (exact) {
    return exact;
  }

  const bare = model.includes("/") ? model.slice(model.lastIndexOf("/") + 1) : model;
  const unprefixed = table[bare];
  if (unprefixed) {
    return unprefixed;
  }

  let best: string | null = null;
  for (const key of Object.keys(table)) {
    if (bare.startsWith(`${key}-`) && (best === null || key.length > best.length)) {
      best = key;
    }
  }

  return best === null ? null : (table[best] ?? null);
}

export function calculateCost(pricing: ModelPricing, inputTokens: number, outputTokens: number): number {
  return (inputTokens / 1000) * pricing.inputPricePer1k + (outputTokens / 1000) * pricing.outputPricePer1k;
}

export function estimateCost(model: string, inputTokens: number, outputTokens: number): number | null {
  const pricing = getPricing(model);
  return pricing ? calculateCost(pricing, inputTokens, outputTokens) : null;
}

/**
 * Sums event costs. Estimates that were never computed are skipped; a single
 * unknown estimate makes the total unknown.
 */
export function sumCosts(costs: Iterable<CostEstimate>): number | null {
  let total = 0;
  for (const cost of costs) {
    if (cost === undefined) {
      continue;
    }
    if (cost === null) {
      return null;
    }
    total += cost;
  }
  return total;
}

/** Lower bound on spend: unknown estimates contribute nothing. */
export function sumKnownCosts(costs: Iterable<CostEstimate>): number {
  let total = 0;
  for (const cost of costs) {
    total += cost ?? 0;
  }
  return total;
}

export function formatCost(cost: number | null): string {
  if (cost === null) {
    return "unknown";
  }
  if (cost < 0.01) {
    return `$${cost.toFixed(4)}`;
  }
  return `$${cost.toFixed(2)}`;
}
