import type { ModelRate } from '../core/types.js';
import { ConfigurationError } from '../core/errors.js';

export type PricingTable = Record<string, ModelRate>;

/**
 * Rate for a model id: exact key first, then the longest table key contained
 * in the id, so `gpt-4o-mini-2024-07-18` resolves to `gpt-4o-mini` rather
 * than `gpt-4o`.
 */
export function resolveModelRate(model: string, table: PricingTable): ModelRate | null {
  const exact = table[model];
  if (exact) return exact;

  let best: string | null = null;
  for (const key of Object.keys(table)) {
    if (model.includes(key) && (best === null || key.length > best.length)) {
      best = key;
    }
  }
  return best === null ? null : table[best];
}

/**
 * Throws ConfigurationError when the model has no pricing entry
 */
export function requireModelRate(model: string, table: PricingTable): ModelRate {
  const rate = resolveModelRate(model, table);
  if (!rate) {
    throw new ConfigurationError(`No pricing entry for model "${model}"; add it under "pricing" in the config`);
  }
  return rate;
}

/**
 * USD cost of a call, rounded to 6 decimals
 */
export function calculateModelCost(rate: ModelRate, inputTokens: number, outputTokens: number): number {
  const cost = (inputTokens / 1_000_000) * rate.inputPer1M + (outputTokens / 1_000_000) * rate.outputPer1M;
  return Math.round(cost * 1e6) / 1e6;
}
