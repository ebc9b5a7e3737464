import type { TokenCosts } from "../types.js";

/**
 * Model pricing used for cost accounting.
 * Prices are USD per 1 million tokens; `usdToInr` converts to the
 * reporting currency.
 */
export interface TokenRates {
  inputPerMillion: number;
  outputPerMillion: number;
  usdToInr: number;
}

/**
 * Approximate token count: one token per four characters.
 *
 * This is not the model's tokenizer. Counts for non-Latin text, code and
 * dense numeric specs drift from what the provider bills.
 */
export function countTokens(text: string): number {
  return Math.floor(text.length / 4);
}

/**
 * Cost of one model call in USD and INR. Values are not rounded;
 * rounding is left to whoever renders them.
 */
export function computeCost(
  inputTokens: number,
  outputTokens: number,
  rates: TokenRates
): TokenCosts {
  const inputUsd = (inputTokens / 1_000_000) * rates.inputPerMillion;
  const outputUsd = (outputTokens / 1_000_000) * rates.outputPerMillion;
  const totalUsd = inputUsd + outputUsd;

  return {
    usd: { input: inputUsd, output: outputUsd, total: totalUsd },
    inr: {
      input: inputUsd * rates.usdToInr,
      output: outputUsd * rates.usdToInr,
      total: totalUsd * rates.usdToInr
    }
  };
}

export const ZERO_COSTS: TokenCosts = {
  usd: { input: 0, output: 0, total: 0 },
  inr: { input: 0, output: 0, total: 0 }
};
