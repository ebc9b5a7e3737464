import type { TokenTotals, TokenUsage } from "../types.js";

/**
 * Running token and cost totals.
 *
 * Bulk runs own one instance each (reset at the start, read for the
 * summary row); the server keeps one more for single enrichments.
 * Updates are plain synchronous increments, so concurrent row tasks on
 * the event loop cannot interleave inside `add`.
 */
export class TokenAccumulator {
  private inputTokens = 0;
  private outputTokens = 0;
  private costInr = 0;

  reset(): void {
    this.inputTokens = 0;
    this.outputTokens = 0;
    this.costInr = 0;
  }

  add(usage: Pick<TokenUsage, "inputTokens" | "outputTokens" | "costInr">): void {
    this.inputTokens += usage.inputTokens;
    this.outputTokens += usage.outputTokens;
    this.costInr += usage.costInr;
  }

  snapshot(): TokenTotals {
    return {
      totalInputTokens: this.inputTokens,
      totalOutputTokens: this.outputTokens,
      totalTokens: this.inputTokens + this.outputTokens,
      totalCostInr: this.costInr
    };
  }
}
