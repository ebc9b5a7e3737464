import { describe, expect, it } from "vitest";
import { TokenAccumulator } from "../services/tokenAccumulator.js";

describe("TokenAccumulator", () => {
  it("starts at zero", () => {
    expect(new TokenAccumulator().snapshot()).toEqual({
      totalInputTokens: 0,
      totalOutputTokens: 0,
      totalTokens: 0,
      totalCostInr: 0
    });
  });

  it("sums every added call", () => {
    const acc = new TokenAccumulator();
    acc.add({ inputTokens: 100, outputTokens: 20, costInr: 0.5 });
    acc.add({ inputTokens: 50, outputTokens: 5, costInr: 0.25 });

    expect(acc.snapshot()).toEqual({
      totalInputTokens: 150,
      totalOutputTokens: 25,
      totalTokens: 175,
      totalCostInr: 0.75
    });
  });

  it("resets to zero", () => {
    const acc = new TokenAccumulator();
    acc.add({ inputTokens: 10, outputTokens: 10, costInr: 1 });
    acc.reset();

    expect(acc.snapshot().totalTokens).toBe(0);
    expect(acc.snapshot().totalCostInr).toBe(0);
  });
});
