import { describe, expect, it } from "vitest";
import { computeCost, countTokens, ZERO_COSTS } from "../services/tokenCost.js";
import { TEST_RATES } from "./helpers.js";

describe("countTokens", () => {
  it("counts one token per four characters, rounding down", () => {
    expect(countTokens("")).toBe(0);
    expect(countTokens("abc")).toBe(0);
    expect(countTokens("abcd")).toBe(1);
    expect(countTokens("abcdefg")).toBe(1);
    expect(countTokens("x".repeat(4000))).toBe(1000);
  });
});

describe("computeCost", () => {
  it("prices a million tokens at the per-million rate", () => {
    const costs = computeCost(1_000_000, 1_000_000, {
      inputPerMillion: 1,
      outputPerMillion: 2,
      usdToInr: 80
    });

    expect(costs.usd).toEqual({ input: 1, output: 2, total: 3 });
    expect(costs.inr).toEqual({ input: 80, output: 160, total: 240 });
  });

  it("converts every USD figure with the same exchange rate", () => {
    const pairs: Array<[number, number]> = [
      [0, 0],
      [12, 0],
      [0, 345],
      [1234, 567],
      [98765, 4321]
    ];

    for (const [input, output] of pairs) {
      const costs = computeCost(input, output, TEST_RATES);
      expect(costs.inr.input).toBe(costs.usd.input * TEST_RATES.usdToInr);
      expect(costs.inr.output).toBe(costs.usd.output * TEST_RATES.usdToInr);
      expect(costs.inr.total).toBe(costs.usd.total * TEST_RATES.usdToInr);
    }
  });

  it("grows with either token count", () => {
    const base = computeCost(1000, 100, TEST_RATES).inr.total;

    expect(computeCost(2000, 100, TEST_RATES).inr.total).toBeGreaterThan(base);
    expect(computeCost(1000, 200, TEST_RATES).inr.total).toBeGreaterThan(base);
  });

  it("is zero for an empty call", () => {
    expect(computeCost(0, 0, TEST_RATES)).toEqual(ZERO_COSTS);
  });
});
