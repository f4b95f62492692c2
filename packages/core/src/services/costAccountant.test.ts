import { describe, it, expect } from "vitest";
import { calculateCost, formatCost, pricePerMillion } from "./costAccountant.js";
import { PRICE_PER_MILLION } from "../config/models.js";

describe("pricePerMillion", () => {
  it("looks up known models", () => {
    expect(pricePerMillion("gemini-3-flash-preview", PRICE_PER_MILLION)).toBe(0.3);
    expect(pricePerMillion("gemini-2.5-flash-lite", PRICE_PER_MILLION)).toBe(0.1);
  });

  it("prices unknown models at zero", () => {
    expect(pricePerMillion("unlisted-model", PRICE_PER_MILLION)).toBe(0);
  });
});

describe("calculateCost", () => {
  it("bills input and output tokens at the blended rate", () => {
    expect(calculateCost(100, 50, "gemini-3-flash-preview", PRICE_PER_MILLION)).toBeCloseTo(
      0.000045,
      12,
    );
  });

  it("returns zero for unknown models", () => {
    expect(calculateCost(1_000, 1_000, "unlisted-model", PRICE_PER_MILLION)).toBe(0);
  });

  it("returns zero for zero tokens", () => {
    expect(calculateCost(0, 0, "gemini-3-flash-preview", PRICE_PER_MILLION)).toBe(0);
  });

  it("uses the supplied price table", () => {
    expect(calculateCost(500_000, 500_000, "custom", { custom: 2 })).toBe(2);
  });
});

describe("formatCost", () => {
  it("prints six decimals with a dollar sign", () => {
    expect(formatCost(0.000045)).toBe("$0.000045");
    expect(formatCost(0)).toBe("$0.000000");
    expect(formatCost(1.5)).toBe("$1.500000");
  });
});
