import { describe, it, expect } from "vitest";
import { clampWorkers } from "./settings.js";

describe("clampWorkers", () => {
  it("keeps values inside the range", () => {
    expect(clampWorkers(1)).toBe(1);
    expect(clampWorkers(7)).toBe(7);
    expect(clampWorkers(20)).toBe(20);
  });

  it("clamps values outside the range", () => {
    expect(clampWorkers(0)).toBe(1);
    expect(clampWorkers(-4)).toBe(1);
    expect(clampWorkers(21)).toBe(20);
  });

  it("truncates fractions", () => {
    expect(clampWorkers(3.9)).toBe(3);
  });

  it("uses the default for non-finite input", () => {
    expect(clampWorkers(Number.NaN)).toBe(5);
  });
});
