import { describe, it, expect } from "vitest";
import type { ComparisonResult } from "../comparison.js";
import { formatComparison, parseArgs } from "./compare.js";

describe("parseArgs", () => {
  it("reads the video id and --mock", () => {
    expect(parseArgs(["abc123", "--mock"])).toEqual({ videoId: "abc123", mock: true });
  });

  it("requires a video id", () => {
    expect(() => parseArgs(["--mock"])).toThrow(
      "Usage: npm run compare -- <videoId> [--mock]",
    );
  });

  it("rejects a second id", () => {
    expect(() => parseArgs(["a", "b"])).toThrow("Unknown argument: b");
  });
});

describe("formatComparison", () => {
  const base: ComparisonResult = {
    videoId: "v1",
    title: "Marble Run",
    prompt: "PROMPT",
    candidates: [
      { label: "A", model: "model-a", response: "{}", valid: true },
      { label: "B", model: "model-b", response: "Error", valid: false, error: "timeout" },
    ],
    judge: { ok: true, model: "judge", text: "Winner: A" },
  };

  it("prints each response and the judge verdict", () => {
    expect(formatComparison(base)).toEqual([
      "Comparing models for: Marble Run (v1)",
      "",
      "--- Prompt ---",
      "PROMPT",
      "",
      "--- Response A (model-a) ---",
      "{}",
      "",
      "--- Response B (model-b) [invalid] ---",
      "Error",
      "(timeout)",
      "",
      "--- Judge ---",
      "[judge]\nWinner: A",
    ]);
  });

  it("prints a judge failure", () => {
    const lines = formatComparison({ ...base, judge: { ok: false, error: "down" } });
    expect(lines.at(-1)).toBe("Judge failed: down");
  });
});
