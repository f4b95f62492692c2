import { describe, it, expect } from "vitest";
import { buildJudgePrompt } from "./judge.js";

describe("buildJudgePrompt", () => {
  const prompt = buildJudgePrompt({
    systemInstruction: "SYSTEM TEXT",
    prompt: "USER TEXT",
    candidates: [
      { label: "A", model: "model-a", response: '{"summary":"a"}' },
      { label: "B", model: "model-b", response: '{"summary":"b"}' },
    ],
  });

  it("embeds the original instruction and prompt", () => {
    expect(prompt).toContain("ORIGINAL SYSTEM INSTRUCTION:\nSYSTEM TEXT");
    expect(prompt).toContain("USER PROMPT:\nUSER TEXT");
  });

  it("labels each candidate with its model", () => {
    expect(prompt).toContain('RESPONSE A (model-a):\n{"summary":"a"}');
    expect(prompt).toContain('RESPONSE B (model-b):\n{"summary":"b"}');
  });

  it("asks for a winner among the labels", () => {
    expect(prompt).toContain("pick a winner (A or B).");
  });
});
