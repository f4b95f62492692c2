export interface JudgeCandidate {
  label: string;
  model: string;
  response: string;
}

export interface JudgePromptInput {
  systemInstruction: string;
  prompt: string;
  candidates: JudgeCandidate[];
}

/**
 * Prompt asking a stronger model to pick the better of several rubric
 * responses for the same video.
 */
export function buildJudgePrompt(input: JudgePromptInput): string {
  const responses = input.candidates
    .map(
      (c) => `RESPONSE ${c.label} (${c.model}):
${c.response}`,
    )
    .join("\n\n");
  const labels = input.candidates.map((c) => c.label).join(" or ");

  return `You are an expert evaluator of AI content-safety systems.

ORIGINAL SYSTEM INSTRUCTION:
${input.systemInstruction}

USER PROMPT:
${input.prompt}

${responses}

TASK:
Compare the responses. Which one better adheres to the "cynical parent" persona \
and gives a more accurate, useful analysis under the JSON schema?
Give brief reasoning and pick a winner (${labels}).`;
}
