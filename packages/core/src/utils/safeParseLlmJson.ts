/**
 * Maximum length (in characters) of LLM output accepted for JSON parsing.
 * A full rubric analysis is a few kilobytes; anything near this limit is not
 * an analysis.
 */
const MAX_LLM_JSON_LENGTH = 50_000;

/**
 * Strips markdown code fences and parses JSON from LLM output.
 * Throws if the input exceeds {@link MAX_LLM_JSON_LENGTH} characters.
 */
export function parseLlmJson(raw: string): unknown {
  let cleaned = raw.trim();
  if (cleaned.length > MAX_LLM_JSON_LENGTH) {
    throw new Error(
      `LLM output too large for JSON parsing (${cleaned.length} chars, max ${MAX_LLM_JSON_LENGTH})`,
    );
  }
  if (cleaned.startsWith("```")) {
    cleaned = cleaned.replace(/^```(?:json)?\s*/, "").replace(/\s*```$/, "");
  }
  return JSON.parse(cleaned);
}
