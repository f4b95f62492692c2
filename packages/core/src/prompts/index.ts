export { SYSTEM_INSTRUCTION, PROMPT_VERSION } from "./system.js";
export { buildAnalysisPrompt, videoUrl } from "./analysis.js";
export {
  buildJudgePrompt,
  type JudgeCandidate,
  type JudgePromptInput,
} from "./judge.js";
