import {
  MODEL_CONFIG,
  SYSTEM_INSTRUCTION,
  VideoAnalysisRequestSchema,
  buildAnalysisPrompt,
  buildJudgePrompt,
  generateWithFallback,
  parseVideoAnalysis,
  videoUrl,
  type ModelClient,
  type TokenUsage,
} from "@watch-audit/core";
import { NotFoundError, createLogger, errorMessage } from "@watch-audit/shared";
import type { VideoStore } from "./store/videoStore.js";

const log = createLogger({ service: "model-comparison" });

const CANDIDATE_LABELS = ["A", "B"] as const;
/** Response text shown to the judge for a candidate whose call failed. */
const FAILED_RESPONSE = "Error";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ComparisonOptions {
  client: ModelClient;
  store: VideoStore;
  models?: readonly [string, string];
  judgeModel?: string;
  judgeFallbackModel?: string;
}

export interface CandidateResult {
  label: (typeof CANDIDATE_LABELS)[number];
  model: string;
  response: string;
  /** Whether the response satisfied the analysis schema. */
  valid: boolean;
  error?: string | undefined;
  usage?: TokenUsage | undefined;
}

export type JudgeOutcome =
  | { ok: true; model: string; text: string }
  | { ok: false; error: string };

export interface ComparisonResult {
  videoId: string;
  title: string;
  prompt: string;
  candidates: CandidateResult[];
  judge: JudgeOutcome;
}

// ---------------------------------------------------------------------------
// Comparison
// ---------------------------------------------------------------------------

/**
 * Analyzes one stored video with two models, then asks a judge model which
 * response is better. The judge gets exactly one retry against its fallback
 * model; the candidate calls get none.
 *
 * @throws {NotFoundError} when the video is not in the store
 */
export async function compareModels(
  options: ComparisonOptions,
  videoId: string,
): Promise<ComparisonResult> {
  const row = await options.store.getById(videoId);
  if (!row) {
    throw new NotFoundError(`Video ${videoId} not found`, {
      context: { videoId },
    });
  }

  const prompt = buildAnalysisPrompt(row.title, videoUrl(videoId));
  const models = options.models ?? MODEL_CONFIG.comparison.models;

  const candidates = await Promise.all(
    CANDIDATE_LABELS.map((label, index) =>
      runCandidate(options.client, label, models[index] ?? models[0], prompt),
    ),
  );

  const judgePrompt = buildJudgePrompt({
    systemInstruction: SYSTEM_INSTRUCTION,
    prompt,
    candidates,
  });

  let judge: JudgeOutcome;
  try {
    const verdict = await generateWithFallback(
      options.client,
      {
        model: options.judgeModel ?? MODEL_CONFIG.judge.model,
        prompt: judgePrompt,
      },
      options.judgeFallbackModel ?? MODEL_CONFIG.judge.fallbackModel,
    );
    judge = { ok: true, model: verdict.model, text: verdict.text };
  } catch (error) {
    log.error("Judge failed", { videoId, error: errorMessage(error) });
    judge = { ok: false, error: errorMessage(error) };
  }

  return { videoId, title: row.title, prompt, candidates, judge };
}

async function runCandidate(
  client: ModelClient,
  label: CandidateResult["label"],
  model: string,
  prompt: string,
): Promise<CandidateResult> {
  try {
    const result = await client.generate({
      model,
      prompt,
      systemInstruction: SYSTEM_INSTRUCTION,
      schema: VideoAnalysisRequestSchema,
      schemaName: "video_analysis",
    });
    let error: string | undefined;
    try {
      parseVideoAnalysis(result.text);
    } catch (validationError) {
      error = errorMessage(validationError);
    }
    return {
      label,
      model,
      response: result.text,
      valid: error === undefined,
      error,
      usage: result.usage,
    };
  } catch (error) {
    log.warn("Candidate model failed", { model, error: errorMessage(error) });
    return {
      label,
      model,
      response: FAILED_RESPONSE,
      valid: false,
      error: errorMessage(error),
    };
  }
}
