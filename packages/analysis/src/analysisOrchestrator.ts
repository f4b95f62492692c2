import {
  PROMPT_VERSION,
  RunTelemetry,
  SYSTEM_INSTRUCTION,
  VideoAnalysisRequestSchema,
  buildAnalysisPrompt,
  calculateCost,
  clampWorkers,
  parseVideoAnalysis,
  toProjection,
  videoUrl,
  type GenerationResult,
  type ModelClient,
  type PriceTable,
  type TelemetrySnapshot,
  type TokenUsage,
  type VideoAnalysis,
} from "@watch-audit/core";
import { createLogger, errorMessage } from "@watch-audit/shared";
import { runWithConcurrency } from "./concurrency.js";
import {
  ERROR_MARKER,
  NO_RESPONSE_MARKER,
  type ProgressReporter,
} from "./progress.js";
import type { VideoStore } from "./store/videoStore.js";
import type { VideoUpdate, WorkItem } from "./types.js";

const log = createLogger({ service: "analysis-orchestrator" });

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AnalysisOrchestratorOptions {
  client: ModelClient;
  store: VideoStore;
  model: string;
  workers: number;
  pricing: PriceTable;
  reporter?: ProgressReporter | undefined;
  promptVersion?: string | undefined;
  now?: () => Date;
}

export interface ItemOutcome {
  videoId: string;
  status: "ANALYZED" | "ERROR";
  /** Verdict action, or a failure marker. */
  marker: string;
  errorLog?: string | undefined;
  usage: TokenUsage;
  cost: number;
  /** False when the write-back failed; the row then keeps its old status. */
  persisted: boolean;
}

export interface RunSummary {
  totals: TelemetrySnapshot;
  /** One entry per item, in completion order. */
  outcomes: ItemOutcome[];
}

const NO_USAGE: TokenUsage = { inputTokens: 0, outputTokens: 0 };

// Written with every ERROR so a re-run row never keeps an earlier verdict.
const CLEARED_ANALYSIS = {
  analysisJson: null,
  safetyScore: null,
  primaryGenre: null,
  isSlop: null,
  isBrainrot: null,
  isShort: null,
} satisfies VideoUpdate;
const ANALYSIS_SCHEMA_NAME = "video_analysis";

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

/**
 * Classifies a batch of videos across a fixed-size worker pool.
 *
 * Every item ends in exactly one outcome. Model, validation and persistence
 * failures are handled inside the item and never stop the rest of the run.
 * Token usage and cost are counted per call: a response that fails
 * validation is still billed, and a failed write-back does not undo the
 * count.
 */
export class AnalysisOrchestrator {
  private readonly workers: number;
  private readonly promptVersion: string;
  private readonly now: () => Date;

  constructor(private readonly options: AnalysisOrchestratorOptions) {
    this.workers = clampWorkers(options.workers);
    this.promptVersion = options.promptVersion ?? PROMPT_VERSION;
    this.now = options.now ?? (() => new Date());
  }

  get workerCount(): number {
    return this.workers;
  }

  async run(items: readonly WorkItem[]): Promise<RunSummary> {
    const telemetry = new RunTelemetry();
    const outcomes: ItemOutcome[] = [];
    const reporter = this.options.reporter;

    if (items.length === 0) {
      log.info("No videos selected; nothing to analyze");
      const totals = telemetry.snapshot();
      reporter?.finish(totals);
      return { totals, outcomes };
    }

    log.info("Starting analysis run", {
      items: items.length,
      workers: this.workers,
      model: this.options.model,
    });
    reporter?.start(items.length, this.workers);

    await runWithConcurrency(items, this.workers, async (item) => {
      const outcome = await this.processItem(item);

      const totals = telemetry.record({
        inputTokens: outcome.usage.inputTokens,
        outputTokens: outcome.usage.outputTokens,
        cost: outcome.cost,
        succeeded: outcome.status === "ANALYZED",
      });
      outcomes.push(outcome);
      reporter?.item({
        videoId: item.videoId,
        title: item.title,
        marker: outcome.marker,
        inputTokens: outcome.usage.inputTokens,
        outputTokens: outcome.usage.outputTokens,
        cost: outcome.cost,
        totals,
        runSize: items.length,
      });
    });

    const totals = telemetry.snapshot();
    log.info("Analysis run complete", { ...totals });
    reporter?.finish(totals);
    return { totals, outcomes };
  }

  private async processItem(item: WorkItem): Promise<ItemOutcome> {
    const { model } = this.options;
    const itemLog = log.child({ videoId: item.videoId });
    const prompt = buildAnalysisPrompt(item.title, videoUrl(item.videoId));

    let result: GenerationResult;
    try {
      result = await this.options.client.generate({
        model,
        prompt,
        systemInstruction: SYSTEM_INSTRUCTION,
        schema: VideoAnalysisRequestSchema,
        schemaName: ANALYSIS_SCHEMA_NAME,
      });
    } catch (error) {
      const message = errorMessage(error) || "No response from model";
      itemLog.warn("Model call failed", { error: message });
      const persisted = await this.persist(item.videoId, {
        status: "ERROR",
        errorLog: message,
        modelUsed: model,
        promptVersion: this.promptVersion,
        inputTokens: null,
        outputTokens: null,
        estimatedCost: null,
        analyzedAt: this.now(),
        ...CLEARED_ANALYSIS,
      });
      return {
        videoId: item.videoId,
        status: "ERROR",
        marker: NO_RESPONSE_MARKER,
        errorLog: message,
        usage: NO_USAGE,
        cost: 0,
        persisted,
      };
    }

    const { usage } = result;
    const cost = calculateCost(
      usage.inputTokens,
      usage.outputTokens,
      result.model,
      this.options.pricing,
    );
    const billing = {
      modelUsed: result.model,
      promptVersion: this.promptVersion,
      inputTokens: usage.inputTokens,
      outputTokens: usage.outputTokens,
      estimatedCost: cost,
      analyzedAt: this.now(),
    };

    let analysis: VideoAnalysis;
    try {
      analysis = parseVideoAnalysis(result.text);
    } catch (error) {
      const message = errorMessage(error);
      itemLog.warn("Response failed validation", { error: message });
      const persisted = await this.persist(item.videoId, {
        status: "ERROR",
        errorLog: message,
        ...billing,
        ...CLEARED_ANALYSIS,
      });
      return {
        videoId: item.videoId,
        status: "ERROR",
        marker: ERROR_MARKER,
        errorLog: message,
        usage,
        cost,
        persisted,
      };
    }

    const projection = toProjection(analysis);
    const persisted = await this.persist(item.videoId, {
      status: "ANALYZED",
      errorLog: null,
      analysisJson: analysis,
      safetyScore: projection.safetyScore,
      primaryGenre: projection.primaryGenre,
      isSlop: projection.isSlop,
      isBrainrot: projection.isBrainrot,
      isShort: projection.isShort,
      ...billing,
    });
    itemLog.debug("Video analyzed", {
      verdict: analysis.verdict.action,
      safetyScore: projection.safetyScore,
    });

    return {
      videoId: item.videoId,
      status: "ANALYZED",
      marker: analysis.verdict.action,
      usage,
      cost,
      persisted,
    };
  }

  private async persist(videoId: string, fields: VideoUpdate): Promise<boolean> {
    try {
      await this.options.store.update(videoId, fields);
      return true;
    } catch (error) {
      log.error("Failed to persist result", {
        videoId,
        status: fields.status,
        error: errorMessage(error),
      });
      return false;
    }
  }
}
