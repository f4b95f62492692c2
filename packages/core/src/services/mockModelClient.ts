import { createLogger } from "@watch-audit/shared";
import { MOCK_CONFIG } from "../config/settings.js";
import type { VideoAnalysis } from "../schema/videoAnalysis.js";
import type {
  GenerationRequest,
  GenerationResult,
  ModelClient,
  TokenUsage,
} from "./modelClient.js";

const log = createLogger({ service: "mock-model-client" });

export const MOCK_ANALYSIS: VideoAnalysis = {
  visual_grounding: {
    detected_entities: ["Mock Entity 1", "Mock Entity 2", "Mock Entity 3"],
    setting: "Mock Setting",
    text_on_screen: null,
  },
  video_metadata: {
    format: "Standard_Landscape",
    duration_perceived: "Short (1-5 min)",
  },
  content_taxonomy: {
    primary_genre: "Other",
    specific_topic: "Mock Topic",
    target_demographic: "Child (5-9)",
  },
  narrative_quality: {
    structural_integrity: "Coherent_Narrative",
    creative_intent: "Informational",
    weirdness_verdict: "Normal",
  },
  cognitive_nutrition: {
    intellectual_density: "Medium (Story/Hobby)",
    emotional_volatility: "Calm",
    is_brainrot: false,
    is_slop: false,
  },
  risk_assessment: {
    safety_score: 95,
    flags: {
      ideological_radicalization: false,
      pseudoscience_misinfo: false,
      body_image_harm: false,
      dangerous_behavior: false,
      commercial_exploitation: false,
      lootbox_gambling: false,
      sexual_themes: false,
      mascot_horror: false,
    },
  },
  summary: "Mock analysis generated without calling a model.",
  verdict: {
    action: "Approve",
    reason: "Mock verdict.",
  },
};

export const MOCK_JUDGE_TEXT =
  "Winner: A. Both responses follow the rubric; A grounds its verdict in more specific visual evidence.";

export interface MockModelClientOptions {
  latencyMs?: number | undefined;
  usage?: TokenUsage | undefined;
  /**
   * Called before each response with the zero-based call index. Returning an
   * error makes that call reject with it.
   */
  failWith?: (request: GenerationRequest, call: number) => Error | undefined;
}

/**
 * Stand-in client that answers every schema request with {@link MOCK_ANALYSIS}
 * and every free-form request with {@link MOCK_JUDGE_TEXT}, after a fixed
 * delay. Used by `--mock` runs and tests.
 */
export class MockModelClient implements ModelClient {
  private readonly latencyMs: number;
  private readonly usage: TokenUsage;
  private calls = 0;

  constructor(private readonly options: MockModelClientOptions = {}) {
    this.latencyMs = options.latencyMs ?? MOCK_CONFIG.latencyMs;
    this.usage = options.usage ?? {
      inputTokens: MOCK_CONFIG.inputTokens,
      outputTokens: MOCK_CONFIG.outputTokens,
    };
  }

  get callCount(): number {
    return this.calls;
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const call = this.calls++;
    if (this.latencyMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.latencyMs));
    }

    const failure = this.options.failWith?.(request, call);
    if (failure) {
      log.debug("Mock call failing", { call, model: request.model });
      throw failure;
    }

    return {
      model: request.model,
      text: request.schema ? JSON.stringify(MOCK_ANALYSIS) : MOCK_JUDGE_TEXT,
      usage: { ...this.usage },
    };
  }
}
