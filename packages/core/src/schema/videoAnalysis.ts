import { z } from "zod";
import { ValidationError } from "@watch-audit/shared";
import { parseLlmJson } from "../utils/safeParseLlmJson.js";

// ---------------------------------------------------------------------------
// Closed vocabularies
// ---------------------------------------------------------------------------

export const VIDEO_FORMATS = [
  "Standard_Landscape",
  "Short_Vertical",
  "Livestream_VOD",
  "Unknown",
] as const;

export const PERCEIVED_DURATIONS = [
  "Micro (<1 min)",
  "Short (1-5 min)",
  "Medium (5-20 min)",
  "Long (20+ min)",
] as const;

export const PRIMARY_GENRES = [
  "Gaming_Gameplay",
  "Gaming_Culture",
  "Animation_Storytime",
  "Animation_ContentFarm",
  "Toys_Unboxing",
  "Pranks_Challenges",
  "Education_STEM",
  "Education_Humanities",
  "Mascot_Horror",
  "Internet_Culture",
  "Vlog_Lifestyle",
  "Music_Dance",
  "Pseudoscience_Conspiracy",
  "Other",
] as const;

export const TARGET_DEMOGRAPHICS = [
  "Toddler (0-4)",
  "Child (5-9)",
  "Pre-Teen (10-12)",
  "Teen (13+)",
  "Adult",
] as const;

export const STRUCTURAL_INTEGRITY = [
  "Coherent_Narrative",
  "Loose_Vlog_Style",
  "Compilation_Clips",
  "Incoherent_Chaos",
] as const;

export const CREATIVE_INTENTS = [
  "Artistic/Creative",
  "Informational",
  "Parasocial/Vlog",
  "Algorithmic/Slop",
] as const;

export const WEIRDNESS_VERDICTS = [
  "Normal",
  "Creative_Surrealism",
  "Disturbing_Uncanny",
  "Lazy_Randomness",
] as const;

export const INTELLECTUAL_DENSITIES = [
  "Void (Mindless)",
  "Low (Trivia)",
  "Medium (Story/Hobby)",
  "High (Educational)",
] as const;

export const EMOTIONAL_VOLATILITIES = [
  "Calm",
  "Upbeat",
  "High_Stress",
  "Aggressive_Screaming",
] as const;

export const VERDICT_ACTIONS = [
  "Approve",
  "Monitor",
  "Block_Video",
  "Block_Channel",
] as const;

export const RISK_FLAGS = [
  "ideological_radicalization",
  "pseudoscience_misinfo",
  "body_image_harm",
  "dangerous_behavior",
  "commercial_exploitation",
  "lootbox_gambling",
  "sexual_themes",
  "mascot_horror",
] as const;

// ---------------------------------------------------------------------------
// Rubric dimensions
// ---------------------------------------------------------------------------

const VisualGroundingSchema = z
  .object({
    detected_entities: z
      .array(z.string())
      .min(3)
      .max(5)
      .describe(
        "List 3-5 main visual elements (e.g., 'Roblox UI', 'Toy Car', 'Text Overlay').",
      ),
    setting: z.string().describe("e.g., 'Bedroom', 'Game World', 'Studio'."),
    text_on_screen: z
      .string()
      .nullable()
      .optional()
      .describe("Quote any prominent text overlays."),
  })
  .describe("Objective listing of what is physically seen. Do not interpret yet.");

const VideoMetadataSchema = z.object({
  format: z.enum(VIDEO_FORMATS),
  duration_perceived: z.enum(PERCEIVED_DURATIONS),
});

const ContentTaxonomySchema = z.object({
  primary_genre: z.enum(PRIMARY_GENRES),
  specific_topic: z
    .string()
    .describe("e.g., 'Pet Simulator 99', 'Black Holes'."),
  target_demographic: z.enum(TARGET_DEMOGRAPHICS),
});

const NarrativeQualitySchema = z.object({
  structural_integrity: z
    .enum(STRUCTURAL_INTEGRITY)
    .describe("'Coherent' has a clear start/end. 'Incoherent' is random noise."),
  creative_intent: z
    .enum(CREATIVE_INTENTS)
    .describe("Does it feel like a human vision or an algorithm hack?"),
  weirdness_verdict: z
    .enum(WEIRDNESS_VERDICTS)
    .describe(
      "Distinguishes high-effort weirdness (Surrealism) from low-effort noise (Lazy).",
    ),
});

const CognitiveNutritionSchema = z.object({
  intellectual_density: z.enum(INTELLECTUAL_DENSITIES),
  emotional_volatility: z
    .enum(EMOTIONAL_VOLATILITIES)
    .describe("Does the creator scream or rage to spike cortisol?"),
  is_brainrot: z
    .boolean()
    .describe("Rapid-fire editing, sensory overload, retention hacking."),
  is_slop: z.boolean().describe("Low-effort, soul-less production."),
});

const RiskFlagsSchema = z.object({
  ideological_radicalization: z
    .boolean()
    .describe("Alt-right, misogyny, intolerance."),
  pseudoscience_misinfo: z.boolean().describe("Falsehoods, anti-science."),
  body_image_harm: z.boolean().describe("Looksmaxxing, steroids."),
  dangerous_behavior: z.boolean().describe("Stunts, bullying."),
  commercial_exploitation: z.boolean().describe("Aggressive merch pushing."),
  lootbox_gambling: z
    .boolean()
    .describe("Gacha mechanics, digital scarcity pressure."),
  sexual_themes: z.boolean(),
  mascot_horror: z.boolean().describe("Huggy Wuggy, etc."),
});

const RiskAssessmentSchema = z.object({
  safety_score: z.number().int().min(0).max(100).describe("0-100 score."),
  flags: RiskFlagsSchema,
});

const VerdictSchema = z.object({
  action: z.enum(VERDICT_ACTIONS),
  reason: z.string(),
});

/**
 * The structured-output contract requested from the model and enforced on
 * every response. Enum values are never coerced: an unknown value rejects the
 * whole analysis.
 */
export const VideoAnalysisSchema = z.object({
  visual_grounding: VisualGroundingSchema,
  video_metadata: VideoMetadataSchema,
  content_taxonomy: ContentTaxonomySchema,
  narrative_quality: NarrativeQualitySchema,
  cognitive_nutrition: CognitiveNutritionSchema,
  risk_assessment: RiskAssessmentSchema,
  summary: z.string().describe("Cynical summary of intent."),
  verdict: VerdictSchema,
});

/**
 * Schema sent with structured-output requests. Gemini function declarations
 * take a single `type` per property, so `text_on_screen` is optional rather
 * than nullable here. Responses are still validated against
 * {@link VideoAnalysisSchema}, which accepts `null`.
 */
export const VideoAnalysisRequestSchema = VideoAnalysisSchema.extend({
  visual_grounding: VisualGroundingSchema.extend({
    text_on_screen: z
      .string()
      .optional()
      .describe("Quote any prominent text overlays."),
  }),
});

export type VideoAnalysis = z.infer<typeof VideoAnalysisSchema>;
export type VideoFormat = (typeof VIDEO_FORMATS)[number];
export type PrimaryGenre = (typeof PRIMARY_GENRES)[number];
export type VerdictAction = (typeof VERDICT_ACTIONS)[number];
export type RiskFlag = (typeof RISK_FLAGS)[number];

// ---------------------------------------------------------------------------
// Parsing & projection
// ---------------------------------------------------------------------------

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Parses raw model output into a {@link VideoAnalysis}.
 *
 * @throws {ValidationError} when the text is not JSON or violates the schema
 */
export function parseVideoAnalysis(raw: string): VideoAnalysis {
  let data: unknown;
  try {
    data = parseLlmJson(raw);
  } catch (error) {
    throw new ValidationError(
      `Response is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      { code: "INVALID_JSON", cause: error instanceof Error ? error : undefined },
    );
  }

  const result = VideoAnalysisSchema.safeParse(data);
  if (!result.success) {
    throw new ValidationError(
      `Response failed schema validation: ${describeIssues(result.error)}`,
      {
        code: "SCHEMA_VIOLATION",
        cause: result.error,
        context: { issues: result.error.issues.length },
      },
    );
  }
  return result.data;
}

/**
 * Scalar columns extracted from an analysis for tabular queries.
 */
export interface AnalysisProjection {
  safetyScore: number;
  primaryGenre: PrimaryGenre;
  isSlop: boolean;
  isBrainrot: boolean;
  isShort: boolean;
}

export function toProjection(analysis: VideoAnalysis): AnalysisProjection {
  return {
    safetyScore: analysis.risk_assessment.safety_score,
    primaryGenre: analysis.content_taxonomy.primary_genre,
    isSlop: analysis.cognitive_nutrition.is_slop,
    isBrainrot: analysis.cognitive_nutrition.is_brainrot,
    isShort: analysis.video_metadata.format === "Short_Vertical",
  };
}

/**
 * Names of the flags raised in an analysis, in rubric order.
 */
export function raisedFlags(analysis: VideoAnalysis): RiskFlag[] {
  return RISK_FLAGS.filter((flag) => analysis.risk_assessment.flags[flag]);
}
