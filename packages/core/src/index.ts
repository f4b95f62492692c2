// Schema
export {
  VideoAnalysisSchema,
  VideoAnalysisRequestSchema,
  parseVideoAnalysis,
  toProjection,
  raisedFlags,
  VIDEO_FORMATS,
  PERCEIVED_DURATIONS,
  PRIMARY_GENRES,
  TARGET_DEMOGRAPHICS,
  VERDICT_ACTIONS,
  RISK_FLAGS,
  type VideoAnalysis,
  type VideoFormat,
  type PrimaryGenre,
  type VerdictAction,
  type RiskFlag,
  type AnalysisProjection,
} from "./schema/videoAnalysis.js";

// Prompts
export * from "./prompts/index.js";

// Config
export * from "./config/index.js";

// Services
export * from "./services/index.js";

// Utils
export { parseLlmJson } from "./utils/safeParseLlmJson.js";
