export {
  type GenerationRequest,
  type GenerationResult,
  type TokenUsage,
  type ModelClient,
  type LangChainModelClientOptions,
  LangChainModelClient,
  extractTextFromResponse,
  extractUsage,
  generateWithFallback,
} from "./modelClient.js";

export {
  type MockModelClientOptions,
  MockModelClient,
  MOCK_ANALYSIS,
  MOCK_JUDGE_TEXT,
} from "./mockModelClient.js";

export { pricePerMillion, calculateCost, formatCost } from "./costAccountant.js";

export {
  type TelemetrySnapshot,
  type TelemetryContribution,
  RunTelemetry,
} from "./runTelemetry.js";
