export {
  MODELS,
  MODEL_CONFIG,
  PRICE_PER_MILLION,
  resolveProvider,
  type ModelConfig,
  type ModelProvider,
  type PriceTable,
} from "./models.js";
export {
  WORKER_POOL,
  MOCK_CONFIG,
  PROGRESS_CONFIG,
  clampWorkers,
} from "./settings.js";
export {
  loadAnalyzerConfig,
  assertCredential,
  type AnalyzerConfig,
  type AnalyzerOverrides,
  type ApiKeys,
} from "./analyzerConfig.js";
export { createChatModel, type ChatModelOptions } from "./modelFactory.js";
