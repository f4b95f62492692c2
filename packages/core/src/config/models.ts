export const MODELS = {
  flashLite: "gemini-2.5-flash-lite",
  flashPreview: "gemini-3-flash-preview",
  proPreview: "gemini-3-pro-preview",
  pro: "gemini-2.5-pro",
} as const;

export const MODEL_CONFIG = {
  analysis: {
    model: MODELS.flashPreview,
    temperature: 0,
    maxTokens: 4096,
  },
  comparison: {
    models: [MODELS.flashLite, MODELS.flashPreview],
  },
  judge: {
    model: MODELS.proPreview,
    fallbackModel: MODELS.pro,
    temperature: 0.2,
    maxTokens: 2048,
  },
} as const;

export type ModelConfig = typeof MODEL_CONFIG;

export type PriceTable = Readonly<Record<string, number>>;

/**
 * Blended USD price per million tokens (input and output billed at the same
 * rate). Models missing here are priced at zero.
 */
export const PRICE_PER_MILLION: PriceTable = {
  [MODELS.flashLite]: 0.1,
  [MODELS.flashPreview]: 0.3,
};

export type ModelProvider = "google" | "anthropic";

/**
 * Picks the provider from the model name: `claude-*` models go to Anthropic,
 * everything else to Google.
 */
export function resolveProvider(model: string): ModelProvider {
  return model.startsWith("claude-") ? "anthropic" : "google";
}
