import {
  ConfigurationError,
  getOptionalEnv,
  parseEnvBool,
  parseEnvInt,
} from "@watch-audit/shared";
import {
  MODEL_CONFIG,
  PRICE_PER_MILLION,
  resolveProvider,
  type PriceTable,
} from "./models.js";
import { MOCK_CONFIG, WORKER_POOL, clampWorkers } from "./settings.js";

export interface ApiKeys {
  google?: string | undefined;
  anthropic?: string | undefined;
}

/**
 * Everything a run needs, resolved once at process start and passed into the
 * orchestrator and model client. Nothing reads the environment after this.
 */
export interface AnalyzerConfig {
  readonly model: string;
  readonly workers: number;
  readonly mock: boolean;
  readonly mockLatencyMs: number;
  readonly apiKeys: Readonly<ApiKeys>;
  readonly pricing: PriceTable;
}

export interface AnalyzerOverrides {
  model?: string | undefined;
  workers?: number | undefined;
  mock?: boolean | undefined;
}

type Env = Record<string, string | undefined>;

/**
 * Builds the run configuration from the environment plus CLI overrides.
 *
 * Environment:
 *   GEMINI_API_KEY / GOOGLE_API_KEY  Google key (gemini models)
 *   ANTHROPIC_API_KEY                key for claude-* models
 *   ANALYSIS_MODEL                   model used for bulk analysis
 *   ANALYSIS_WORKERS                 default pool size (clamped 1-20)
 *   MOCK_LLM                         substitute canned responses
 *   MOCK_LATENCY_MS                  simulated latency in mock mode
 *
 * @throws {ConfigurationError} when the credential for the chosen model is
 *   missing outside mock mode, or a numeric setting is malformed
 */
export function loadAnalyzerConfig(
  overrides: AnalyzerOverrides = {},
  env: Env = process.env,
): AnalyzerConfig {
  const model =
    overrides.model ??
    getOptionalEnv("ANALYSIS_MODEL", undefined, env) ??
    MODEL_CONFIG.analysis.model;
  const mock = overrides.mock ?? parseEnvBool("MOCK_LLM", env);
  const workers = clampWorkers(
    overrides.workers ??
      parseEnvInt("ANALYSIS_WORKERS", WORKER_POOL.defaultSize, env),
  );
  const mockLatencyMs = parseEnvInt(
    "MOCK_LATENCY_MS",
    MOCK_CONFIG.latencyMs,
    env,
  );
  if (mockLatencyMs < 0) {
    throw new ConfigurationError("MOCK_LATENCY_MS must not be negative");
  }

  const apiKeys: ApiKeys = {
    google:
      getOptionalEnv("GEMINI_API_KEY", undefined, env) ??
      getOptionalEnv("GOOGLE_API_KEY", undefined, env),
    anthropic: getOptionalEnv("ANTHROPIC_API_KEY", undefined, env),
  };

  if (!mock) {
    assertCredential(model, apiKeys);
  }

  return {
    model,
    workers,
    mock,
    mockLatencyMs,
    apiKeys,
    pricing: PRICE_PER_MILLION,
  };
}

/**
 * @throws {ConfigurationError} when no key is configured for the model's
 *   provider
 */
export function assertCredential(model: string, apiKeys: ApiKeys): void {
  const provider = resolveProvider(model);
  if (provider === "google" && !apiKeys.google) {
    throw new ConfigurationError(
      "GEMINI_API_KEY not set. Set it, or enable mock mode with MOCK_LLM=1.",
      { context: { model } },
    );
  }
  if (provider === "anthropic" && !apiKeys.anthropic) {
    throw new ConfigurationError(
      "ANTHROPIC_API_KEY not set. Set it, or enable mock mode with MOCK_LLM=1.",
      { context: { model } },
    );
  }
}
