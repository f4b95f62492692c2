#!/usr/bin/env tsx
/**
 * Analyzes one stored video with two models and asks a judge model which
 * response is better.
 *
 * Usage:
 *   npm run compare -- <videoId>
 *   npm run compare -- <videoId> --mock
 */

import {
  LangChainModelClient,
  MockModelClient,
  assertCredential,
  loadAnalyzerConfig,
  MODEL_CONFIG,
  type ModelClient,
} from "@watch-audit/core";
import {
  ConfigurationError,
  closePool,
  createLogger,
  errorMessage,
  getPool,
} from "@watch-audit/shared";
import { compareModels, type ComparisonResult } from "../comparison.js";
import { PgVideoStore } from "../store/pgVideoStore.js";

const logger = createLogger({ service: "compare-cli" });

export interface ParsedArgs {
  videoId: string;
  mock: boolean;
}

/**
 * @throws {ConfigurationError} when no video id is given
 */
export function parseArgs(argv: string[] = process.argv.slice(2)): ParsedArgs {
  let videoId: string | undefined;
  let mock = false;
  for (const arg of argv) {
    if (arg === "--mock") {
      mock = true;
    } else if (!arg.startsWith("--") && videoId === undefined) {
      videoId = arg;
    } else {
      throw new ConfigurationError(`Unknown argument: ${arg}`);
    }
  }
  if (!videoId) {
    throw new ConfigurationError("Usage: npm run compare -- <videoId> [--mock]");
  }
  return { videoId, mock };
}

export function formatComparison(result: ComparisonResult): string[] {
  const lines = [
    `Comparing models for: ${result.title} (${result.videoId})`,
    "",
    "--- Prompt ---",
    result.prompt,
  ];
  for (const candidate of result.candidates) {
    lines.push(
      "",
      `--- Response ${candidate.label} (${candidate.model})${candidate.valid ? "" : " [invalid]"} ---`,
      candidate.response,
    );
    if (candidate.error) lines.push(`(${candidate.error})`);
  }
  lines.push("", "--- Judge ---");
  lines.push(
    result.judge.ok
      ? `[${result.judge.model}]\n${result.judge.text}`
      : `Judge failed: ${result.judge.error}`,
  );
  return lines;
}

async function main(): Promise<void> {
  const args = parseArgs();
  const config = loadAnalyzerConfig({ mock: args.mock ? true : undefined });

  let client: ModelClient;
  if (config.mock) {
    client = new MockModelClient({ latencyMs: 0 });
  } else {
    for (const model of [
      ...MODEL_CONFIG.comparison.models,
      MODEL_CONFIG.judge.model,
    ]) {
      assertCredential(model, config.apiKeys);
    }
    client = new LangChainModelClient({
      apiKeys: config.apiKeys,
      temperature: MODEL_CONFIG.judge.temperature,
      maxTokens: MODEL_CONFIG.analysis.maxTokens,
    });
  }

  try {
    const result = await compareModels(
      { client, store: new PgVideoStore(getPool()) },
      args.videoId,
    );
    for (const line of formatComparison(result)) {
      console.log(line);
    }
  } finally {
    await closePool();
  }
}

// Only run main() when executed directly (not when imported by tests)
const isDirectExecution = typeof process.env.VITEST === "undefined";

if (isDirectExecution) {
  main().catch((error) => {
    logger.error(`Fatal error: ${errorMessage(error)}`);
    process.exit(1);
  });
}
