#!/usr/bin/env tsx
/**
 * Classifies watched videos against the content-safety rubric.
 *
 * Usage:
 *   npm run analyze -- --limit 10                 # first 10 pending videos
 *   npm run analyze -- --ids abc123 def456        # specific videos, any status
 *   npm run analyze -- --all --workers 10         # every pending video
 *   npm run analyze -- --all --mock               # canned responses, no API calls
 *
 * Required config:
 *   DATABASE_URL    PostgreSQL connection string (local default in development)
 *   GEMINI_API_KEY  unless running with --mock or MOCK_LLM=1
 */

import {
  LangChainModelClient,
  MOCK_CONFIG,
  MODEL_CONFIG,
  MockModelClient,
  loadAnalyzerConfig,
  type ModelClient,
} from "@watch-audit/core";
import {
  ConfigurationError,
  closePool,
  createLogger,
  errorMessage,
  getPool,
} from "@watch-audit/shared";
import {
  AnalysisOrchestrator,
  type RunSummary,
} from "../analysisOrchestrator.js";
import { ConsoleProgressReporter, type LineSink } from "../progress.js";
import { selectWorkItems } from "../selection.js";
import { PgVideoStore } from "../store/pgVideoStore.js";
import type { VideoStore } from "../store/videoStore.js";
import type { Selection } from "../types.js";

const logger = createLogger({ service: "analyze-cli" });

// ---------------------------------------------------------------------------
// CLI argument parsing
// ---------------------------------------------------------------------------

export interface ParsedArgs {
  selection?: Selection | undefined;
  workers?: number | undefined;
  mock: boolean;
  help: boolean;
}

function parsePositiveInt(flag: string, raw: string | undefined): number {
  const value = Number(raw);
  if (raw === undefined || !Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${flag} expects a positive integer`);
  }
  return value;
}

/** Any integer; the pool size is clamped later. */
function parseInteger(flag: string, raw: string | undefined): number {
  const value = Number(raw);
  if (raw === undefined || raw.trim() === "" || !Number.isInteger(value)) {
    throw new ConfigurationError(`${flag} expects an integer`);
  }
  return value;
}

/**
 * @throws {ConfigurationError} on unknown flags, malformed values or more
 *   than one selection mode
 */
export function parseArgs(argv: string[] = process.argv.slice(2)): ParsedArgs {
  const selections: Selection[] = [];
  let workers: number | undefined;
  let mock = false;
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--ids") {
      const ids: string[] = [];
      while (i + 1 < argv.length && !argv[i + 1]?.startsWith("--")) {
        const id = argv[++i];
        if (id) ids.push(id);
      }
      if (ids.length === 0) {
        throw new ConfigurationError("--ids expects at least one video id");
      }
      selections.push({ mode: "ids", ids });
    } else if (arg === "--limit") {
      selections.push({
        mode: "limit",
        limit: parsePositiveInt("--limit", argv[++i]),
      });
    } else if (arg === "--all") {
      selections.push({ mode: "all" });
    } else if (arg === "--workers") {
      workers = parseInteger("--workers", argv[++i]);
    } else if (arg === "--mock") {
      mock = true;
    } else if (arg === "--help" || arg === "-h") {
      help = true;
    } else {
      throw new ConfigurationError(`Unknown argument: ${arg}`);
    }
  }

  if (selections.length > 1) {
    throw new ConfigurationError(
      "--ids, --limit and --all are mutually exclusive",
    );
  }

  return { selection: selections[0], workers, mock, help };
}

export function helpText(): string {
  return `
Watch history analyzer

USAGE:
  npm run analyze -- (--ids <id...> | --limit <n> | --all) [OPTIONS]

SELECTION (exactly one):
  --ids <id...>    Analyze these videos, whatever their status
  --limit <n>      Analyze the first n pending videos
  --all            Analyze every pending video

OPTIONS:
  --workers <n>    Concurrent model calls, clamped to 1-20 (default: 5)
  --mock           Use canned responses with ${MOCK_CONFIG.latencyMs}ms latency (also MOCK_LLM=1)
  --help, -h       Show this help message
`;
}

// ---------------------------------------------------------------------------
// Run
// ---------------------------------------------------------------------------

export interface AnalyzeDeps {
  store: VideoStore;
  env?: Record<string, string | undefined>;
  out?: LineSink;
  client?: ModelClient;
}

/**
 * Resolves configuration, selects the work and runs the orchestrator.
 *
 * @throws {ConfigurationError} before any work is dispatched when the
 *   selection or credentials are missing
 */
export async function runAnalyze(
  args: ParsedArgs,
  deps: AnalyzeDeps,
): Promise<RunSummary> {
  if (!args.selection) {
    throw new ConfigurationError("Specify one of --ids, --limit or --all");
  }

  const config = loadAnalyzerConfig(
    { workers: args.workers, mock: args.mock ? true : undefined },
    deps.env ?? process.env,
  );

  const client =
    deps.client ??
    (config.mock
      ? new MockModelClient({ latencyMs: config.mockLatencyMs })
      : new LangChainModelClient({
          apiKeys: config.apiKeys,
          temperature: MODEL_CONFIG.analysis.temperature,
          maxTokens: MODEL_CONFIG.analysis.maxTokens,
        }));

  if (config.mock) {
    logger.info("Running in mock mode", { latencyMs: config.mockLatencyMs });
  }

  const items = await selectWorkItems(deps.store, args.selection);
  const orchestrator = new AnalysisOrchestrator({
    client,
    store: deps.store,
    model: config.model,
    workers: config.workers,
    pricing: config.pricing,
    reporter: new ConsoleProgressReporter(deps.out),
  });
  return orchestrator.run(items);
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  let args: ParsedArgs;
  try {
    args = parseArgs();
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    console.error(helpText());
    process.exit(1);
  }

  if (args.help) {
    console.log(helpText());
    return;
  }
  if (!args.selection) {
    console.error("Error: specify one of --ids, --limit or --all");
    console.error(helpText());
    process.exit(1);
  }

  try {
    await runAnalyze(args, { store: new PgVideoStore(getPool()) });
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
