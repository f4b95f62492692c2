#!/usr/bin/env tsx
/**
 * Prints an audit of the analyzed watch history.
 *
 * Usage:
 *   npm run report
 *   npm run report -- --threshold 50
 *   npm run report -- --json
 */

import {
  ConfigurationError,
  closePool,
  createLogger,
  errorMessage,
  getPool,
} from "@watch-audit/shared";
import {
  DEFAULT_SAFETY_THRESHOLD,
  buildReport,
  formatReport,
  type WatchReport,
} from "../report.js";
import { PgVideoStore } from "../store/pgVideoStore.js";

const logger = createLogger({ service: "report-cli" });

export interface ParsedArgs {
  threshold: number;
  json: boolean;
}

/**
 * @throws {ConfigurationError} on unknown flags or a threshold outside 0-100
 */
export function parseArgs(argv: string[] = process.argv.slice(2)): ParsedArgs {
  let threshold = DEFAULT_SAFETY_THRESHOLD;
  let json = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--json") {
      json = true;
    } else if (arg === "--threshold") {
      const value = Number(argv[++i]);
      if (!Number.isInteger(value) || value < 0 || value > 100) {
        throw new ConfigurationError(
          "--threshold expects an integer between 0 and 100",
        );
      }
      threshold = value;
    } else {
      throw new ConfigurationError(`Unknown argument: ${arg}`);
    }
  }

  return { threshold, json };
}

/** Plain-object form of the report for `--json`. */
export function reportToJson(report: WatchReport): Record<string, unknown> {
  return {
    ...report,
    statusCounts: Object.fromEntries(report.statusCounts),
    verdictCounts: Object.fromEntries(report.verdictCounts),
    flagCounts: Object.fromEntries(report.flagCounts),
  };
}

async function main(): Promise<void> {
  const args = parseArgs();
  try {
    const rows = await new PgVideoStore(getPool()).listAll();
    const report = buildReport(rows, { safetyThreshold: args.threshold });
    if (args.json) {
      console.log(JSON.stringify(reportToJson(report), null, 2));
    } else {
      for (const line of formatReport(report)) {
        console.log(line);
      }
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
