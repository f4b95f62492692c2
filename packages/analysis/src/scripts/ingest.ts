#!/usr/bin/env tsx
/**
 * Loads a Google Takeout watch history into the `videos` table as PENDING rows.
 *
 * Usage:
 *   npm run ingest                                # reads data/watch-history.json
 *   npm run ingest -- --file path/to/history.json
 */

import { readFile } from "node:fs/promises";
import {
  NotFoundError,
  ValidationError,
  closePool,
  createLogger,
  errorMessage,
  getPool,
} from "@watch-audit/shared";
import { ingestHistory, type IngestReport } from "../history/ingestHistory.js";
import { PgVideoStore } from "../store/pgVideoStore.js";
import type { VideoStore } from "../store/videoStore.js";

const logger = createLogger({ service: "ingest-cli" });

export const DEFAULT_HISTORY_FILE = "data/watch-history.json";

export interface ParsedArgs {
  file: string;
}

export function parseArgs(argv: string[] = process.argv.slice(2)): ParsedArgs {
  let file = DEFAULT_HISTORY_FILE;
  for (let i = 0; i < argv.length; i++) {
    if (argv[i] === "--file" && argv[i + 1]) {
      file = argv[++i] ?? file;
    }
  }
  return { file };
}

/**
 * @throws {NotFoundError} when the file does not exist
 * @throws {ValidationError} when it is not a JSON watch history
 */
export async function runIngest(
  store: VideoStore,
  file: string,
): Promise<IngestReport> {
  let text: string;
  try {
    text = await readFile(file, "utf-8");
  } catch (error) {
    throw new NotFoundError(`History file not found: ${file}`, {
      cause: error instanceof Error ? error : undefined,
      context: { file },
    });
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new ValidationError(`History file is not valid JSON: ${file}`, {
      cause: error instanceof Error ? error : undefined,
      context: { file },
    });
  }

  return ingestHistory(store, data);
}

export function formatIngestReport(report: IngestReport): string[] {
  return [
    "--- Ingestion Report ---",
    `Total entries in file:     ${report.totalEntries}`,
    `Skipped (not a video):     ${report.skipped}`,
    `Duplicates (file or DB):   ${report.duplicates}`,
    `New videos added:          ${report.added}`,
  ];
}

async function main(): Promise<void> {
  const { file } = parseArgs();
  try {
    const report = await runIngest(new PgVideoStore(getPool()), file);
    for (const line of formatIngestReport(report)) {
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
