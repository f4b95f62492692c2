import { createLogger } from "@watch-audit/shared";
import type { VideoStore } from "../store/videoStore.js";
import { parseTakeoutHistory } from "./takeoutParser.js";

const log = createLogger({ service: "history-ingest" });

export interface IngestReport {
  totalEntries: number;
  skipped: number;
  /** Repeats within the file plus videos already in the store. */
  duplicates: number;
  added: number;
}

/**
 * Loads a parsed watch history into the store as `PENDING` rows. Videos the
 * store already holds keep their current status.
 */
export async function ingestHistory(
  store: VideoStore,
  data: unknown,
): Promise<IngestReport> {
  const history = parseTakeoutHistory(data);
  const existing = await store.existingIds(
    history.records.map((record) => record.videoId),
  );
  const fresh = history.records.filter(
    (record) => !existing.has(record.videoId),
  );
  const added = await store.insertPending(fresh);

  const report: IngestReport = {
    totalEntries: history.totalEntries,
    skipped: history.skipped,
    duplicates: history.duplicates + existing.size + (fresh.length - added),
    added,
  };
  log.info("Watch history ingested", { ...report });
  return report;
}
