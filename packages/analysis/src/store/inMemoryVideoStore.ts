import type {
  VideoRecord,
  VideoRow,
  VideoUpdate,
  WorkItem,
} from "../types.js";
import type { VideoStore } from "./videoStore.js";

function pendingRow(record: VideoRecord): VideoRow {
  return {
    ...record,
    status: "PENDING",
    errorLog: null,
    modelUsed: null,
    promptVersion: null,
    inputTokens: null,
    outputTokens: null,
    estimatedCost: null,
    safetyScore: null,
    primaryGenre: null,
    isSlop: null,
    isBrainrot: null,
    isShort: null,
    analysisJson: null,
    analyzedAt: null,
  };
}

/** Most recently watched first, undated rows last, then by id. */
function byWatchTimeDesc(a: VideoRow, b: VideoRow): number {
  const at = a.watchTimestamp?.getTime();
  const bt = b.watchTimestamp?.getTime();
  if (at !== bt) {
    if (at === undefined) return 1;
    if (bt === undefined) return -1;
    return bt - at;
  }
  return a.videoId < b.videoId ? -1 : a.videoId > b.videoId ? 1 : 0;
}

/**
 * Process-local {@link VideoStore} used by tests.
 */
export class InMemoryVideoStore implements VideoStore {
  private readonly rows = new Map<string, VideoRow>();
  readonly updates: Array<{ videoId: string; fields: VideoUpdate }> = [];

  constructor(records: readonly VideoRecord[] = []) {
    for (const record of records) {
      if (!this.rows.has(record.videoId)) {
        this.rows.set(record.videoId, pendingRow(record));
      }
    }
  }

  async selectByIds(ids: readonly string[]): Promise<WorkItem[]> {
    return [...new Set(ids)].flatMap((videoId) => {
      const row = this.rows.get(videoId);
      return row ? [{ videoId, title: row.title }] : [];
    });
  }

  async selectPending(limit?: number): Promise<WorkItem[]> {
    const pending = [...this.rows.values()]
      .filter((row) => row.status === "PENDING")
      .sort(byWatchTimeDesc)
      .map((row) => ({ videoId: row.videoId, title: row.title }));
    return limit === undefined ? pending : pending.slice(0, limit);
  }

  async update(videoId: string, fields: VideoUpdate): Promise<void> {
    this.updates.push({ videoId, fields });
    const row = this.rows.get(videoId);
    if (!row) return;

    const defined = Object.fromEntries(
      Object.entries(fields).filter(([, value]) => value !== undefined),
    );
    this.rows.set(videoId, { ...row, ...defined });
  }

  async insertPending(records: readonly VideoRecord[]): Promise<number> {
    let inserted = 0;
    for (const record of records) {
      if (this.rows.has(record.videoId)) continue;
      this.rows.set(record.videoId, pendingRow(record));
      inserted++;
    }
    return inserted;
  }

  async existingIds(ids: readonly string[]): Promise<Set<string>> {
    return new Set(ids.filter((id) => this.rows.has(id)));
  }

  async getById(videoId: string): Promise<VideoRow | null> {
    const row = this.rows.get(videoId);
    return row ? { ...row } : null;
  }

  async listAll(): Promise<VideoRow[]> {
    return [...this.rows.values()]
      .sort(byWatchTimeDesc)
      .map((row) => ({ ...row }));
  }
}
