import type {
  VideoRecord,
  VideoRow,
  VideoUpdate,
  WorkItem,
} from "../types.js";

/**
 * Row-level access to the `videos` table.
 *
 * `update` may be called concurrently for different video ids. Implementations
 * must not share one mutable connection across those calls.
 */
export interface VideoStore {
  /** Rows with the given ids, whatever their status. Unknown ids are skipped. */
  selectByIds(ids: readonly string[]): Promise<WorkItem[]>;
  /** `PENDING` rows, most recently watched first, optionally capped. */
  selectPending(limit?: number): Promise<WorkItem[]>;
  update(videoId: string, fields: VideoUpdate): Promise<void>;
  /** Inserts new rows as `PENDING`. Existing ids are left untouched. */
  insertPending(records: readonly VideoRecord[]): Promise<number>;
  existingIds(ids: readonly string[]): Promise<Set<string>>;
  getById(videoId: string): Promise<VideoRow | null>;
  listAll(): Promise<VideoRow[]>;
}
