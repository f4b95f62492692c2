import type { Pool } from "pg";
import {
  ParamBuilder,
  PersistenceError,
  errorMessage,
} from "@watch-audit/shared";
import type {
  VideoRecord,
  VideoRow,
  VideoStatus,
  VideoUpdate,
  WorkItem,
} from "../types.js";
import type { VideoStore } from "./videoStore.js";

// ---------------------------------------------------------------------------
// Column mapping
// ---------------------------------------------------------------------------

// A type alias, not an interface: pg row types need an implicit index signature.
type VideoDbRow = {
  video_id: string;
  title: string;
  video_url: string;
  channel_name: string;
  channel_url: string;
  watch_timestamp: Date | null;
  status: VideoStatus;
  error_log: string | null;
  model_used: string | null;
  prompt_version: string | null;
  input_tokens: number | null;
  output_tokens: number | null;
  estimated_cost: number | null;
  safety_score: number | null;
  primary_genre: string | null;
  is_slop: boolean | null;
  is_brainrot: boolean | null;
  is_short: boolean | null;
  analysis_json: unknown;
  analyzed_at: Date | null;
};

type ScalarUpdateKey = Exclude<keyof VideoUpdate, "analysisJson">;

const UPDATE_COLUMNS: ReadonlyArray<readonly [ScalarUpdateKey, string]> = [
  ["status", "status"],
  ["errorLog", "error_log"],
  ["modelUsed", "model_used"],
  ["promptVersion", "prompt_version"],
  ["inputTokens", "input_tokens"],
  ["outputTokens", "output_tokens"],
  ["estimatedCost", "estimated_cost"],
  ["safetyScore", "safety_score"],
  ["primaryGenre", "primary_genre"],
  ["isSlop", "is_slop"],
  ["isBrainrot", "is_brainrot"],
  ["isShort", "is_short"],
  ["analyzedAt", "analyzed_at"],
];

/** Rows per multi-row INSERT; six parameters each stays far below pg's limit. */
const INSERT_BATCH_SIZE = 500;

function toVideoRow(row: VideoDbRow): VideoRow {
  return {
    videoId: row.video_id,
    title: row.title,
    videoUrl: row.video_url,
    channelName: row.channel_name,
    channelUrl: row.channel_url,
    watchTimestamp: row.watch_timestamp,
    status: row.status,
    errorLog: row.error_log,
    modelUsed: row.model_used,
    promptVersion: row.prompt_version,
    inputTokens: row.input_tokens,
    outputTokens: row.output_tokens,
    estimatedCost: row.estimated_cost,
    safetyScore: row.safety_score,
    primaryGenre: row.primary_genre,
    isSlop: row.is_slop,
    isBrainrot: row.is_brainrot,
    isShort: row.is_short,
    analysisJson: row.analysis_json,
    analyzedAt: row.analyzed_at,
  };
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

/**
 * {@link VideoStore} over a `pg` pool. Every `pool.query` checks out its own
 * client, so concurrent workers each hold a separate connection for the
 * duration of their statement.
 */
export class PgVideoStore implements VideoStore {
  constructor(private readonly pool: Pool) {}

  async selectByIds(ids: readonly string[]): Promise<WorkItem[]> {
    const unique = [...new Set(ids)];
    if (unique.length === 0) return [];

    const p = new ParamBuilder();
    const result = await this.pool.query<
      Pick<VideoDbRow, "video_id" | "title">
    >(
      `SELECT video_id, title FROM videos WHERE video_id IN (${p.list(unique)})`,
      p.values(),
    );

    const byId = new Map(result.rows.map((row) => [row.video_id, row.title]));
    return unique.flatMap((videoId) => {
      const title = byId.get(videoId);
      return title === undefined ? [] : [{ videoId, title }];
    });
  }

  async selectPending(limit?: number): Promise<WorkItem[]> {
    const p = new ParamBuilder();
    let sql = `SELECT video_id, title FROM videos
       WHERE status = ${p.add("PENDING")}
       ORDER BY watch_timestamp DESC NULLS LAST, video_id`;
    if (limit !== undefined) {
      sql += ` LIMIT ${p.add(limit)}`;
    }

    const result = await this.pool.query<
      Pick<VideoDbRow, "video_id" | "title">
    >(sql, p.values());
    return result.rows.map((row) => ({
      videoId: row.video_id,
      title: row.title,
    }));
  }

  async update(videoId: string, fields: VideoUpdate): Promise<void> {
    const p = new ParamBuilder();
    const setClauses: string[] = [];

    for (const [key, column] of UPDATE_COLUMNS) {
      const value = fields[key];
      if (value !== undefined) {
        setClauses.push(`${column} = ${p.add(value)}`);
      }
    }
    if (fields.analysisJson !== undefined) {
      setClauses.push(
        `analysis_json = ${p.add(
          fields.analysisJson === null ? null : JSON.stringify(fields.analysisJson),
        )}::jsonb`,
      );
    }

    if (setClauses.length === 0) return;

    const sql = `UPDATE videos SET ${setClauses.join(", ")} WHERE video_id = ${p.add(videoId)}`;
    try {
      await this.pool.query(sql, p.values());
    } catch (error) {
      throw new PersistenceError(
        `Failed to update video ${videoId}: ${errorMessage(error)}`,
        {
          cause: error instanceof Error ? error : undefined,
          context: { videoId },
        },
      );
    }
  }

  async insertPending(records: readonly VideoRecord[]): Promise<number> {
    let inserted = 0;

    for (let start = 0; start < records.length; start += INSERT_BATCH_SIZE) {
      const batch = records.slice(start, start + INSERT_BATCH_SIZE);
      const p = new ParamBuilder();
      const tuples = batch.map(
        (record) =>
          `(${p.list([
            record.videoId,
            record.title,
            record.videoUrl,
            record.channelName,
            record.channelUrl,
            record.watchTimestamp,
          ])}, 'PENDING')`,
      );

      const result = await this.pool.query(
        `INSERT INTO videos
           (video_id, title, video_url, channel_name, channel_url, watch_timestamp, status)
         VALUES ${tuples.join(", ")}
         ON CONFLICT (video_id) DO NOTHING`,
        p.values(),
      );
      inserted += result.rowCount ?? 0;
    }

    return inserted;
  }

  async existingIds(ids: readonly string[]): Promise<Set<string>> {
    if (ids.length === 0) return new Set();
    const result = await this.pool.query<Pick<VideoDbRow, "video_id">>(
      `SELECT video_id FROM videos WHERE video_id = ANY($1::text[])`,
      [ids],
    );
    return new Set(result.rows.map((row) => row.video_id));
  }

  async getById(videoId: string): Promise<VideoRow | null> {
    const result = await this.pool.query<VideoDbRow>(
      `SELECT * FROM videos WHERE video_id = $1`,
      [videoId],
    );
    const row = result.rows[0];
    return row ? toVideoRow(row) : null;
  }

  async listAll(): Promise<VideoRow[]> {
    const result = await this.pool.query<VideoDbRow>(
      `SELECT * FROM videos ORDER BY watch_timestamp DESC NULLS LAST, video_id`,
    );
    return result.rows.map(toVideoRow);
  }
}
