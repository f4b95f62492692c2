import { z } from "zod";
import { ValidationError } from "@watch-audit/shared";
import type { VideoRecord } from "../types.js";

// Google Takeout `watch-history.json` entry. Only the fields ingestion reads
// are declared; everything else is ignored.
const TakeoutEntrySchema = z.object({
  header: z.string().optional(),
  title: z.string().optional(),
  titleUrl: z.string().optional(),
  subtitles: z
    .array(
      z.object({
        name: z.string().optional(),
        url: z.string().optional(),
      }),
    )
    .optional(),
  time: z.string().optional(),
});

export interface ParsedHistory {
  /** Unique videos in file order (first, i.e. most recent, watch wins). */
  records: VideoRecord[];
  totalEntries: number;
  /** Entries that are not YouTube videos or carry no video id. */
  skipped: number;
  /** Repeat watches of a video already seen earlier in the file. */
  duplicates: number;
}

const VIDEO_ID_PATTERN = /[?&]v=([^&#]+)/;

export function extractVideoId(url: string): string | null {
  return VIDEO_ID_PATTERN.exec(url)?.[1] ?? null;
}

function parseTimestamp(value: string | undefined): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Turns the parsed JSON of a Takeout watch history into pending video records.
 *
 * @throws {ValidationError} when the document is not an array of entries
 */
export function parseTakeoutHistory(data: unknown): ParsedHistory {
  if (!Array.isArray(data)) {
    throw new ValidationError(
      "Watch history must be a JSON array of activity entries",
      { code: "INVALID_HISTORY" },
    );
  }

  const records: VideoRecord[] = [];
  const seen = new Set<string>();
  let skipped = 0;
  let duplicates = 0;

  for (const raw of data) {
    const parsed = TakeoutEntrySchema.safeParse(raw);
    if (!parsed.success || parsed.data.header !== "YouTube") {
      skipped++;
      continue;
    }

    const entry = parsed.data;
    const videoUrl = entry.titleUrl ?? "";
    const videoId = extractVideoId(videoUrl);
    if (!videoId) {
      skipped++;
      continue;
    }

    if (seen.has(videoId)) {
      duplicates++;
      continue;
    }
    seen.add(videoId);

    const channel = entry.subtitles?.[0];
    records.push({
      videoId,
      title: (entry.title ?? "").replace(/^Watched /, ""),
      videoUrl,
      channelName: channel?.name ?? "Unknown",
      channelUrl: channel?.url ?? "",
      watchTimestamp: parseTimestamp(entry.time),
    });
  }

  return { records, totalEntries: data.length, skipped, duplicates };
}
