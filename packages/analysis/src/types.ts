import type { VideoAnalysis } from "@watch-audit/core";

export const VIDEO_STATUSES = ["PENDING", "ANALYZED", "ERROR"] as const;
export type VideoStatus = (typeof VIDEO_STATUSES)[number];

/**
 * One video to classify. Read once from the store and never mutated during a
 * run.
 */
export interface WorkItem {
  videoId: string;
  title: string;
}

/** A watch-history entry as written by ingestion. */
export interface VideoRecord {
  videoId: string;
  title: string;
  videoUrl: string;
  channelName: string;
  channelUrl: string;
  watchTimestamp: Date | null;
}

export interface VideoRow extends VideoRecord {
  status: VideoStatus;
  errorLog: string | null;
  modelUsed: string | null;
  promptVersion: string | null;
  inputTokens: number | null;
  outputTokens: number | null;
  estimatedCost: number | null;
  safetyScore: number | null;
  primaryGenre: string | null;
  isSlop: boolean | null;
  isBrainrot: boolean | null;
  isShort: boolean | null;
  /** Stored analysis blob; validate before use. */
  analysisJson: unknown;
  analyzedAt: Date | null;
}

/**
 * Partial write-back for one row. Only defined fields are written.
 */
export interface VideoUpdate {
  status?: VideoStatus;
  errorLog?: string | null;
  modelUsed?: string;
  promptVersion?: string;
  /** `null` clears usage left over from an earlier analysis. */
  inputTokens?: number | null;
  outputTokens?: number | null;
  estimatedCost?: number | null;
  safetyScore?: number | null;
  primaryGenre?: string | null;
  isSlop?: boolean | null;
  isBrainrot?: boolean | null;
  isShort?: boolean | null;
  analysisJson?: VideoAnalysis | null;
  analyzedAt?: Date;
}

export type Selection =
  | { mode: "ids"; ids: string[] }
  | { mode: "limit"; limit: number }
  | { mode: "all" };
