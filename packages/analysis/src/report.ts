import {
  PRIMARY_GENRES,
  RISK_FLAGS,
  VERDICT_ACTIONS,
  VideoAnalysisSchema,
  formatCost,
  raisedFlags,
  type PrimaryGenre,
  type RiskFlag,
  type VerdictAction,
} from "@watch-audit/core";
import { VIDEO_STATUSES, type VideoRow, type VideoStatus } from "./types.js";

export const DEFAULT_SAFETY_THRESHOLD = 60;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ReportOptions {
  /** Analyzed videos scoring below this count against their channel. */
  safetyThreshold?: number | undefined;
}

export interface ChannelRisk {
  channelName: string;
  violations: number;
  averageSafety: number;
}

export interface WatchReport {
  totalVideos: number;
  statusCounts: Map<VideoStatus, number>;
  verdictCounts: Map<VerdictAction, number>;
  /** Genres seen at least once, most frequent first. */
  genreCounts: Array<{ genre: PrimaryGenre; count: number }>;
  flagCounts: Map<RiskFlag, number>;
  averageSafetyScore: number | null;
  brainrotCount: number;
  slopCount: number;
  shortCount: number;
  /** Analyzed rows whose stored blob no longer matches the schema. */
  unreadableAnalyses: number;
  totalInputTokens: number;
  totalOutputTokens: number;
  totalCost: number;
  safetyThreshold: number;
  /** Channels with sub-threshold videos, least safe first. */
  riskyChannels: ChannelRisk[];
}

function zeroCounts<K extends string>(keys: readonly K[]): Map<K, number> {
  return new Map(keys.map((key): [K, number] => [key, 0]));
}

function increment<K>(counts: Map<K, number>, key: K): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

// ---------------------------------------------------------------------------
// Aggregation
// ---------------------------------------------------------------------------

/**
 * Aggregates a full-table read. Distributions cover `ANALYZED` rows only;
 * token and cost totals include every row that recorded usage, failed ones
 * too.
 */
export function buildReport(
  rows: readonly VideoRow[],
  options: ReportOptions = {},
): WatchReport {
  const safetyThreshold = options.safetyThreshold ?? DEFAULT_SAFETY_THRESHOLD;
  const statusCounts = zeroCounts(VIDEO_STATUSES);
  const verdictCounts = zeroCounts(VERDICT_ACTIONS);
  const genreTotals = zeroCounts(PRIMARY_GENRES);
  const flagCounts = zeroCounts(RISK_FLAGS);
  const channels = new Map<string, { violations: number; scoreSum: number }>();

  let scoreSum = 0;
  let scored = 0;
  let brainrotCount = 0;
  let slopCount = 0;
  let shortCount = 0;
  let unreadableAnalyses = 0;
  let totalInputTokens = 0;
  let totalOutputTokens = 0;
  let totalCost = 0;

  for (const row of rows) {
    increment(statusCounts, row.status);
    totalInputTokens += row.inputTokens ?? 0;
    totalOutputTokens += row.outputTokens ?? 0;
    totalCost += row.estimatedCost ?? 0;

    if (row.status !== "ANALYZED") continue;

    if (row.isBrainrot) brainrotCount++;
    if (row.isSlop) slopCount++;
    if (row.isShort) shortCount++;

    if (row.safetyScore !== null) {
      scoreSum += row.safetyScore;
      scored++;
      if (row.safetyScore < safetyThreshold) {
        const channel = channels.get(row.channelName) ?? {
          violations: 0,
          scoreSum: 0,
        };
        channel.violations++;
        channel.scoreSum += row.safetyScore;
        channels.set(row.channelName, channel);
      }
    }

    const parsed = VideoAnalysisSchema.safeParse(row.analysisJson);
    if (!parsed.success) {
      unreadableAnalyses++;
      continue;
    }
    increment(verdictCounts, parsed.data.verdict.action);
    increment(genreTotals, parsed.data.content_taxonomy.primary_genre);
    for (const flag of raisedFlags(parsed.data)) {
      increment(flagCounts, flag);
    }
  }

  const genreCounts = PRIMARY_GENRES.map((genre) => ({
    genre,
    count: genreTotals.get(genre) ?? 0,
  }))
    .filter((entry) => entry.count > 0)
    .sort((a, b) => b.count - a.count);

  const riskyChannels = [...channels.entries()]
    .map(([channelName, channel]) => ({
      channelName,
      violations: channel.violations,
      averageSafety: channel.scoreSum / channel.violations,
    }))
    .sort(
      (a, b) =>
        a.averageSafety - b.averageSafety ||
        b.violations - a.violations ||
        a.channelName.localeCompare(b.channelName),
    );

  return {
    totalVideos: rows.length,
    statusCounts,
    verdictCounts,
    genreCounts,
    flagCounts,
    averageSafetyScore: scored > 0 ? scoreSum / scored : null,
    brainrotCount,
    slopCount,
    shortCount,
    unreadableAnalyses,
    totalInputTokens,
    totalOutputTokens,
    totalCost,
    safetyThreshold,
    riskyChannels,
  };
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

export function formatReport(report: WatchReport): string[] {
  const lines: string[] = [];
  const section = (title: string) => {
    lines.push("", title, "-".repeat(title.length));
  };

  lines.push("=".repeat(60), "Watch History Audit", "=".repeat(60));
  lines.push(
    `Videos: ${report.totalVideos} (${VIDEO_STATUSES.map((s) => `${s} ${report.statusCounts.get(s) ?? 0}`).join(", ")})`,
  );
  lines.push(
    `Average safety score: ${report.averageSafetyScore === null ? "n/a" : report.averageSafetyScore.toFixed(1)}`,
  );
  lines.push(
    `Brainrot: ${report.brainrotCount}  Slop: ${report.slopCount}  Shorts: ${report.shortCount}`,
  );
  lines.push(
    `Tokens: ${report.totalInputTokens} in / ${report.totalOutputTokens} out  Cost: ${formatCost(report.totalCost)}`,
  );

  section("Verdicts");
  for (const action of VERDICT_ACTIONS) {
    lines.push(`  ${action.padEnd(15)} ${report.verdictCounts.get(action) ?? 0}`);
  }

  section("Genres");
  if (report.genreCounts.length === 0) lines.push("  (none)");
  for (const { genre, count } of report.genreCounts) {
    lines.push(`  ${genre.padEnd(26)} ${count}`);
  }

  section("Risk flags");
  for (const flag of RISK_FLAGS) {
    lines.push(`  ${flag.padEnd(28)} ${report.flagCounts.get(flag) ?? 0}`);
  }

  section(`Channels below safety ${report.safetyThreshold}`);
  if (report.riskyChannels.length === 0) lines.push("  No active threats found.");
  for (const channel of report.riskyChannels) {
    lines.push(
      `  ${channel.channelName.padEnd(30)} ${String(channel.violations).padStart(3)} video(s)  avg ${channel.averageSafety.toFixed(1)}`,
    );
  }

  if (report.unreadableAnalyses > 0) {
    lines.push(
      "",
      `${report.unreadableAnalyses} analyzed row(s) have an unreadable analysis blob.`,
    );
  }
  return lines;
}
