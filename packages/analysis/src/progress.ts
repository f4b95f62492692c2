import {
  PROGRESS_CONFIG,
  formatCost,
  type TelemetrySnapshot,
} from "@watch-audit/core";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Marker shown instead of a verdict when the model call itself failed. */
export const NO_RESPONSE_MARKER = "No Resp";
/** Marker shown when the response failed validation. */
export const ERROR_MARKER = "Error";

export interface ProgressEvent {
  videoId: string;
  title: string;
  /** Verdict action, or one of the failure markers. */
  marker: string;
  inputTokens: number;
  outputTokens: number;
  cost: number;
  /** Run totals immediately after this item was accounted. */
  totals: TelemetrySnapshot;
  /** Number of items selected for the run. */
  runSize: number;
}

export interface ProgressReporter {
  start(runSize: number, workers: number): void;
  item(event: ProgressEvent): void;
  finish(totals: TelemetrySnapshot): void;
}

export type Tone = "red" | "yellow" | "green";

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

const ANSI: Record<Tone, string> = {
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  green: "\x1b[32m",
};
const ANSI_RESET = "\x1b[0m";
const ANSI_BOLD = "\x1b[1m";

export function verdictTone(marker: string): Tone {
  if (
    marker.includes("Block") ||
    marker === ERROR_MARKER ||
    marker === NO_RESPONSE_MARKER
  ) {
    return "red";
  }
  if (marker === "Monitor") return "yellow";
  return "green";
}

/** Truncates to the title column, marking the cut with an ellipsis. */
export function truncateTitle(title: string): string {
  const width = PROGRESS_CONFIG.titleWidth;
  return title.length > width ? `${title.slice(0, width - 3)}...` : title;
}

export function formatHeader(): string {
  const header = [
    "Video ID".padEnd(PROGRESS_CONFIG.idWidth),
    "Title".padEnd(PROGRESS_CONFIG.titleWidth),
    "Verdict".padEnd(PROGRESS_CONFIG.verdictWidth),
    "Tokens".padEnd(PROGRESS_CONFIG.tokenWidth),
    "Cost".padEnd(PROGRESS_CONFIG.costWidth),
    "Run",
  ].join(" | ");
  return `${header}\n${"-".repeat(header.length)}`;
}

export function formatProgressLine(
  event: ProgressEvent,
  options: { color?: boolean } = {},
): string {
  const { idWidth, titleWidth, verdictWidth, tokenWidth, costWidth } =
    PROGRESS_CONFIG;
  const verdict = event.marker.padEnd(verdictWidth);
  const tokens = `${event.inputTokens}/${event.outputTokens}`;
  const run = `${event.totals.itemsProcessed}/${event.runSize} ${formatCost(event.totals.totalCost)}`;

  return [
    event.videoId.slice(0, idWidth).padEnd(idWidth),
    truncateTitle(event.title).padEnd(titleWidth),
    options.color
      ? `${ANSI[verdictTone(event.marker)]}${verdict}${ANSI_RESET}`
      : verdict,
    tokens.padEnd(tokenWidth),
    formatCost(event.cost).padEnd(costWidth),
    run,
  ].join(" | ");
}

export function formatSummary(totals: TelemetrySnapshot): string[] {
  return [
    `Processed ${totals.itemsProcessed} video(s): ${totals.itemsSucceeded} analyzed, ${totals.itemsFailed} failed`,
    `Tokens: ${totals.totalInputTokens} in / ${totals.totalOutputTokens} out`,
    `Analysis Complete. Total Estimated Cost: ${formatCost(totals.totalCost)}`,
  ];
}

// ---------------------------------------------------------------------------
// Console reporter
// ---------------------------------------------------------------------------

export interface LineSink {
  write(chunk: string): unknown;
  isTTY?: boolean | undefined;
}

/**
 * Writes the progress table to a stream. Each line, newline included, goes
 * out in a single `write` call so lines from concurrent workers never
 * interleave.
 */
export class ConsoleProgressReporter implements ProgressReporter {
  private readonly color: boolean;

  constructor(
    private readonly out: LineSink = process.stdout,
    color?: boolean,
  ) {
    this.color = color ?? (out.isTTY === true && !process.env.NO_COLOR);
  }

  start(runSize: number, workers: number): void {
    this.line(`Analyzing ${runSize} video(s) with ${workers} worker(s)`);
    const header = formatHeader();
    this.line(this.color ? `${ANSI_BOLD}${header}${ANSI_RESET}` : header);
  }

  item(event: ProgressEvent): void {
    this.line(formatProgressLine(event, { color: this.color }));
  }

  finish(totals: TelemetrySnapshot): void {
    for (const text of formatSummary(totals)) {
      this.line(text);
    }
  }

  private line(text: string): void {
    this.out.write(`${text}\n`);
  }
}
