export * from "./types.js";
export * from "./store/index.js";
export { runWithConcurrency } from "./concurrency.js";
export { selectWorkItems } from "./selection.js";
export {
  AnalysisOrchestrator,
  type AnalysisOrchestratorOptions,
  type ItemOutcome,
  type RunSummary,
} from "./analysisOrchestrator.js";
export {
  ConsoleProgressReporter,
  formatHeader,
  formatProgressLine,
  formatSummary,
  truncateTitle,
  verdictTone,
  ERROR_MARKER,
  NO_RESPONSE_MARKER,
  type LineSink,
  type ProgressEvent,
  type ProgressReporter,
  type Tone,
} from "./progress.js";
export {
  parseTakeoutHistory,
  extractVideoId,
  type ParsedHistory,
} from "./history/takeoutParser.js";
export { ingestHistory, type IngestReport } from "./history/ingestHistory.js";
export {
  compareModels,
  type CandidateResult,
  type ComparisonOptions,
  type ComparisonResult,
  type JudgeOutcome,
} from "./comparison.js";
export {
  buildReport,
  formatReport,
  DEFAULT_SAFETY_THRESHOLD,
  type ChannelRisk,
  type ReportOptions,
  type WatchReport,
} from "./report.js";
