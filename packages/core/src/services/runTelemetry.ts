export interface TelemetrySnapshot {
  readonly totalInputTokens: number;
  readonly totalOutputTokens: number;
  readonly totalCost: number;
  readonly itemsProcessed: number;
  readonly itemsSucceeded: number;
  readonly itemsFailed: number;
}

/** What one finished item adds to the run totals. */
export interface TelemetryContribution {
  inputTokens: number;
  outputTokens: number;
  cost: number;
  succeeded: boolean;
}

/**
 * Run-wide token, cost and item counters shared by every worker.
 *
 * `record` reads and writes all counters without yielding, so concurrent
 * workers never interleave inside an update and the snapshot it returns is the
 * state immediately after that contribution.
 */
export class RunTelemetry {
  private totalInputTokens = 0;
  private totalOutputTokens = 0;
  private totalCost = 0;
  private itemsProcessed = 0;
  private itemsSucceeded = 0;
  private itemsFailed = 0;

  record(contribution: TelemetryContribution): TelemetrySnapshot {
    this.totalInputTokens += contribution.inputTokens;
    this.totalOutputTokens += contribution.outputTokens;
    this.totalCost += contribution.cost;
    this.itemsProcessed += 1;
    if (contribution.succeeded) {
      this.itemsSucceeded += 1;
    } else {
      this.itemsFailed += 1;
    }
    return this.snapshot();
  }

  snapshot(): TelemetrySnapshot {
    return {
      totalInputTokens: this.totalInputTokens,
      totalOutputTokens: this.totalOutputTokens,
      totalCost: this.totalCost,
      itemsProcessed: this.itemsProcessed,
      itemsSucceeded: this.itemsSucceeded,
      itemsFailed: this.itemsFailed,
    };
  }
}
