import { describe, it, expect } from "vitest";
import { RunTelemetry } from "./runTelemetry.js";

function pause(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe("RunTelemetry", () => {
  it("starts at zero", () => {
    expect(new RunTelemetry().snapshot()).toEqual({
      totalInputTokens: 0,
      totalOutputTokens: 0,
      totalCost: 0,
      itemsProcessed: 0,
      itemsSucceeded: 0,
      itemsFailed: 0,
    });
  });

  it("returns the totals including the contribution just recorded", () => {
    const telemetry = new RunTelemetry();
    telemetry.record({ inputTokens: 10, outputTokens: 5, cost: 0.5, succeeded: true });
    const after = telemetry.record({
      inputTokens: 3,
      outputTokens: 2,
      cost: 0.25,
      succeeded: false,
    });

    expect(after).toEqual({
      totalInputTokens: 13,
      totalOutputTokens: 7,
      totalCost: 0.75,
      itemsProcessed: 2,
      itemsSucceeded: 1,
      itemsFailed: 1,
    });
  });

  it("returns snapshots that later records do not mutate", () => {
    const telemetry = new RunTelemetry();
    const first = telemetry.record({ inputTokens: 1, outputTokens: 1, cost: 0, succeeded: true });
    telemetry.record({ inputTokens: 1, outputTokens: 1, cost: 0, succeeded: true });
    expect(first.itemsProcessed).toBe(1);
  });

  it("sums exactly when many async workers record concurrently", async () => {
    const items = 200;
    for (let workers = 1; workers <= 20; workers++) {
      for (let repeat = 0; repeat < 3; repeat++) {
        const telemetry = new RunTelemetry();
        let cursor = 0;
        const processedSeen: number[] = [];

        const worker = async (): Promise<void> => {
          while (cursor < items) {
            const index = cursor++;
            await pause();
            const snap = telemetry.record({
              inputTokens: index,
              outputTokens: 2,
              cost: 0,
              succeeded: index % 7 !== 0,
            });
            processedSeen.push(snap.itemsProcessed);
          }
        };
        await Promise.all(Array.from({ length: workers }, () => worker()));

        const total = telemetry.snapshot();
        expect(total.itemsProcessed).toBe(items);
        expect(total.totalInputTokens).toBe((items * (items - 1)) / 2);
        expect(total.totalOutputTokens).toBe(items * 2);
        expect(total.itemsFailed).toBe(Math.ceil(items / 7));
        expect(total.itemsSucceeded + total.itemsFailed).toBe(items);
        expect([...processedSeen].sort((a, b) => a - b)).toEqual(
          Array.from({ length: items }, (_, i) => i + 1),
        );
      }
    }
  });
});
