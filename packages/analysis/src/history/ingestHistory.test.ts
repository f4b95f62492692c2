import { describe, it, expect } from "vitest";
import { InMemoryVideoStore } from "../store/inMemoryVideoStore.js";
import { ingestHistory } from "./ingestHistory.js";

const watch = (id: string) => ({
  header: "YouTube",
  title: `Watched ${id}`,
  titleUrl: `https://www.youtube.com/watch?v=${id}`,
  time: "2025-01-01T00:00:00Z",
});

describe("ingestHistory", () => {
  it("adds new videos as pending and counts repeats", async () => {
    const store = new InMemoryVideoStore();

    const report = await ingestHistory(store, [
      watch("a"),
      watch("b"),
      watch("a"),
      { header: "Google Ads" },
    ]);

    expect(report).toEqual({ totalEntries: 4, skipped: 1, duplicates: 1, added: 2 });
    expect((await store.getById("a"))?.status).toBe("PENDING");
  });

  it("leaves videos already in the store untouched", async () => {
    const store = new InMemoryVideoStore();
    await ingestHistory(store, [watch("a")]);
    await store.update("a", { status: "ANALYZED" });

    const report = await ingestHistory(store, [watch("a"), watch("c")]);

    expect(report).toEqual({ totalEntries: 2, skipped: 0, duplicates: 1, added: 1 });
    expect((await store.getById("a"))?.status).toBe("ANALYZED");
    expect((await store.getById("c"))?.title).toBe("c");
  });
});
