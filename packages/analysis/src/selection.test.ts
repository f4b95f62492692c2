import { describe, it, expect } from "vitest";
import { ConfigurationError } from "@watch-audit/shared";
import { selectWorkItems } from "./selection.js";
import { InMemoryVideoStore } from "./store/inMemoryVideoStore.js";
import type { VideoRecord } from "./types.js";

function record(videoId: string, watchedAt: string): VideoRecord {
  return {
    videoId,
    title: `Title ${videoId}`,
    videoUrl: `https://www.youtube.com/watch?v=${videoId}`,
    channelName: "Channel",
    channelUrl: "",
    watchTimestamp: new Date(watchedAt),
  };
}

function seededStore(): InMemoryVideoStore {
  return new InMemoryVideoStore([
    record("v1", "2025-01-01T00:00:00Z"),
    record("v2", "2025-01-03T00:00:00Z"),
    record("v3", "2025-01-02T00:00:00Z"),
  ]);
}

describe("selectWorkItems", () => {
  it("returns pending rows most recent first for all", async () => {
    const items = await selectWorkItems(seededStore(), { mode: "all" });
    expect(items.map((item) => item.videoId)).toEqual(["v2", "v3", "v1"]);
  });

  it("caps pending rows for limit", async () => {
    const items = await selectWorkItems(seededStore(), {
      mode: "limit",
      limit: 2,
    });
    expect(items).toEqual([
      { videoId: "v2", title: "Title v2" },
      { videoId: "v3", title: "Title v3" },
    ]);
  });

  it("rejects a non-positive limit", async () => {
    await expect(
      selectWorkItems(seededStore(), { mode: "limit", limit: 0 }),
    ).rejects.toBeInstanceOf(ConfigurationError);
  });

  it("skips rows that are no longer pending", async () => {
    const store = seededStore();
    await store.update("v2", { status: "ANALYZED" });
    await store.update("v1", { status: "ERROR", errorLog: "boom" });

    const items = await selectWorkItems(store, { mode: "all" });
    expect(items.map((item) => item.videoId)).toEqual(["v3"]);
  });

  it("returns explicitly named rows in any status and skips unknown ids", async () => {
    const store = seededStore();
    await store.update("v2", { status: "ANALYZED" });

    const items = await selectWorkItems(store, {
      mode: "ids",
      ids: ["v2", "missing", "v1", "v2"],
    });
    expect(items.map((item) => item.videoId)).toEqual(["v2", "v1"]);
  });
});
