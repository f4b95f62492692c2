import { describe, it, expect } from "vitest";
import { ValidationError } from "@watch-audit/shared";
import { extractVideoId, parseTakeoutHistory } from "./takeoutParser.js";

const watch = (id: string, extra: Record<string, unknown> = {}) => ({
  header: "YouTube",
  title: `Watched Video ${id}`,
  titleUrl: `https://www.youtube.com/watch?v=${id}`,
  subtitles: [{ name: "Maker Lab", url: "https://www.youtube.com/channel/UC1" }],
  time: "2025-02-03T04:05:06.000Z",
  ...extra,
});

describe("extractVideoId", () => {
  it("reads the v parameter wherever it appears", () => {
    expect(extractVideoId("https://www.youtube.com/watch?v=abc123")).toBe("abc123");
    expect(extractVideoId("https://www.youtube.com/watch?t=10&v=xyz&list=L")).toBe("xyz");
    expect(extractVideoId("https://www.youtube.com/watch?v=abc#t=5")).toBe("abc");
  });

  it("returns null when there is no v parameter", () => {
    expect(extractVideoId("https://www.youtube.com/channel/UC1")).toBeNull();
    expect(extractVideoId("")).toBeNull();
  });
});

describe("parseTakeoutHistory", () => {
  it("maps a watch entry to a record", () => {
    const { records } = parseTakeoutHistory([watch("abc")]);
    expect(records).toEqual([
      {
        videoId: "abc",
        title: "Video abc",
        videoUrl: "https://www.youtube.com/watch?v=abc",
        channelName: "Maker Lab",
        channelUrl: "https://www.youtube.com/channel/UC1",
        watchTimestamp: new Date("2025-02-03T04:05:06.000Z"),
      },
    ]);
  });

  it("skips non-YouTube entries and entries without a video id", () => {
    const result = parseTakeoutHistory([
      watch("a"),
      { ...watch("b"), header: "YouTube Music" },
      watch("c", { titleUrl: "https://www.youtube.com/post/123" }),
      watch("d", { titleUrl: undefined }),
      "not an object",
    ]);

    expect(result.records.map((r) => r.videoId)).toEqual(["a"]);
    expect(result.totalEntries).toBe(5);
    expect(result.skipped).toBe(4);
    expect(result.duplicates).toBe(0);
  });

  it("keeps the first occurrence of a repeated video", () => {
    const result = parseTakeoutHistory([
      watch("a", { time: "2025-03-01T00:00:00Z" }),
      watch("a", { time: "2025-01-01T00:00:00Z" }),
      watch("b"),
    ]);

    expect(result.records.map((r) => r.videoId)).toEqual(["a", "b"]);
    expect(result.records[0]?.watchTimestamp).toEqual(new Date("2025-03-01T00:00:00Z"));
    expect(result.duplicates).toBe(1);
  });

  it("defaults missing channel and time fields", () => {
    const { records } = parseTakeoutHistory([
      watch("a", { subtitles: undefined, time: "yesterday" }),
    ]);
    expect(records[0]).toMatchObject({
      channelName: "Unknown",
      channelUrl: "",
      watchTimestamp: null,
    });
  });

  it("only strips a leading Watched prefix", () => {
    const { records } = parseTakeoutHistory([
      watch("a", { title: "I Watched Every Episode" }),
      watch("b", { title: undefined }),
    ]);
    expect(records.map((r) => r.title)).toEqual(["I Watched Every Episode", ""]);
  });

  it("rejects a document that is not an array", () => {
    expect(() => parseTakeoutHistory({ items: [] })).toThrow(ValidationError);
    expect(() => parseTakeoutHistory({ items: [] })).toThrow(
      "Watch history must be a JSON array of activity entries",
    );
  });
});
