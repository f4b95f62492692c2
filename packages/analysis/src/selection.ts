import { ConfigurationError } from "@watch-audit/shared";
import type { VideoStore } from "./store/videoStore.js";
import type { Selection, WorkItem } from "./types.js";

/**
 * Resolves a selection against the store. `ids` returns the named rows in any
 * status; `limit` and `all` only ever return `PENDING` rows, which is what
 * makes a re-run skip work already done.
 */
export async function selectWorkItems(
  store: VideoStore,
  selection: Selection,
): Promise<WorkItem[]> {
  switch (selection.mode) {
    case "ids":
      return store.selectByIds(selection.ids);
    case "limit":
      if (!Number.isInteger(selection.limit) || selection.limit < 1) {
        throw new ConfigurationError(
          `--limit must be a positive integer, got ${selection.limit}`,
        );
      }
      return store.selectPending(selection.limit);
    case "all":
      return store.selectPending();
  }
}
