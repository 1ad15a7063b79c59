import Fuse, { type IFuseOptions } from "fuse.js";
import { HistoryEntry } from "../types/contracts";
import { clampInt } from "../utils";

const HISTORY_FUSE_OPTIONS: IFuseOptions<HistoryEntry> = {
  threshold: 0.4,
  ignoreLocation: true,
  keys: [
    { name: "transcription", weight: 0.9 },
    { name: "timestamp", weight: 0.1 }
  ]
};

export const MAX_SEARCH_RESULTS = 50;

export function searchHistory(
  entries: HistoryEntry[],
  query: string,
  maxResults = 10
): HistoryEntry[] {
  const trimmed = query.trim();
  if (!trimmed) {
    return [];
  }

  return new Fuse(entries, HISTORY_FUSE_OPTIONS)
    .search(trimmed)
    .map((result) => result.item)
    .slice(0, clampInt(maxResults, 1, MAX_SEARCH_RESULTS));
}
