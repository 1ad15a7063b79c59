import { describe, expect, it } from "vitest";
import { formatDuration, formatHistory, formatTimestamp, formatTotals } from "./format";
import { HistoryEntry } from "../types/contracts";

describe("formatTimestamp", () => {
  it("renders local time with zero padding", () => {
    expect(formatTimestamp(new Date(2024, 0, 9, 8, 5, 3))).toBe("2024-01-09 08:05:03");
  });
});

describe("formatDuration", () => {
  it("shows minutes with two decimals", () => {
    expect(formatDuration(0.5)).toBe("(Duration: 0.50 min)");
  });

  it("shows unknown when the entry predates durations", () => {
    expect(formatDuration(undefined)).toBe("(Duration: unknown)");
  });
});

describe("formatHistory", () => {
  it("lists the most recent entry first", () => {
    const entries: HistoryEntry[] = [
      { timestamp: "2024-01-01 10:00:00", durationMinutes: 1, transcription: "first" },
      { timestamp: "2024-01-02 10:00:00", transcription: "second" }
    ];

    expect(formatHistory(entries)).toBe(
      "2024-01-02 10:00:00 (Duration: unknown):\nsecond\n\n" +
        "2024-01-01 10:00:00 (Duration: 1.00 min):\nfirst\n"
    );
    expect(entries[0].transcription).toBe("first");
  });
});

describe("formatTotals", () => {
  it("rounds time and cost to two decimals", () => {
    expect(formatTotals({ totalTimeMinutes: 3.5, totalCost: 0.021 })).toBe(
      "Total Time: 3.50 min | Total Cost: $0.02"
    );
  });
});
