import { HistoryEntry, LedgerTotals } from "../types/contracts";

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local time as `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
    `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`
  );
}

export function formatDuration(durationMinutes: number | undefined): string {
  return durationMinutes === undefined
    ? "(Duration: unknown)"
    : `(Duration: ${durationMinutes.toFixed(2)} min)`;
}

export function formatHistoryEntry(entry: HistoryEntry): string {
  return `${entry.timestamp} ${formatDuration(entry.durationMinutes)}:\n${entry.transcription}\n`;
}

/** Most recent first. */
export function formatHistory(entries: HistoryEntry[]): string {
  return entries.slice().reverse().map(formatHistoryEntry).join("\n");
}

export function formatTotals(totals: LedgerTotals): string {
  return `Total Time: ${totals.totalTimeMinutes.toFixed(2)} min | Total Cost: $${totals.totalCost.toFixed(2)}`;
}
