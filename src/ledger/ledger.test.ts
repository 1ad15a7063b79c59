import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Ledger, computeTotals } from "./ledger";
import { CorruptLedgerError } from "../types/errors";

let tempDir: string;
let ledger: Ledger;

function historyPath(): string {
  return join(tempDir, "transcription_history.json");
}

function transactionsPath(): string {
  return join(tempDir, "transactions.json");
}

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), "voice-ledger-ledger-"));
  ledger = new Ledger({
    historyPath: historyPath(),
    transactionsPath: transactionsPath(),
    costPerMinute: 0.006
  });
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

describe("Ledger", () => {
  it("treats missing files as an empty first-run ledger", async () => {
    expect(await ledger.loadHistory()).toEqual([]);
    expect(await ledger.loadTransactions()).toEqual([]);
    expect(await ledger.totals()).toEqual({ totalTimeMinutes: 0, totalCost: 0 });
  });

  it("records one history entry and one transaction per transcription", async () => {
    const at = new Date(2024, 2, 5, 14, 7, 9);
    const recorded = await ledger.recordTranscription("hello world", 0.5, at);

    expect(recorded.history).toEqual({
      timestamp: "2024-03-05 14:07:09",
      durationMinutes: 0.5,
      transcription: "hello world"
    });
    expect(recorded.transaction.timestamp).toBe("2024-03-05 14:07:09");
    expect(recorded.transaction.durationMinutes).toBe(0.5);
    expect(recorded.transaction.cost).toBeCloseTo(0.003, 10);

    const storedHistory: unknown = JSON.parse(await readFile(historyPath(), "utf8"));
    expect(storedHistory).toEqual([
      { timestamp: "2024-03-05 14:07:09", duration: 0.5, transcription: "hello world" }
    ]);
    const transactions = await ledger.loadTransactions();
    expect(transactions).toHaveLength(1);
    expect(transactions[0].durationMinutes).toBe(recorded.history.durationMinutes);
  });

  it("keeps insertion order across appends", async () => {
    await ledger.recordTranscription("first", 1, new Date(2024, 0, 1, 9, 0, 0));
    await ledger.recordTranscription("second", 2, new Date(2024, 0, 1, 9, 5, 0));

    const history = await ledger.loadHistory();
    expect(history.map((e) => e.transcription)).toEqual(["first", "second"]);
  });

  it("sums time and cost across every stored transaction", async () => {
    await writeFile(
      transactionsPath(),
      JSON.stringify([
        { timestamp: "2024-01-01 10:00:00", duration: 1.0, cost: 0.006 },
        { timestamp: "2024-01-01 11:00:00", duration: 2.5, cost: 0.015 }
      ])
    );

    const totals = await ledger.totals();
    expect(totals.totalTimeMinutes).toBeCloseTo(3.5, 10);
    expect(totals.totalCost).toBeCloseTo(0.021, 10);
  });

  it("returns equal collections from repeated reads", async () => {
    await ledger.recordTranscription("stable", 0.25, new Date(2024, 5, 1, 12, 0, 0));

    expect(await ledger.loadHistory()).toEqual(await ledger.loadHistory());
  });

  it("loads history entries written without a duration", async () => {
    await writeFile(
      historyPath(),
      JSON.stringify([{ timestamp: "2023-12-31 23:59:00", transcription: "legacy" }])
    );

    expect(await ledger.loadHistory()).toEqual([
      { timestamp: "2023-12-31 23:59:00", transcription: "legacy" }
    ]);
  });

  it("leaves legacy entries without a duration key when appending", async () => {
    await writeFile(
      historyPath(),
      JSON.stringify([{ timestamp: "2023-12-31 23:59:00", transcription: "legacy" }])
    );
    await ledger.appendHistory({
      timestamp: "2024-01-01 00:00:00",
      durationMinutes: 0.1,
      transcription: "new"
    });

    const stored: unknown = JSON.parse(await readFile(historyPath(), "utf8"));
    expect(stored).toEqual([
      { timestamp: "2023-12-31 23:59:00", transcription: "legacy" },
      { timestamp: "2024-01-01 00:00:00", duration: 0.1, transcription: "new" }
    ]);
  });

  it("reports malformed JSON instead of discarding it", async () => {
    await writeFile(historyPath(), "{ not json");

    await expect(ledger.loadHistory()).rejects.toBeInstanceOf(CorruptLedgerError);
    await expect(ledger.appendHistory({ timestamp: "t", transcription: "x" })).rejects.toBeInstanceOf(
      CorruptLedgerError
    );
    expect(await readFile(historyPath(), "utf8")).toBe("{ not json");
  });

  it("writes neither file when the transactions file is corrupt", async () => {
    await writeFile(transactionsPath(), "[1,");

    for (let i = 0; i < 3; i++) {
      await expect(ledger.recordTranscription("lost", 0.5, new Date(2024, 0, 1, 9, i, 0))).rejects.toBeInstanceOf(
        CorruptLedgerError
      );
    }

    expect(await ledger.loadHistory()).toEqual([]);
    expect(await readFile(transactionsPath(), "utf8")).toBe("[1,");
  });

  it("reports a ledger that is not an array", async () => {
    await writeFile(transactionsPath(), JSON.stringify({ total: 3 }));

    await expect(ledger.totals()).rejects.toThrow("does not contain a JSON array.");
  });

  it("reports a transaction without a cost", async () => {
    await writeFile(
      transactionsPath(),
      JSON.stringify([{ timestamp: "2024-01-01 10:00:00", duration: 1 }])
    );

    await expect(ledger.loadTransactions()).rejects.toThrow("transaction 0 is malformed.");
  });
});

describe("computeTotals", () => {
  it("folds durations and costs", () => {
    const totals = computeTotals([
      { timestamp: "a", durationMinutes: 1, cost: 0.006 },
      { timestamp: "b", durationMinutes: 0.5, cost: 0.003 }
    ]);

    expect(totals.totalTimeMinutes).toBe(1.5);
    expect(totals.totalCost).toBeCloseTo(0.009, 10);
  });
});
