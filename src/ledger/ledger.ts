import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { HistoryEntry, LedgerTotals, TransactionEntry } from "../types/contracts";
import {
  CorruptLedgerError,
  StorageError,
  describeError,
  isMissingFileError
} from "../types/errors";
import { formatTimestamp } from "./format";

export interface LedgerOptions {
  historyPath: string;
  transactionsPath: string;
  costPerMinute: number;
}

export interface RecordedTranscription {
  history: HistoryEntry;
  transaction: TransactionEntry;
}

/** On-disk shape, kept compatible with ledgers written by earlier releases. */
interface StoredHistoryEntry {
  timestamp: string;
  duration?: number;
  transcription: string;
}

interface StoredTransactionEntry {
  timestamp: string;
  duration: number;
  cost: number;
}

/**
 * Append-only history and transaction stores. Every append re-reads the
 * whole collection and rewrites it; nothing is cached between calls.
 */
export class Ledger {
  constructor(private readonly options: LedgerOptions) {}

  get costPerMinute(): number {
    return this.options.costPerMinute;
  }

  async loadHistory(): Promise<HistoryEntry[]> {
    const { historyPath } = this.options;
    const raw = await readCollection(historyPath);
    return raw.map((entry, index) => parseHistoryEntry(entry, historyPath, index));
  }

  async loadTransactions(): Promise<TransactionEntry[]> {
    const { transactionsPath } = this.options;
    const raw = await readCollection(transactionsPath);
    return raw.map((entry, index) => parseTransactionEntry(entry, transactionsPath, index));
  }

  async appendHistory(entry: HistoryEntry): Promise<void> {
    const history = await this.loadHistory();
    history.push(entry);
    await writeCollection(this.options.historyPath, history.map(toStoredHistoryEntry));
  }

  async appendTransaction(entry: TransactionEntry): Promise<void> {
    const transactions = await this.loadTransactions();
    transactions.push(entry);
    await writeCollection(this.options.transactionsPath, transactions.map(toStoredTransactionEntry));
  }

  async totals(): Promise<LedgerTotals> {
    return computeTotals(await this.loadTransactions());
  }

  /**
   * Appends the history entry, then the matching transaction. The two files
   * are written separately: a crash between the writes leaves a history
   * entry without its transaction.
   */
  async recordTranscription(
    transcription: string,
    durationMinutes: number,
    at: Date
  ): Promise<RecordedTranscription> {
    const timestamp = formatTimestamp(at);
    const history: HistoryEntry = { timestamp, durationMinutes, transcription };
    const transaction: TransactionEntry = {
      timestamp,
      durationMinutes,
      cost: durationMinutes * this.options.costPerMinute
    };

    // Both files must parse before either is written.
    const [storedHistory, storedTransactions] = await Promise.all([this.loadHistory(), this.loadTransactions()]);
    await writeCollection(this.options.historyPath, [...storedHistory, history].map(toStoredHistoryEntry));
    await writeCollection(
      this.options.transactionsPath,
      [...storedTransactions, transaction].map(toStoredTransactionEntry)
    );
    return { history, transaction };
  }
}

export function computeTotals(transactions: TransactionEntry[]): LedgerTotals {
  return transactions.reduce<LedgerTotals>(
    (acc, t) => ({
      totalTimeMinutes: acc.totalTimeMinutes + t.durationMinutes,
      totalCost: acc.totalCost + t.cost
    }),
    { totalTimeMinutes: 0, totalCost: 0 }
  );
}

async function readCollection(filePath: string): Promise<unknown[]> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    if (isMissingFileError(error)) {
      return [];
    }
    throw new CorruptLedgerError(filePath, `Cannot read ${filePath}: ${describeError(error)}`, {
      cause: error
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new CorruptLedgerError(filePath, `${filePath} is not valid JSON: ${describeError(error)}`, {
      cause: error
    });
  }

  if (!Array.isArray(parsed)) {
    throw new CorruptLedgerError(filePath, `${filePath} does not contain a JSON array.`);
  }
  return parsed;
}

async function writeCollection(filePath: string, entries: unknown[]): Promise<void> {
  const tmpPath = `${filePath}.tmp`;
  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(tmpPath, `${JSON.stringify(entries, null, 2)}\n`, "utf8");
    await rename(tmpPath, filePath);
  } catch (error) {
    throw new StorageError(`Cannot write ${filePath}: ${describeError(error)}`, { cause: error });
  }
}

function asRecord(value: unknown): Record<string, unknown> | undefined {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return undefined;
  }
  return Object.fromEntries(Object.entries(value));
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function parseHistoryEntry(value: unknown, filePath: string, index: number): HistoryEntry {
  const entry = asRecord(value);
  if (!entry) {
    throw new CorruptLedgerError(filePath, `${filePath}: history entry ${index} is not an object.`);
  }

  const { timestamp, transcription, duration } = entry;
  if (typeof timestamp !== "string" || typeof transcription !== "string") {
    throw new CorruptLedgerError(filePath, `${filePath}: history entry ${index} is malformed.`);
  }
  if (duration === undefined || duration === null) {
    return { timestamp, transcription };
  }
  if (!isFiniteNumber(duration)) {
    throw new CorruptLedgerError(filePath, `${filePath}: history entry ${index} has a non-numeric duration.`);
  }
  return { timestamp, durationMinutes: duration, transcription };
}

function parseTransactionEntry(value: unknown, filePath: string, index: number): TransactionEntry {
  const entry = asRecord(value);
  if (!entry) {
    throw new CorruptLedgerError(filePath, `${filePath}: transaction ${index} is not an object.`);
  }

  const { timestamp, duration, cost } = entry;
  if (typeof timestamp !== "string" || !isFiniteNumber(duration) || !isFiniteNumber(cost)) {
    throw new CorruptLedgerError(filePath, `${filePath}: transaction ${index} is malformed.`);
  }
  return { timestamp, durationMinutes: duration, cost };
}

function toStoredHistoryEntry(entry: HistoryEntry): StoredHistoryEntry {
  const { timestamp, durationMinutes, transcription } = entry;
  return durationMinutes === undefined
    ? { timestamp, transcription }
    : { timestamp, duration: durationMinutes, transcription };
}

function toStoredTransactionEntry(entry: TransactionEntry): StoredTransactionEntry {
  return { timestamp: entry.timestamp, duration: entry.durationMinutes, cost: entry.cost };
}
