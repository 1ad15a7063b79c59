import * as readline from "node:readline";
import { createLedger, createSessionController, createSttProvider } from "./app";
import { VoiceLedgerSettings, readSettings } from "./config/settings";
import { formatHistory, formatHistoryEntry, formatTotals } from "./ledger/format";
import { searchHistory } from "./ledger/historySearch";
import { createFileLogger } from "./logging/logger";
import { ISttProvider, SessionObserver, SessionState } from "./types/contracts";
import { VoiceLedgerError, describeError } from "./types/errors";

export interface OutputStream {
  write(chunk: string): boolean;
}

export interface CliIo {
  stdin: NodeJS.ReadableStream;
  stdout: OutputStream;
  stderr: OutputStream;
  env: NodeJS.ProcessEnv;
  cwd: string;
}

const USAGE = `Usage: voice-ledger <command>

Commands:
  record                 Record from the microphone and transcribe each take
  history [--limit N]    Show past transcriptions, most recent first
  totals                 Show total recorded time and cost
  search <query> [--limit N]
                         Fuzzy-search past transcriptions
`;

const STATUS_LABELS: Record<SessionState, string> = {
  ready: "Ready",
  recording: "Recording... (Enter to stop, c + Enter to cancel)",
  processing: "Processing...",
  failed: "Transcription failed"
};

interface ParsedArgs {
  command?: string;
  positionals: string[];
  limit?: number;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const positionals: string[] = [];
  let limit: number | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--limit") {
      const value = Number(argv[i + 1]);
      if (!Number.isInteger(value) || value < 1) {
        throw new UsageError("--limit needs a positive integer.");
      }
      limit = value;
      i++;
      continue;
    }
    positionals.push(arg);
  }

  const [command, ...rest] = positionals;
  return { command, positionals: rest, limit };
}

class UsageError extends Error {}

function defaultIo(): CliIo {
  return {
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
    env: process.env,
    cwd: process.cwd()
  };
}

export async function main(argv: string[], io: CliIo = defaultIo()): Promise<number> {
  try {
    const args = parseArgs(argv);
    switch (args.command) {
      case "record": {
        const settings = await readSettings({ env: io.env, cwd: io.cwd });
        // A missing credential stops here, before the log file or the recorder is touched.
        const sttProvider = createSttProvider(settings, io.env);
        return await runRecord(settings, sttProvider, io);
      }
      case "history":
        return await runHistory(await readSettings({ env: io.env, cwd: io.cwd }), args.limit, io);
      case "totals":
        return await runTotals(await readSettings({ env: io.env, cwd: io.cwd }), io);
      case "search":
        return await runSearch(
          await readSettings({ env: io.env, cwd: io.cwd }),
          args.positionals.join(" "),
          args.limit,
          io
        );
      case undefined:
      case "help":
      case "--help":
        io.stdout.write(USAGE);
        return args.command === undefined ? 1 : 0;
      default:
        throw new UsageError(`Unknown command "${args.command}".`);
    }
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr.write(`${error.message}\n\n${USAGE}`);
      return 1;
    }
    if (error instanceof VoiceLedgerError) {
      io.stderr.write(`${error.kind}: ${error.message}\n`);
      return 1;
    }
    io.stderr.write(`Unexpected error: ${describeError(error)}\n`);
    return 1;
  }
}

async function runHistory(settings: VoiceLedgerSettings, limit: number | undefined, io: CliIo): Promise<number> {
  const history = await createLedger(settings).loadHistory();
  if (history.length === 0) {
    io.stdout.write("No transcriptions yet.\n");
    return 0;
  }
  const shown = limit === undefined ? history : history.slice(-limit);
  io.stdout.write(formatHistory(shown));
  return 0;
}

async function runTotals(settings: VoiceLedgerSettings, io: CliIo): Promise<number> {
  const totals = await createLedger(settings).totals();
  io.stdout.write(`${formatTotals(totals)}\n`);
  return 0;
}

async function runSearch(
  settings: VoiceLedgerSettings,
  query: string,
  limit: number | undefined,
  io: CliIo
): Promise<number> {
  if (!query.trim()) {
    throw new UsageError("search needs a query.");
  }
  const matches = searchHistory(await createLedger(settings).loadHistory(), query, limit);
  if (matches.length === 0) {
    io.stdout.write(`No transcriptions match "${query}".\n`);
    return 0;
  }
  io.stdout.write(matches.map(formatHistoryEntry).join("\n"));
  return 0;
}

async function runRecord(settings: VoiceLedgerSettings, sttProvider: ISttProvider, io: CliIo): Promise<number> {
  const logger = createFileLogger(settings.logFilePath, settings.logLevel);
  const print = (line: string) => io.stdout.write(`${line}\n`);

  const observer: SessionObserver = {
    onStateChanged: (state) => print(STATUS_LABELS[state]),
    onTranscriptionReady: (text) => print(`\nTranscription:\n${text || "(no speech detected)"}\n`),
    onError: (kind, message) => io.stderr.write(`${kind}: ${message}\n`),
    onTotalsChanged: (totals) => print(formatTotals(totals))
  };

  const controller = createSessionController(settings, sttProvider, observer, logger);
  logger.info(`Session opened (data dir ${settings.dataDir}, provider ${settings.sttProvider}).`);
  await controller.refreshTotals();
  print("Press Enter to start or stop recording, q + Enter to quit.");

  const rl = readline.createInterface({ input: io.stdin });
  try {
    for await (const line of rl) {
      const input = line.trim().toLowerCase();
      if (input === "q") {
        break;
      }
      if (input === "c") {
        await controller.cancel();
        continue;
      }
      // Not awaited: the prompt keeps reading while a cycle is processing.
      controller.toggle().catch((error: unknown) => {
        logger.error(`Toggle failed: ${describeError(error)}`);
      });
    }
  } finally {
    rl.close();
    // Drop a recording in progress and wait for a cycle in flight.
    await controller.cancel();
    logger.info("Session closed.");
    await logger.close();
  }
  return 0;
}
