import { createWriteStream, mkdirSync } from "node:fs";
import { dirname } from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ClosableLogger extends Logger {
  close(): Promise<void>;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export function formatLogLine(level: LogLevel, message: string, at?: Date): string {
  const line = `[${level}] ${message}`;
  return at ? `${at.toISOString()} ${line}` : line;
}

/**
 * Builds a logger that hands each line at or above `minLevel` to `appendLine`.
 */
export function createLineLogger(
  appendLine: (line: string) => void,
  minLevel: LogLevel = "info",
  withTimestamp = false
): Logger {
  const emit = (level: LogLevel, message: string): void => {
    if (LEVEL_RANK[level] < LEVEL_RANK[minLevel]) {
      return;
    }
    appendLine(formatLogLine(level, message, withTimestamp ? new Date() : undefined));
  };

  return {
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message)
  };
}

export function createFileLogger(filePath: string, minLevel: LogLevel = "info"): ClosableLogger {
  mkdirSync(dirname(filePath), { recursive: true });
  const stream = createWriteStream(filePath, { flags: "a" });
  stream.on("error", (err) => {
    process.stderr.write(`${formatLogLine("error", `Log file unavailable: ${err.message}`)}\n`);
  });

  const logger = createLineLogger((line) => stream.write(`${line}\n`), minLevel, true);
  return {
    ...logger,
    close: () => new Promise<void>((resolve) => stream.end(() => resolve()))
  };
}

export function createNullLogger(): Logger {
  return createLineLogger(() => undefined, "error");
}
