import { readFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import { ConfigError, describeError, isMissingFileError } from "../types/errors";
import { LOG_LEVELS, LogLevel } from "../logging/logger";
import type { RecorderPreference } from "../audio/audioCaptureService";

export type SttProviderKind = "openai" | "http";

export const STT_PROVIDERS: readonly SttProviderKind[] = ["openai", "http"];
export const RECORDER_PREFERENCES: readonly RecorderPreference[] = ["auto", "sox", "arecord", "ffmpeg"];

export const DEFAULT_SAMPLE_RATE_HZ = 44100;
export const DEFAULT_COST_PER_MINUTE = 0.006;
export const SETTINGS_FILE_NAME = "voice-ledger.json";

export interface VoiceLedgerSettings {
  dataDir: string;
  settingsPath: string;
  audioFilePath: string;
  sampleRateHz: number;
  recorder: RecorderPreference;
  historyPath: string;
  transactionsPath: string;
  costPerMinute: number;
  sttProvider: SttProviderKind;
  sttModel: string;
  sttLanguage: string;
  sttBaseUrl: string;
  sttHttpEndpoint: string;
  sttTimeoutMs: number;
  copyToClipboard: boolean;
  logFilePath: string;
  logLevel: LogLevel;
}

export interface ReadSettingsOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/** Flat `"section.key": value` map, like an editor settings file. */
class SettingsSource {
  constructor(private readonly values: Record<string, unknown>, private readonly origin: string) {}

  has(key: string): boolean {
    return this.values[key] !== undefined;
  }

  getString(key: string, fallback: string): string {
    const value = this.values[key];
    if (value === undefined) {
      return fallback;
    }
    if (typeof value !== "string") {
      throw this.invalid(key, "a string");
    }
    return value;
  }

  getNumber(key: string, fallback: number, min = Number.NEGATIVE_INFINITY): number {
    const value = this.values[key];
    if (value === undefined) {
      return fallback;
    }
    const n = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
    if (typeof n !== "number" || !Number.isFinite(n) || n < min) {
      throw this.invalid(key, `a number >= ${min}`);
    }
    return n;
  }

  getBoolean(key: string, fallback: boolean): boolean {
    const value = this.values[key];
    if (value === undefined) {
      return fallback;
    }
    if (typeof value !== "boolean") {
      throw this.invalid(key, "true or false");
    }
    return value;
  }

  getChoice<T extends string>(key: string, choices: readonly T[], fallback: T): T {
    const value = this.values[key];
    if (value === undefined) {
      return fallback;
    }
    const match = choices.find((choice) => choice === value);
    if (match === undefined) {
      throw this.invalid(key, `one of ${choices.join(", ")}`);
    }
    return match;
  }

  private invalid(key: string, expected: string): ConfigError {
    return new ConfigError(`Setting "${key}" in ${this.origin} must be ${expected}.`);
  }
}

export async function readSettings(options: ReadSettingsOptions = {}): Promise<VoiceLedgerSettings> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  const envDataDir = env.VOICE_LEDGER_DATA_DIR ? resolve(cwd, env.VOICE_LEDGER_DATA_DIR) : undefined;
  const settingsPath = env.VOICE_LEDGER_CONFIG
    ? resolve(cwd, env.VOICE_LEDGER_CONFIG)
    : join(envDataDir ?? cwd, SETTINGS_FILE_NAME);

  const values = await loadSettingsFile(settingsPath);
  if (env.VOICE_LEDGER_STT_PROVIDER) {
    values["stt.provider"] = env.VOICE_LEDGER_STT_PROVIDER;
  }
  if (env.VOICE_LEDGER_STT_ENDPOINT) {
    values["stt.httpEndpoint"] = env.VOICE_LEDGER_STT_ENDPOINT;
  }

  const cfg = new SettingsSource(values, settingsPath);
  const dataDir =
    envDataDir ?? (cfg.has("dataDir") ? resolve(dirname(settingsPath), cfg.getString("dataDir", ".")) : cwd);
  const inDataDir = (name: string) => resolve(dataDir, name);

  return {
    dataDir,
    settingsPath,
    audioFilePath: inDataDir(cfg.getString("audio.fileName", "output.wav")),
    sampleRateHz: cfg.getNumber("audio.sampleRateHz", DEFAULT_SAMPLE_RATE_HZ, 8000),
    recorder: cfg.getChoice("audio.recorder", RECORDER_PREFERENCES, "auto"),
    historyPath: inDataDir(cfg.getString("ledger.historyFile", "transcription_history.json")),
    transactionsPath: inDataDir(cfg.getString("ledger.transactionsFile", "transactions.json")),
    costPerMinute: cfg.getNumber("ledger.costPerMinute", DEFAULT_COST_PER_MINUTE, 0),
    sttProvider: cfg.getChoice("stt.provider", STT_PROVIDERS, "openai"),
    sttModel: cfg.getString("stt.model", "whisper-1"),
    sttLanguage: cfg.getString("stt.language", ""),
    sttBaseUrl: cfg.getString("stt.baseUrl", ""),
    sttHttpEndpoint: cfg.getString("stt.httpEndpoint", "http://127.0.0.1:8765/transcribe"),
    sttTimeoutMs: cfg.getNumber("stt.timeoutMs", 60000, 1),
    copyToClipboard: cfg.getBoolean("copyToClipboard", true),
    logFilePath: inDataDir(cfg.getString("log.file", "voice-ledger.log")),
    logLevel: cfg.getChoice("log.level", LOG_LEVELS, "info")
  };
}

async function loadSettingsFile(settingsPath: string): Promise<Record<string, unknown>> {
  let raw: string;
  try {
    raw = await readFile(settingsPath, "utf8");
  } catch (error) {
    if (isMissingFileError(error)) {
      return {};
    }
    throw new ConfigError(`Cannot read ${settingsPath}: ${describeError(error)}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`${settingsPath} is not valid JSON: ${describeError(error)}`, { cause: error });
  }

  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ConfigError(`${settingsPath} must contain a JSON object.`);
  }
  return Object.fromEntries(Object.entries(parsed));
}
