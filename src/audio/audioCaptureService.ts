import { spawn } from "node:child_process";
import type { Readable } from "node:stream";
import { CapturedWaveform, IAudioCapture } from "../types/contracts";
import { DeviceError, EmptyCaptureError } from "../types/errors";
import { Logger, createNullLogger } from "../logging/logger";
import { binaryExists } from "../utils";
import { computeDurationMinutes } from "./wav";

export type RecorderBackend = "sox" | "arecord" | "ffmpeg";
export type RecorderPreference = RecorderBackend | "auto";

export interface RecorderInfo {
  backend: RecorderBackend;
  binaryPath: string;
}

/** The slice of `ChildProcess` the capture service relies on. */
export interface RecorderProcess {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly killed: boolean;
  kill(signal?: NodeJS.Signals | number): boolean;
  on(event: "error", listener: (err: Error) => void): this;
  once(event: "spawn", listener: () => void): this;
  once(event: "error", listener: (err: Error) => void): this;
  once(event: "close", listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
}

export interface CaptureOptions {
  sampleRateHz: number;
  recorder: RecorderPreference;
  /** How long a freshly spawned recorder must stay alive before the device counts as open. */
  startupGraceMs?: number;
}

export interface CaptureDependencies {
  spawnRecorder?: (binaryPath: string, args: string[]) => RecorderProcess;
  detectRecorder?: (preference: RecorderPreference) => Promise<RecorderInfo | undefined>;
  logger?: Logger;
}

interface RecorderExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

const BYTES_PER_FLOAT = 4;
const DEFAULT_STARTUP_GRACE_MS = 150;

export class RecorderAudioCapture implements IAudioCapture {
  private proc?: RecorderProcess;
  private exited?: Promise<RecorderExit>;
  private blocks: Float32Array[] = [];
  private pending: Buffer = Buffer.alloc(0);
  private stopRequested = false;
  private unexpectedExit?: string;
  private stderrData = "";
  private detectedRecorder?: RecorderInfo;
  private detectionDone = false;
  private readonly spawnRecorder: (binaryPath: string, args: string[]) => RecorderProcess;
  private readonly detect: (preference: RecorderPreference) => Promise<RecorderInfo | undefined>;
  private readonly logger: Logger;

  constructor(private readonly options: CaptureOptions, deps: CaptureDependencies = {}) {
    this.spawnRecorder = deps.spawnRecorder ?? spawnRecorderProcess;
    this.detect = deps.detectRecorder ?? detectRecorder;
    this.logger = deps.logger ?? createNullLogger();
  }

  isRecording(): boolean {
    return this.proc !== undefined;
  }

  async start(): Promise<void> {
    if (this.proc) {
      throw new DeviceError("Already recording.");
    }

    if (!this.detectionDone) {
      this.detectedRecorder = await this.detect(this.options.recorder);
      this.detectionDone = true;
    }
    const recorder = this.detectedRecorder;
    if (!recorder) {
      throw new DeviceError(getInstallInstructions(this.options.recorder));
    }

    this.blocks = [];
    this.pending = Buffer.alloc(0);
    this.stopRequested = false;
    this.unexpectedExit = undefined;
    this.stderrData = "";

    const args = buildRecorderArgs(recorder.backend, this.options.sampleRateHz);
    this.logger.debug(`Spawning ${recorder.binaryPath} ${args.join(" ")}`);
    const proc = this.spawnRecorder(recorder.binaryPath, args);

    const exited = new Promise<RecorderExit>((resolve) => {
      proc.once("close", (code, signal) => {
        if (!isExpectedExit(recorder.backend, this.stopRequested, code, signal)) {
          const msg = this.stderrData.slice(0, 300).trim();
          this.unexpectedExit = `Recording exited with code ${code}${msg ? `: ${msg}` : ""}`;
          this.logger.warn(this.unexpectedExit);
        }
        resolve({ code, signal });
      });
    });

    proc.stdout?.on("data", (chunk: Buffer) => this.appendBlock(chunk));
    proc.stderr?.on("data", (chunk: Buffer) => {
      this.stderrData += chunk.toString();
    });

    await new Promise<void>((resolve, reject) => {
      proc.once("spawn", () => resolve());
      proc.once("error", (err) => {
        reject(new DeviceError(`Recording failed to start: ${err.message}`, { cause: err }));
      });
    });
    proc.on("error", (err) => this.logger.warn(`Recorder error: ${err.message}`));

    // A recorder that cannot open the device exits almost immediately.
    const earlyExit = await Promise.race([
      exited,
      delay(this.options.startupGraceMs ?? DEFAULT_STARTUP_GRACE_MS).then(() => undefined)
    ]);
    if (earlyExit) {
      throw new DeviceError(
        this.unexpectedExit ?? "Recorder exited before recording started. Is the microphone in use?"
      );
    }

    this.proc = proc;
    this.exited = exited;
  }

  async stop(): Promise<CapturedWaveform> {
    const { proc, exited } = this;
    if (!proc || !exited) {
      throw new EmptyCaptureError("Recording was never started.");
    }

    this.stopRequested = true;
    killProc(proc);
    await exited;
    this.proc = undefined;
    this.exited = undefined;

    const samples = concatBlocks(this.blocks);
    this.blocks = [];
    this.pending = Buffer.alloc(0);

    if (samples.length === 0) {
      if (this.unexpectedExit) {
        throw new DeviceError(this.unexpectedExit);
      }
      throw new EmptyCaptureError("No audio captured. Check your microphone permissions.");
    }

    const { sampleRateHz } = this.options;
    return {
      samples,
      sampleRateHz,
      durationMinutes: computeDurationMinutes(samples.length, sampleRateHz)
    };
  }

  async discard(): Promise<void> {
    const { proc, exited } = this;
    if (!proc || !exited) {
      return;
    }
    this.stopRequested = true;
    killProc(proc);
    await exited;
    this.proc = undefined;
    this.exited = undefined;
    this.blocks = [];
    this.pending = Buffer.alloc(0);
  }

  // Runs for every stdout chunk while recording: decode and append, nothing else.
  private appendBlock(chunk: Buffer): void {
    const bytes = this.pending.length > 0 ? Buffer.concat([this.pending, chunk]) : chunk;
    const usable = bytes.length - (bytes.length % BYTES_PER_FLOAT);
    const block = new Float32Array(usable / BYTES_PER_FLOAT);
    for (let i = 0; i < block.length; i++) {
      block[i] = bytes.readFloatLE(i * BYTES_PER_FLOAT);
    }
    if (block.length > 0) {
      this.blocks.push(block);
    }
    this.pending = bytes.subarray(usable);
  }
}

export function concatBlocks(blocks: Float32Array[]): Float32Array {
  let total = 0;
  for (const block of blocks) {
    total += block.length;
  }
  const out = new Float32Array(total);
  let offset = 0;
  for (const block of blocks) {
    out.set(block, offset);
    offset += block.length;
  }
  return out;
}

function spawnRecorderProcess(binaryPath: string, args: string[]): RecorderProcess {
  return spawn(binaryPath, args, { stdio: ["ignore", "pipe", "pipe"] });
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(() => resolve(), ms));
}

function killProc(proc: RecorderProcess): void {
  if (!proc.killed) {
    proc.kill("SIGTERM");
  }
}

export function isExpectedExit(
  backend: RecorderBackend,
  stopRequested: boolean,
  code: number | null,
  signal: NodeJS.Signals | null
): boolean {
  if (code === 0 || (code === null && stopRequested)) {
    return true;
  }
  if (!stopRequested) {
    return false;
  }

  switch (backend) {
    case "arecord":
      return signal === "SIGINT" || signal === "SIGTERM" || code === 1;
    case "ffmpeg":
      return signal === "SIGINT" || signal === "SIGTERM" || code === 255;
    case "sox":
      return signal === "SIGINT" || signal === "SIGTERM";
  }
}

/** Every backend writes raw mono 32-bit float little-endian samples to stdout. */
export function buildRecorderArgs(backend: RecorderBackend, sampleRateHz: number): string[] {
  const rate = String(sampleRateHz);
  switch (backend) {
    case "sox":
      return ["-q", "-d", "-t", "raw", "-e", "floating-point", "-b", "32", "-L", "-r", rate, "-c", "1", "-"];
    case "arecord":
      return ["-q", "-f", "FLOAT_LE", "-r", rate, "-c", "1", "-t", "raw"];
    case "ffmpeg":
      return [
        "-loglevel", "error",
        "-f", getFFmpegInputFormat(), "-i", getFFmpegInputDevice(),
        "-ar", rate, "-ac", "1", "-f", "f32le", "-"
      ];
  }
}

function getFFmpegInputFormat(): string {
  switch (process.platform) {
    case "win32": return "dshow";
    case "darwin": return "avfoundation";
    default: return "pulse";
  }
}

function getFFmpegInputDevice(): string {
  switch (process.platform) {
    case "win32": return "audio=default";
    case "darwin": return ":default";
    default: return "default";
  }
}

export async function detectRecorder(
  preference: RecorderPreference
): Promise<RecorderInfo | undefined> {
  const candidates: RecorderBackend[] = preference === "auto" ? getCandidates() : [preference];

  for (const backend of candidates) {
    if (await binaryExists(backend)) {
      return { backend, binaryPath: backend };
    }
  }
  return undefined;
}

function getCandidates(): RecorderBackend[] {
  switch (process.platform) {
    case "darwin":
      return ["sox", "ffmpeg"];
    case "linux":
      return ["arecord", "sox", "ffmpeg"];
    case "win32":
      return ["ffmpeg", "sox"];
    default:
      return ["sox", "ffmpeg"];
  }
}

function getInstallInstructions(preference: RecorderPreference): string {
  if (preference !== "auto") {
    return `Configured recorder "${preference}" was not found on PATH.`;
  }
  switch (process.platform) {
    case "darwin":
      return "No audio recorder found. Install SoX: brew install sox";
    case "linux":
      return "No audio recorder found. Install arecord (alsa-utils) or SoX: sudo apt install alsa-utils";
    case "win32":
      return "No audio recorder found. Install FFmpeg: winget install ffmpeg";
    default:
      return "No audio recorder found. Install SoX or FFmpeg.";
  }
}
