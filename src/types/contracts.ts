import type { ErrorKind } from "./errors";

export interface CapturedWaveform {
  samples: Float32Array;
  sampleRateHz: number;
  durationMinutes: number;
}

export interface EncodedAudio {
  wavPath: string;
  sampleRateHz: number;
  channels: number;
  durationMinutes: number;
}

export interface RawTranscript {
  text: string;
}

export interface HistoryEntry {
  timestamp: string;
  /** Absent on entries written before durations were tracked. */
  durationMinutes?: number;
  transcription: string;
}

export interface TransactionEntry {
  timestamp: string;
  durationMinutes: number;
  cost: number;
}

export interface LedgerTotals {
  totalTimeMinutes: number;
  totalCost: number;
}

export type SessionState = "ready" | "recording" | "processing" | "failed";

export interface IAudioCapture {
  isRecording(): boolean;
  start(): Promise<void>;
  stop(): Promise<CapturedWaveform>;
  discard(): Promise<void>;
}

export interface ISttProvider {
  transcribe(audio: EncodedAudio): Promise<RawTranscript>;
}

export interface ITextSink {
  insert(text: string): Promise<void>;
}

export interface SessionObserver {
  onStateChanged?(state: SessionState): void;
  onTranscriptionReady?(text: string): void;
  onError?(kind: ErrorKind, message: string): void;
  onTotalsChanged?(totals: LedgerTotals): void;
}
