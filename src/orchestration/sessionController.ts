import {
  CapturedWaveform,
  IAudioCapture,
  ISttProvider,
  ITextSink,
  LedgerTotals,
  SessionObserver,
  SessionState
} from "../types/contracts";
import {
  DeviceError,
  ErrorFactory,
  ServiceError,
  StorageError,
  VoiceLedgerError,
  describeError,
  toVoiceLedgerError
} from "../types/errors";
import { writeWaveformFile } from "../audio/wav";
import { Ledger } from "../ledger/ledger";
import { Logger, createNullLogger } from "../logging/logger";

interface Dependencies {
  audioCapture: IAudioCapture;
  sttProvider: ISttProvider;
  ledger: Ledger;
  waveformPath: string;
  observer?: SessionObserver;
  textSink?: ITextSink;
  logger?: Logger;
  now?: () => Date;
}

interface ActiveSession {
  startedAt: Date;
  durationMinutes: number;
}

type CycleStage = "persist" | "transcribe" | "ledger";

const asDeviceError: ErrorFactory = (message, cause) => new DeviceError(message, { cause });

const STAGE_FALLBACKS: Record<CycleStage, ErrorFactory> = {
  persist: (message, cause) => new StorageError(`Could not write the recording: ${message}`, { cause }),
  transcribe: (message, cause) => new ServiceError(`Transcription failed: ${message}`, undefined, "", { cause }),
  ledger: (message, cause) => new StorageError(`Could not update the ledger: ${message}`, { cause })
};

/**
 * Drives one capture → transcribe → ledger cycle at a time:
 * ready → recording → processing → ready, with failures passing
 * through `failed` on their way back to ready.
 */
export class SessionController {
  private currentState: SessionState = "ready";
  private starting = false;
  private inFlight?: Promise<void>;
  private lastText?: string;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly deps: Dependencies) {
    this.logger = deps.logger ?? createNullLogger();
    this.now = deps.now ?? (() => new Date());
  }

  get state(): SessionState {
    return this.currentState;
  }

  /** The most recent successful transcription; failures never clear it. */
  get lastTranscription(): string | undefined {
    return this.lastText;
  }

  async start(): Promise<void> {
    if (this.currentState !== "ready" || this.starting || this.inFlight) {
      this.logger.debug(`Start ignored in state ${this.currentState}.`);
      return;
    }

    this.starting = true;
    try {
      await this.deps.audioCapture.start();
    } catch (error) {
      const failure = toVoiceLedgerError(error, asDeviceError);
      this.logger.warn(`Could not start recording (${failure.kind}): ${failure.message}`);
      this.publishError(failure);
      return;
    } finally {
      this.starting = false;
    }

    this.logger.info("Recording started.");
    this.setState("recording");
  }

  /**
   * Ends the recording and runs the rest of the cycle. While a cycle is in
   * flight every call returns that cycle's promise and starts nothing new.
   */
  stop(): Promise<void> {
    if (this.inFlight) {
      this.logger.debug("Stop ignored: a cycle is already in flight.");
      return this.inFlight;
    }
    if (this.currentState !== "recording") {
      this.logger.debug(`Stop ignored in state ${this.currentState}.`);
      return Promise.resolve();
    }

    return this.track(this.runCycle());
  }

  /** Start when ready, stop when recording, otherwise ignore. */
  toggle(): Promise<void> {
    return this.currentState === "recording" ? this.stop() : this.start();
  }

  /** Drops the current recording without transcribing it. */
  cancel(): Promise<void> {
    if (this.inFlight || this.currentState !== "recording") {
      this.logger.debug(`Cancel ignored in state ${this.currentState}.`);
      return this.inFlight ?? Promise.resolve();
    }

    return this.track(this.discardRecording());
  }

  async refreshTotals(): Promise<LedgerTotals | undefined> {
    try {
      return await this.publishTotals();
    } catch (error) {
      const failure = toVoiceLedgerError(error, STAGE_FALLBACKS.ledger);
      this.logger.warn(`Could not load totals (${failure.kind}): ${failure.message}`);
      this.publishError(failure);
      return undefined;
    }
  }

  private track(cycle: Promise<void>): Promise<void> {
    const tracked = cycle.finally(() => {
      this.inFlight = undefined;
    });
    this.inFlight = tracked;
    return tracked;
  }

  private async runCycle(): Promise<void> {
    let waveform: CapturedWaveform;
    try {
      waveform = await this.deps.audioCapture.stop();
    } catch (error) {
      this.fail(toVoiceLedgerError(error, asDeviceError));
      return;
    }

    const session: ActiveSession = {
      startedAt: this.now(),
      durationMinutes: waveform.durationMinutes
    };
    this.logger.info(`Processing ${session.durationMinutes.toFixed(2)} min of audio.`);
    this.setState("processing");

    let stage: CycleStage = "persist";
    let text = "";
    try {
      const audio = await writeWaveformFile(this.deps.waveformPath, waveform);

      stage = "transcribe";
      const t0 = Date.now();
      const transcript = await this.deps.sttProvider.transcribe(audio);
      text = transcript.text.trim();
      this.logger.info(`Transcribed in ${((Date.now() - t0) / 1000).toFixed(1)}s (${text.length} chars).`);

      stage = "ledger";
      await this.deps.ledger.recordTranscription(text, session.durationMinutes, this.now());
      this.lastText = text;
      await this.publishTotals();
    } catch (error) {
      if (stage === "ledger") {
        // The text is still worth showing even though it was not recorded.
        const unrecorded = text;
        this.lastText = unrecorded;
        this.notify("onTranscriptionReady", (o) => o.onTranscriptionReady?.(unrecorded));
      }
      this.fail(toVoiceLedgerError(error, STAGE_FALLBACKS[stage]));
      return;
    }

    const finalText = text;
    this.notify("onTranscriptionReady", (o) => o.onTranscriptionReady?.(finalText));
    await this.deliver(finalText);
    this.logger.info(`Cycle started at ${session.startedAt.toISOString()} complete.`);
    this.setState("ready");
  }

  private async discardRecording(): Promise<void> {
    try {
      await this.deps.audioCapture.discard();
      this.logger.info("Recording discarded.");
    } catch (error) {
      const failure = toVoiceLedgerError(error, asDeviceError);
      this.logger.warn(`Discard failed (${failure.kind}): ${failure.message}`);
      this.publishError(failure);
    }
    this.setState("ready");
  }

  private async publishTotals(): Promise<LedgerTotals> {
    const totals = await this.deps.ledger.totals();
    this.notify("onTotalsChanged", (o) => o.onTotalsChanged?.(totals));
    return totals;
  }

  private async deliver(text: string): Promise<void> {
    if (!this.deps.textSink || !text) {
      return;
    }
    try {
      await this.deps.textSink.insert(text);
    } catch (error) {
      this.logger.warn(`Could not copy transcription: ${describeError(error)}`);
    }
  }

  private fail(error: VoiceLedgerError): void {
    this.logger.warn(`Cycle failed (${error.kind}): ${error.message}`);
    this.setState("failed");
    this.publishError(error);
    this.setState("ready");
  }

  private publishError(error: VoiceLedgerError): void {
    this.notify("onError", (o) => o.onError?.(error.kind, error.message));
  }

  private setState(next: SessionState): void {
    const prev = this.currentState;
    this.currentState = next;
    this.logger.debug(`State ${prev} -> ${next}`);
    this.notify("onStateChanged", (o) => o.onStateChanged?.(next));
  }

  private notify(callback: keyof SessionObserver, invoke: (observer: SessionObserver) => void): void {
    const { observer } = this.deps;
    if (!observer) {
      return;
    }
    try {
      invoke(observer);
    } catch (error) {
      this.logger.error(`Observer ${callback} threw: ${describeError(error)}`);
    }
  }
}
