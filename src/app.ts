import { RecorderAudioCapture } from "./audio/audioCaptureService";
import { loadApiKey, loadHttpToken } from "./config/secrets";
import { VoiceLedgerSettings } from "./config/settings";
import { ClipboardWriter } from "./inject/clipboardWriter";
import { Ledger } from "./ledger/ledger";
import { Logger } from "./logging/logger";
import { SessionController } from "./orchestration/sessionController";
import { HttpSttProvider } from "./stt/httpSttProvider";
import { OpenAiSttProvider } from "./stt/openAiSttProvider";
import { ISttProvider, SessionObserver } from "./types/contracts";

export function createLedger(settings: VoiceLedgerSettings): Ledger {
  return new Ledger({
    historyPath: settings.historyPath,
    transactionsPath: settings.transactionsPath,
    costPerMinute: settings.costPerMinute
  });
}

/**
 * Each provider reads only its own credential: the OpenAI key is required for
 * `openai` and never sent to the self-hosted endpoint.
 */
export function createSttProvider(settings: VoiceLedgerSettings, env: NodeJS.ProcessEnv): ISttProvider {
  if (settings.sttProvider === "http") {
    return new HttpSttProvider({
      endpoint: settings.sttHttpEndpoint,
      token: loadHttpToken(env),
      timeoutMs: settings.sttTimeoutMs
    });
  }

  return new OpenAiSttProvider({
    apiKey: loadApiKey(env),
    model: settings.sttModel,
    language: settings.sttLanguage,
    baseUrl: settings.sttBaseUrl,
    timeoutMs: settings.sttTimeoutMs
  });
}

export function createSessionController(
  settings: VoiceLedgerSettings,
  sttProvider: ISttProvider,
  observer: SessionObserver,
  logger: Logger
): SessionController {
  return new SessionController({
    audioCapture: new RecorderAudioCapture(
      { sampleRateHz: settings.sampleRateHz, recorder: settings.recorder },
      { logger }
    ),
    sttProvider,
    ledger: createLedger(settings),
    waveformPath: settings.audioFilePath,
    textSink: settings.copyToClipboard ? new ClipboardWriter() : undefined,
    observer,
    logger
  });
}
