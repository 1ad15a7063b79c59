import OpenAI, { toFile } from "openai";
import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { EncodedAudio, ISttProvider, RawTranscript } from "../types/contracts";
import {
  AuthError,
  NetworkError,
  ServiceError,
  VoiceLedgerError,
  describeError
} from "../types/errors";
import { sanitizeForLog } from "../utils";

export type AudioUpload = Awaited<ReturnType<typeof toFile>>;

export interface TranscriptionRequest {
  file: AudioUpload;
  model: string;
  language?: string;
}

export type CreateTranscription = (request: TranscriptionRequest) => Promise<string>;

interface OpenAiSttProviderOptions {
  apiKey: string;
  model: string;
  language?: string;
  baseUrl?: string;
  timeoutMs: number;
  createTranscription?: CreateTranscription;
}

export class OpenAiSttProvider implements ISttProvider {
  private readonly createTranscription: CreateTranscription;

  constructor(private readonly options: OpenAiSttProviderOptions) {
    this.createTranscription = options.createTranscription ?? createSdkTranscriber(options);
  }

  async transcribe(audio: EncodedAudio): Promise<RawTranscript> {
    const wavData = await readFile(audio.wavPath);
    const file = await toFile(wavData, basename(audio.wavPath), { type: "audio/wav" });

    try {
      const text = await this.createTranscription({
        file,
        model: this.options.model,
        language: this.options.language || undefined
      });
      return { text };
    } catch (error) {
      throw classifyOpenAiError(error);
    }
  }
}

function createSdkTranscriber(options: OpenAiSttProviderOptions): CreateTranscription {
  const client = new OpenAI({
    apiKey: options.apiKey,
    baseURL: options.baseUrl || undefined,
    timeout: options.timeoutMs,
    maxRetries: 0
  });

  return async ({ file, model, language }) => {
    const transcription = await client.audio.transcriptions.create({ file, model, language });
    return transcription.text;
  };
}

export function classifyOpenAiError(error: unknown): VoiceLedgerError {
  if (error instanceof VoiceLedgerError) {
    return error;
  }

  if (error instanceof OpenAI.APIConnectionError) {
    return new NetworkError(`Transcription service unreachable: ${error.message}`, { cause: error });
  }

  if (error instanceof OpenAI.APIError) {
    const status = error.status;
    const excerpt = sanitizeForLog(error.message).slice(0, 300);
    if (status === 401 || status === 403) {
      return new AuthError(`Transcription service rejected the API key (${status}): ${excerpt}`, status, {
        cause: error
      });
    }
    return new ServiceError(
      `Transcription service failed (${status ?? "no status"}): ${excerpt || "no response body"}`,
      status,
      excerpt,
      { cause: error }
    );
  }

  return new ServiceError(`Transcription failed: ${describeError(error)}`, undefined, "", { cause: error });
}
