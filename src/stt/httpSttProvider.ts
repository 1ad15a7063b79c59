import { readFile } from "node:fs/promises";
import { Dispatcher, request } from "undici";
import { EncodedAudio, ISttProvider, RawTranscript } from "../types/contracts";
import { AuthError, NetworkError, ServiceError, describeError } from "../types/errors";
import { extractPcm16FromWav } from "../audio/wav";
import { sanitizeForLog } from "../utils";

interface HttpSttProviderOptions {
  endpoint: string;
  token?: string;
  timeoutMs: number;
  dispatcher?: Dispatcher;
}

/**
 * Talks to a self-hosted transcription endpoint that accepts base64 PCM16
 * and answers with `{ "text": "..." }`.
 */
export class HttpSttProvider implements ISttProvider {
  constructor(private readonly options: HttpSttProviderOptions) {}

  async transcribe(audio: EncodedAudio): Promise<RawTranscript> {
    const pcm16 = extractPcm16FromWav(await readFile(audio.wavPath));
    if (pcm16.length === 0) {
      return { text: "" };
    }

    const body = {
      audioBase64: pcm16.toString("base64"),
      sampleRateHz: audio.sampleRateHz,
      channels: audio.channels
    };

    let res: Dispatcher.ResponseData;
    try {
      res = await request(this.options.endpoint, {
        method: "POST",
        headers: this.buildHeaders(),
        body: JSON.stringify(body),
        headersTimeout: this.options.timeoutMs,
        bodyTimeout: this.options.timeoutMs,
        dispatcher: this.options.dispatcher
      });
    } catch (error) {
      throw new NetworkError(`HTTP STT unreachable: ${describeError(error)}`, { cause: error });
    }

    if (res.statusCode === 401 || res.statusCode === 403) {
      await res.body.dump();
      throw new AuthError(`HTTP STT rejected the token (${res.statusCode})`, res.statusCode);
    }

    if (res.statusCode < 200 || res.statusCode >= 300) {
      const excerpt = sanitizeForLog(await res.body.text()).slice(0, 300);
      throw new ServiceError(`HTTP STT failed (${res.statusCode})`, res.statusCode, excerpt);
    }

    const payload: unknown = await res.body.json();
    return { text: readText(payload) };
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = { "content-type": "application/json" };
    if (this.options.token) {
      headers.authorization = `Bearer ${this.options.token}`;
    }
    return headers;
  }
}

function readText(payload: unknown): string {
  if (!payload || typeof payload !== "object" || !("text" in payload)) {
    throw new ServiceError("HTTP STT returned no text field.", undefined);
  }
  return typeof payload.text === "string" ? payload.text : "";
}
