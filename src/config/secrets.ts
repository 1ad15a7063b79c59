import { ConfigError } from "../types/errors";

export const API_KEY_ENV = "OPENAI_API_KEY";

/** Read once at startup; a missing key stops the process before anything records. */
export function loadApiKey(env: NodeJS.ProcessEnv = process.env): string {
  const apiKey = env[API_KEY_ENV]?.trim();
  if (!apiKey) {
    throw new ConfigError(`${API_KEY_ENV} environment variable is not set.`);
  }
  return apiKey;
}

export const HTTP_TOKEN_ENV = "VOICE_LEDGER_STT_HTTP_TOKEN";

/** Optional bearer token for a self-hosted endpoint; never falls back to the OpenAI key. */
export function loadHttpToken(env: NodeJS.ProcessEnv = process.env): string | undefined {
  return env[HTTP_TOKEN_ENV]?.trim() || undefined;
}
