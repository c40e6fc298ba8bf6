import OpenAI from "openai";
import { Agent, fetch as undiciFetch } from "undici";

export const DEFAULT_OPENAI_TIMEOUT_MS = 2 * 60_000;
export const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com/v1";

export type OpenAiClientOptions = {
  readonly apiKey: string;
  readonly baseUrl?: string;
  readonly timeoutMs?: number;
};

const cachedClients = new Map<string, OpenAI>();
const cachedFetchByTimeout = new Map<number, typeof fetch>();

export function resolveOpenAiTimeoutMs(value: number | undefined): number {
  return value !== undefined && Number.isFinite(value) && value > 0
    ? value
    : DEFAULT_OPENAI_TIMEOUT_MS;
}

function getOpenAiFetch(timeoutMs: number): typeof fetch {
  const existing = cachedFetchByTimeout.get(timeoutMs);
  if (existing) {
    return existing;
  }

  const dispatcher = new Agent({
    bodyTimeout: timeoutMs,
    headersTimeout: timeoutMs,
  });
  const created = ((input: any, init?: any) => {
    return undiciFetch(input, {
      ...(init ?? {}),
      dispatcher,
    });
  }) as typeof fetch;
  cachedFetchByTimeout.set(timeoutMs, created);
  return created;
}

/**
 * SDK-level retries are disabled; retrying is the job of the retrying backend wrapper.
 */
export function getOpenAiClient(options: OpenAiClientOptions): OpenAI {
  const apiKey = options.apiKey.trim();
  if (!apiKey) {
    throw new Error("An OpenAI API key must be provided to access OpenAI APIs.");
  }
  const baseURL = options.baseUrl?.trim() || DEFAULT_OPENAI_BASE_URL;
  const timeoutMs = resolveOpenAiTimeoutMs(options.timeoutMs);
  const cacheKey = `${baseURL}\u0000${timeoutMs}\u0000${apiKey}`;
  const existing = cachedClients.get(cacheKey);
  if (existing) {
    return existing;
  }

  const client = new OpenAI({
    apiKey,
    baseURL,
    fetch: getOpenAiFetch(timeoutMs),
    timeout: timeoutMs,
    maxRetries: 0,
  });
  cachedClients.set(cacheKey, client);
  return client;
}
