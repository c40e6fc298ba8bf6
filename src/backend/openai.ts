import OpenAI from "openai";
import { z } from "zod";

import { BackendError, type BackendErrorKind } from "../errors.js";
import { getOpenAiClient } from "../openai/client.js";
import { getErrorText, getStatusCode, isOverloadError } from "../utils/retry.js";

import type { GenerationBackend, GenerationRequest } from "./types.js";

export type ChatMessage = {
  readonly role: "system" | "user";
  readonly content: string;
};

export type ChatCompletionCreate = (
  body: { model: string; messages: ChatMessage[] },
  options?: { signal?: AbortSignal },
) => Promise<unknown>;

export type OpenAiBackendOptions =
  | {
      readonly apiKey: string;
      readonly baseUrl?: string;
      readonly timeoutMs?: number;
    }
  | {
      /** Replaces the SDK call; used by tests and alternative transports. */
      readonly createChatCompletion: ChatCompletionCreate;
    };

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string(),
        }),
      }),
    )
    .min(1),
});

export function buildChatMessages(request: GenerationRequest): ChatMessage[] {
  return [
    { role: "system", content: request.instruction },
    { role: "user", content: request.input },
  ];
}

/**
 * Returns the first choice's text verbatim.
 */
export function extractFirstCompletionText(response: unknown): string {
  const parsed = chatCompletionSchema.safeParse(response);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new BackendError(`Malformed chat completion response (${detail}).`, "malformed_response");
  }
  const [first] = parsed.data.choices;
  if (!first) {
    throw new BackendError("Chat completion response has no choices.", "malformed_response");
  }
  return first.message.content;
}

function classifyOpenAiError(error: unknown): BackendErrorKind {
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return "timeout";
  }
  const status = getStatusCode(error);
  if (status === 401 || status === 403) {
    return "authentication";
  }
  if (status === 408) {
    return "timeout";
  }
  if (isOverloadError(error)) {
    return "rate_limit";
  }
  const text = getErrorText(error);
  if (text.includes("timeout") || text.includes("timed out") || text.includes("und_err_")) {
    return "timeout";
  }
  return "request_failed";
}

export function toBackendError(error: unknown): BackendError {
  if (error instanceof BackendError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new BackendError(message, classifyOpenAiError(error), {
    cause: error,
    status: getStatusCode(error),
  });
}

function resolveChatCompletionCreate(options: OpenAiBackendOptions): ChatCompletionCreate {
  if ("createChatCompletion" in options) {
    return options.createChatCompletion;
  }
  const client = getOpenAiClient(options);
  return (body, requestOptions) => client.chat.completions.create(body, requestOptions);
}

export function createOpenAiBackend(options: OpenAiBackendOptions): GenerationBackend {
  const createChatCompletion = resolveChatCompletionCreate(options);

  return {
    name: "openai",
    generate: async (request) => {
      let response: unknown;
      try {
        response = await createChatCompletion(
          { model: request.model, messages: buildChatMessages(request) },
          request.signal ? { signal: request.signal } : undefined,
        );
      } catch (error: unknown) {
        throw toBackendError(error);
      }
      return extractFirstCompletionText(response);
    },
  };
}
