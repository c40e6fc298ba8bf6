export type GenerationRequest = {
  readonly model: string;
  /** Sent as the system message. */
  readonly instruction: string;
  /** Sent as the user message. */
  readonly input: string;
  readonly signal?: AbortSignal;
};

/**
 * Text in, text out. Implementations reject with a `BackendError` so callers can tell a timeout or
 * rate limit apart from a malformed response.
 */
export type GenerationBackend = {
  readonly name: string;
  generate: (request: GenerationRequest) => Promise<string>;
};
