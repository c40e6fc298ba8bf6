import { BackendError, type BackendErrorKind } from "../errors.js";
import type { Logger } from "../utils/logger.js";
import { createBackoffPolicy, runWithRetry, sleep } from "../utils/retry.js";

import type { GenerationBackend } from "./types.js";

const RETRYABLE_KINDS: ReadonlySet<BackendErrorKind> = new Set(["timeout", "rate_limit"]);

export type RetryingBackendOptions = {
  readonly maxAttempts: number;
  readonly baseDelayMs?: number;
  readonly maxDelayMs?: number;
  /**
   * Per-attempt deadline. The attempt is aborted and surfaces as a `timeout` BackendError.
   */
  readonly timeoutMs?: number;
  readonly logger?: Logger;
  readonly sleep?: (ms: number) => Promise<void>;
};

export function isRetryableBackendError(error: unknown): boolean {
  return error instanceof BackendError && RETRYABLE_KINDS.has(error.kind);
}

async function generateWithDeadline(
  backend: GenerationBackend,
  request: Parameters<GenerationBackend["generate"]>[0],
  timeoutMs: number | undefined,
): Promise<string> {
  if (timeoutMs === undefined || timeoutMs <= 0) {
    return await backend.generate(request);
  }
  const controller = new AbortController();
  const abortFromCaller = (): void => controller.abort(request.signal?.reason);
  request.signal?.addEventListener("abort", abortFromCaller, { once: true });
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  try {
    return await backend.generate({ ...request, signal: controller.signal });
  } catch (error: unknown) {
    if (timedOut) {
      throw new BackendError(`Backend call exceeded ${timeoutMs}ms.`, "timeout", { cause: error });
    }
    throw error;
  } finally {
    clearTimeout(timer);
    request.signal?.removeEventListener("abort", abortFromCaller);
  }
}

/**
 * Wraps a backend with bounded retries. Only `timeout` and `rate_limit` failures are retried;
 * the last error is rethrown unchanged once attempts run out.
 */
export function createRetryingBackend(
  backend: GenerationBackend,
  options: RetryingBackendOptions,
): GenerationBackend {
  const policy = createBackoffPolicy({
    maxAttempts: options.maxAttempts,
    baseDelayMs: options.baseDelayMs,
    maxDelayMs: options.maxDelayMs,
    shouldRetry: isRetryableBackendError,
  });
  return {
    name: `${backend.name}+retry`,
    generate: (request) =>
      runWithRetry(
        () => generateWithDeadline(backend, request, options.timeoutMs),
        policy,
        {
          sleep: options.sleep ?? sleep,
          onRetry: ({ attempt, delayMs, error }) => {
            const kind = error instanceof BackendError ? error.kind : "unknown";
            options.logger?.warn(
              `Backend ${backend.name} attempt ${attempt}/${policy.maxAttempts} failed ` +
                `(${kind}); retrying in ${delayMs}ms`,
            );
          },
        },
      ),
  };
}
