export type RetryPolicy = {
  readonly maxAttempts: number;
  /**
   * Return `null` to stop retrying and surface the original error.
   * `attempt` is 1-based and indicates the attempt that just failed.
   */
  readonly getDelayMs: (attempt: number, error: unknown) => number | null;
};

export type RetryRunOptions = {
  readonly onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
  readonly sleep?: (ms: number) => Promise<void>;
};

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  if (typeof value === "string") {
    return new Error(value);
  }
  return new Error("Unknown error");
}

export function getStatusCode(error: unknown): number | undefined {
  if (!error || typeof error !== "object") {
    return undefined;
  }
  const maybe = error as { status?: unknown; statusCode?: unknown; code?: unknown };
  for (const candidate of [maybe.status, maybe.statusCode]) {
    if (typeof candidate === "number") {
      return candidate;
    }
    if (typeof candidate === "string") {
      const parsed = Number.parseInt(candidate, 10);
      if (Number.isFinite(parsed)) {
        return parsed;
      }
    }
  }
  if (typeof maybe.code === "number") {
    return maybe.code;
  }
  return undefined;
}

export function getErrorText(error: unknown): string {
  if (error instanceof Error) {
    return error.message.toLowerCase();
  }
  if (typeof error === "string") {
    return error.toLowerCase();
  }
  if (error && typeof error === "object") {
    const maybe = error as { code?: unknown; message?: unknown };
    const code = typeof maybe.code === "string" ? maybe.code : "";
    const message = typeof maybe.message === "string" ? maybe.message : "";
    return `${code} ${message}`.trim().toLowerCase();
  }
  return "";
}

export function isOverloadError(error: unknown): boolean {
  const status = getStatusCode(error);
  if (status === 429 || status === 503 || status === 529) {
    return true;
  }

  const text = getErrorText(error);
  if (!text) {
    return false;
  }
  return (
    text.includes("rate limit") ||
    text.includes("too many requests") ||
    text.includes("resource exhausted") ||
    text.includes("resource_exhausted") ||
    text.includes("overload")
  );
}

/**
 * Exponential backoff: `baseDelayMs * 2^(attempt - 1)`, capped at `maxDelayMs`.
 */
export function createBackoffPolicy({
  maxAttempts,
  baseDelayMs = 500,
  maxDelayMs = 8_000,
  shouldRetry = () => true,
}: {
  maxAttempts: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  shouldRetry?: (error: unknown) => boolean;
}): RetryPolicy {
  return {
    maxAttempts: Math.max(1, Math.floor(maxAttempts)),
    getDelayMs: (attempt, error) => {
      if (!shouldRetry(error)) {
        return null;
      }
      return Math.min(maxDelayMs, baseDelayMs * 2 ** Math.max(0, attempt - 1));
    },
  };
}

export async function runWithRetry<T>(
  fn: () => Promise<T>,
  policy: RetryPolicy,
  options: RetryRunOptions = {},
): Promise<T> {
  const wait = options.sleep ?? sleep;
  for (let attempt = 1; ; attempt += 1) {
    try {
      return await fn();
    } catch (error: unknown) {
      const delay = attempt < policy.maxAttempts ? policy.getDelayMs(attempt, error) : null;
      if (delay === null) {
        throw toError(error);
      }
      const delayMs = Number.isFinite(delay) ? Math.max(0, delay) : 0;
      options.onRetry?.({ attempt, delayMs, error });
      if (delayMs > 0) {
        await wait(delayMs);
      }
    }
  }
}
