export type EvolverErrorKind = "configuration" | "mutation" | "resource" | "validation";

export class EvolverError extends Error {
  constructor(
    message: string,
    readonly kind: EvolverErrorKind,
    options?: { readonly cause?: unknown },
  ) {
    super(message, options);
    this.name = "EvolverError";
  }
}

/** Bad or missing inputs: absent credential, missing prompt template, malformed template. */
export class ConfigurationError extends EvolverError {
  constructor(message: string, options?: { readonly cause?: unknown }) {
    super(message, "configuration", options);
    this.name = "ConfigurationError";
  }
}

export class MutationError extends EvolverError {
  constructor(message: string, options?: { readonly cause?: unknown }) {
    super(message, "mutation", options);
    this.name = "MutationError";
  }
}

export class ResourceError extends EvolverError {
  constructor(
    message: string,
    readonly path?: string,
    options?: { readonly cause?: unknown },
  ) {
    super(message, "resource", options);
    this.name = "ResourceError";
  }
}

export class ValidationError extends EvolverError {
  constructor(
    message: string,
    readonly issues: readonly string[] = [],
  ) {
    super(message, "validation");
    this.name = "ValidationError";
  }
}

export type BackendErrorKind =
  | "timeout"
  | "rate_limit"
  | "authentication"
  | "malformed_response"
  | "request_failed";

export class BackendError extends Error {
  readonly status: number | undefined;

  constructor(
    message: string,
    readonly kind: BackendErrorKind,
    options?: { readonly cause?: unknown; readonly status?: number },
  ) {
    super(message, { cause: options?.cause });
    this.name = "BackendError";
    this.status = options?.status;
  }
}

export const EXIT_CODES = {
  success: 0,
  unexpected: 1,
  configuration: 2,
  mutation: 3,
  resource: 4,
  validation: 5,
} as const;

const CATEGORY_LABELS: Readonly<Record<EvolverErrorKind, string>> = {
  configuration: "Configuration",
  mutation: "Mutation",
  resource: "Resource",
  validation: "Validation",
};

export function exitCodeForError(error: unknown): number {
  if (error instanceof EvolverError) {
    return EXIT_CODES[error.kind];
  }
  return EXIT_CODES.unexpected;
}

export function describeError(error: unknown): string {
  const message = toErrorMessage(error);
  if (error instanceof EvolverError) {
    return `${CATEGORY_LABELS[error.kind]} error: ${message}`;
  }
  return `Unexpected error: ${message}`;
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return "Unknown error";
}
