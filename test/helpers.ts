import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { vi } from "vitest";

import type { GenerationBackend, GenerationRequest } from "../src/backend/types.js";
import type { Logger } from "../src/utils/logger.js";
import type { RandomSource } from "../src/utils/random.js";

export function withEnv<T>(updates: Record<string, string | undefined>, fn: () => T): T {
  const prev: Record<string, string | undefined> = {};
  for (const key of Object.keys(updates)) {
    prev[key] = process.env[key];
    const next = updates[key];
    if (next === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = next;
    }
  }
  try {
    return fn();
  } finally {
    for (const key of Object.keys(updates)) {
      const value = prev[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  }
}

export function makeTempDir(prefix = "variant-evolver-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function randomSequence(values: readonly number[], fallback = 0.5): RandomSource {
  let index = 0;
  return () => {
    const value = values[index];
    index += 1;
    return value ?? fallback;
  };
}

export function createStubBackend(
  respond: (request: GenerationRequest) => string | Promise<string>,
) {
  const generate = vi.fn(async (request: GenerationRequest) => await respond(request));
  const backend = { name: "stub", generate } satisfies GenerationBackend;
  return backend;
}

export function createRecordingLogger(): Logger & { readonly lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    info: (message) => lines.push(`INFO ${message}`),
    warn: (message) => lines.push(`WARN ${message}`),
    error: (message) => lines.push(`ERROR ${message}`),
  };
}
