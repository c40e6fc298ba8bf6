import fs from "node:fs";
import path from "node:path";

import { describe, expect, it } from "vitest";

import {
  BackendError,
  ConfigurationError,
  describeError,
  exitCodeForError,
  MutationError,
  ResourceError,
  ValidationError,
} from "../src/errors.js";
import { createLogger, formatLogLine } from "../src/utils/logger.js";

import { makeTempDir } from "./helpers.js";

describe("error taxonomy", () => {
  it.each([
    [new ConfigurationError("no key"), 2, "Configuration error: no key"],
    [new MutationError("Mutation failed: boom"), 3, "Mutation error: Mutation failed: boom"],
    [new ResourceError("disk full"), 4, "Resource error: disk full"],
    [new ValidationError("topK too large"), 5, "Validation error: topK too large"],
    [new Error("surprise"), 1, "Unexpected error: surprise"],
    [new BackendError("slow", "timeout"), 1, "Unexpected error: slow"],
  ] as const)("maps %s", (error, code, message) => {
    expect(exitCodeForError(error)).toBe(code);
    expect(describeError(error)).toBe(message);
  });

  it("keeps the cause", () => {
    const cause = new Error("ENOENT");
    const error = new ResourceError("Seed file missing", "problems/problems.txt", { cause });
    expect(error.cause).toBe(cause);
    expect(error.path).toBe("problems/problems.txt");
    expect(error.name).toBe("ResourceError");
  });

  it("describes non-error values", () => {
    expect(describeError("plain")).toBe("Unexpected error: plain");
    expect(describeError(42)).toBe("Unexpected error: Unknown error");
  });
});

describe("createLogger", () => {
  it("appends timestamped lines to the log file", () => {
    const logFile = path.join(makeTempDir(), "logs", "processing.log");
    const logger = createLogger({
      logFile,
      console: false,
      now: () => new Date("2024-01-02T03:04:05.000Z"),
    });

    logger.info("Starting processing round with 3 problems");
    logger.error("Error processing problem abc: boom");

    expect(fs.readFileSync(logFile, "utf8")).toBe(
      "[2024-01-02T03:04:05.000Z] INFO Starting processing round with 3 problems\n" +
        "[2024-01-02T03:04:05.000Z] ERROR Error processing problem abc: boom\n",
    );
  });

  it("formats a single line", () => {
    expect(formatLogLine("warn", "careful", new Date("2024-01-01T00:00:00.000Z"))).toBe(
      "[2024-01-01T00:00:00.000Z] WARN careful",
    );
  });
});
