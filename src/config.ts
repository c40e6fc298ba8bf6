import { z } from "zod";

import { ConfigurationError, ValidationError } from "./errors.js";
import { DEFAULT_PROMPT_DIR } from "./mutation/templates.js";
import { DEFAULT_LEADERBOARD_PATH } from "./storage/leaderboard.js";
import { DEFAULT_SEEDS_PATH } from "./storage/seeds.js";
import { DEFAULT_OUTPUT_DIR } from "./storage/variantStore.js";
import { loadLocalEnv, readEnvValue } from "./utils/env.js";
import { BASELINE_MUTATION_TYPES } from "./variant.js";

export const DEFAULT_MODEL = "gpt-4";
export const DEFAULT_LOG_FILE = "processing.log";

const positiveInt = (name: string) =>
  z
    .number({ invalid_type_error: `${name} must be a number` })
    .int(`${name} must be an integer`)
    .min(1, `${name} must be positive`);

export const RunConfigSchema = z
  .object({
    seed: z.number().int().default(42),
    model: z.string().trim().min(1, "model must not be empty").default(DEFAULT_MODEL),
    numRounds: positiveInt("numRounds").default(5),
    sampleSize: positiveInt("sampleSize").default(10),
    topK: positiveInt("topK").default(5),
    mutateOnStart: z.boolean().default(false),
    apiKey: z.string().trim().min(1).optional(),
    mutationTypes: z
      .array(z.string().regex(/^[A-Za-z0-9_-]+$/u, "mutation types are file-name safe labels"))
      .min(1, "mutationTypes must not be empty")
      .default([...BASELINE_MUTATION_TYPES]),
    seedsPath: z.string().min(1).default(DEFAULT_SEEDS_PATH),
    promptDir: z.string().min(1).default(DEFAULT_PROMPT_DIR),
    outputDir: z.string().min(1).default(DEFAULT_OUTPUT_DIR),
    leaderboardPath: z.string().min(1).default(DEFAULT_LEADERBOARD_PATH),
    logFile: z.string().min(1).nullable().default(DEFAULT_LOG_FILE),
    maxAttempts: positiveInt("maxAttempts").default(1),
    timeoutMs: z.number().int().positive().optional(),
  })
  .superRefine((value, ctx) => {
    if (value.topK > value.sampleSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["topK"],
        message: "topK cannot exceed sampleSize",
      });
    }
  });

export type RunConfigInput = z.input<typeof RunConfigSchema>;

export type RunConfig = Omit<z.output<typeof RunConfigSchema>, "apiKey"> & {
  readonly apiKey: string;
};

/**
 * Validates options and resolves the credential. Parameter violations are `ValidationError`;
 * a missing credential is a `ConfigurationError`. `OPENAI_API_KEY` (including `.env.local`) is
 * used when no key is passed.
 */
export function resolveRunConfig(
  input: RunConfigInput,
  { cwd = process.cwd() }: { cwd?: string } = {},
): RunConfig {
  const parsed = RunConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    );
    throw new ValidationError(`Invalid run configuration: ${issues.join("; ")}`, issues);
  }

  let apiKey = parsed.data.apiKey;
  if (!apiKey) {
    loadLocalEnv(cwd);
    apiKey = readEnvValue("OPENAI_API_KEY");
  }
  if (!apiKey) {
    throw new ConfigurationError(
      "An OpenAI API key is required (pass --openai-api-key or set OPENAI_API_KEY).",
    );
  }
  return { ...parsed.data, apiKey };
}
