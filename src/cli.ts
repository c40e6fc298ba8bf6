import { binary, command, flag, number, option, optional, run, string } from "cmd-ts";

import { resolveRunConfig, type RunConfigInput } from "./config.js";
import { describeError, EXIT_CODES, exitCodeForError } from "./errors.js";
import { runEvolution } from "./run.js";
import { createLogger, type Logger } from "./utils/logger.js";

export type CliArgs = {
  readonly seed: number;
  readonly model: string;
  readonly numRounds: number;
  readonly numProblems: number;
  readonly topkProblems: number;
  readonly mutateOnStart: boolean;
  readonly openaiApiKey: string | undefined;
  readonly mutationTypes: string | undefined;
  readonly seedsPath: string | undefined;
  readonly promptDir: string | undefined;
  readonly outputDir: string | undefined;
  readonly leaderboard: string | undefined;
  readonly logFile: string | undefined;
  readonly maxAttempts: number;
  readonly timeoutMs: number | undefined;
};

export function parseMutationTypesList(value: string): string[] {
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export function toRunConfigInput(args: CliArgs): RunConfigInput {
  return {
    seed: args.seed,
    model: args.model,
    numRounds: args.numRounds,
    sampleSize: args.numProblems,
    topK: args.topkProblems,
    mutateOnStart: args.mutateOnStart,
    apiKey: args.openaiApiKey,
    mutationTypes: args.mutationTypes ? parseMutationTypesList(args.mutationTypes) : undefined,
    seedsPath: args.seedsPath,
    promptDir: args.promptDir,
    outputDir: args.outputDir,
    leaderboardPath: args.leaderboard,
    logFile: args.logFile,
    maxAttempts: args.maxAttempts,
    timeoutMs: args.timeoutMs,
  };
}

/**
 * Runs the whole evolution and returns the process exit code. Every failure is logged with its
 * category before returning.
 */
export async function executeCli(
  args: CliArgs,
  { logger: providedLogger }: { logger?: Logger } = {},
): Promise<number> {
  let logger = providedLogger ?? createLogger();
  try {
    const config = resolveRunConfig(toRunConfigInput(args));
    if (!providedLogger && config.logFile) {
      logger = createLogger({ logFile: config.logFile });
    }
    const result = await runEvolution(config, { logger });
    const best = result.population[0];
    if (best) {
      logger.info(`Best variant ${best.id} scored ${best.score ?? 0}`);
    }
    return EXIT_CODES.success;
  } catch (error: unknown) {
    logger.error(describeError(error));
    return exitCodeForError(error);
  }
}

export const evolveCommand = command({
  name: "variant-evolver",
  description: "Evolve problem statements through LLM mutations and keep the top-scoring variants",
  args: {
    seed: option({ type: number, long: "seed", defaultValue: () => 42 }),
    model: option({
      type: string,
      long: "model",
      description: "Generation model identifier",
      defaultValue: () => "gpt-4",
    }),
    numRounds: option({ type: number, long: "num-rounds", defaultValue: () => 5 }),
    numProblems: option({
      type: number,
      long: "num-problems",
      description: "Variants sampled for mutation each round",
      defaultValue: () => 10,
    }),
    topkProblems: option({
      type: number,
      long: "topk-problems",
      description: "Variants kept after each round (at most --num-problems)",
      defaultValue: () => 5,
    }),
    mutateOnStart: flag({
      long: "mutate-on-start",
      description: "Run one mutation pass before the first round",
    }),
    openaiApiKey: option({
      type: optional(string),
      long: "openai-api-key",
      description: "Defaults to OPENAI_API_KEY",
    }),
    mutationTypes: option({
      type: optional(string),
      long: "mutation-types",
      description: "Comma-separated strategies to choose from (default: rephrase,expand,simplify)",
    }),
    seedsPath: option({ type: optional(string), long: "seeds", description: "Seed problems file" }),
    promptDir: option({
      type: optional(string),
      long: "prompt-dir",
      description: "Directory of <mutation>.txt templates",
    }),
    outputDir: option({
      type: optional(string),
      long: "output-dir",
      description: "Directory for generated variants",
    }),
    leaderboard: option({
      type: optional(string),
      long: "leaderboard",
      description: "YAML snapshot path",
    }),
    logFile: option({ type: optional(string), long: "log-file" }),
    maxAttempts: option({
      type: number,
      long: "max-attempts",
      description: "Backend attempts per mutation; retries cover timeouts and rate limits",
      defaultValue: () => 1,
    }),
    timeoutMs: option({ type: optional(number), long: "timeout-ms" }),
  },
  handler: async (args) => {
    process.exitCode = await executeCli(args);
  },
});

export async function runCli(argv: string[] = process.argv): Promise<void> {
  await run(binary(evolveCommand), argv);
}
