import { createOpenAiBackend } from "./backend/openai.js";
import { createRetryingBackend } from "./backend/retrying.js";
import type { GenerationBackend } from "./backend/types.js";
import type { RunConfig } from "./config.js";
import { createMutator } from "./mutation/mutator.js";
import { createFilePromptTemplateStore, type PromptTemplateStore } from "./mutation/templates.js";
import { defaultScorer, type Scorer } from "./scoring/scorer.js";
import {
  runSelectionRound,
  type SelectionRoundResult,
} from "./selection/selectionRound.js";
import {
  buildLeaderboardSnapshot,
  writeLeaderboardSnapshot,
  type LeaderboardSnapshot,
} from "./storage/leaderboard.js";
import { loadSeedVariants } from "./storage/seeds.js";
import { createFileVariantStore, type VariantStore } from "./storage/variantStore.js";
import { silentLogger, type Logger } from "./utils/logger.js";
import { createSeededRandom, type RandomSource } from "./utils/random.js";
import type { Variant } from "./variant.js";

export type EvolutionDependencies = {
  readonly backend?: GenerationBackend;
  readonly templates?: PromptTemplateStore;
  readonly store?: VariantStore;
  readonly scorer?: Scorer;
  readonly random?: RandomSource;
  readonly logger?: Logger;
  readonly loadSeeds?: (seedsPath: string) => Promise<Variant[]>;
  readonly writeSnapshot?: (filePath: string, snapshot: LeaderboardSnapshot) => Promise<void>;
  readonly now?: () => Date;
};

export type EvolutionRoundReport = {
  /** 0 for the optional pass before the first round. */
  readonly round: number;
  readonly result: SelectionRoundResult;
  readonly snapshot: LeaderboardSnapshot | null;
};

export type EvolutionResult = {
  readonly population: readonly Variant[];
  readonly rounds: readonly EvolutionRoundReport[];
};

export function createBackendForConfig(config: RunConfig, logger: Logger): GenerationBackend {
  const backend = createOpenAiBackend({ apiKey: config.apiKey, timeoutMs: config.timeoutMs });
  if (config.maxAttempts <= 1) {
    return backend;
  }
  return createRetryingBackend(backend, {
    maxAttempts: config.maxAttempts,
    timeoutMs: config.timeoutMs,
    logger,
  });
}

/**
 * Loads the seeds, optionally mutates once before round 1, then runs `numRounds` rounds and
 * writes a leaderboard snapshot after each. The pass before round 1 is not snapshotted.
 */
export async function runEvolution(
  config: RunConfig,
  deps: EvolutionDependencies = {},
): Promise<EvolutionResult> {
  const logger = deps.logger ?? silentLogger;
  const backend = deps.backend ?? createBackendForConfig(config, logger);
  const templates = deps.templates ?? createFilePromptTemplateStore(config.promptDir);
  const store = deps.store ?? createFileVariantStore(config.outputDir);
  const scorer = deps.scorer ?? defaultScorer;
  const random = deps.random ?? createSeededRandom(config.seed);
  const loadSeeds = deps.loadSeeds ?? loadSeedVariants;
  const writeSnapshot = deps.writeSnapshot ?? writeLeaderboardSnapshot;
  const now = deps.now ?? (() => new Date());

  const mutator = createMutator({ backend, templates, model: config.model });

  let population: readonly Variant[] = await loadSeeds(config.seedsPath);
  logger.info(`Loaded ${population.length} seed variants from ${config.seedsPath}`);

  const runRound = (round: number): Promise<SelectionRoundResult> =>
    runSelectionRound(population, {
      sampleSize: config.sampleSize,
      topK: config.topK,
      mutator,
      store,
      random,
      scorer,
      mutationTypes: config.mutationTypes,
      logger,
      round,
    });

  const rounds: EvolutionRoundReport[] = [];
  if (config.mutateOnStart) {
    const result = await runRound(0);
    population = result.population;
    rounds.push({ round: 0, result, snapshot: null });
  }

  for (let round = 1; round <= config.numRounds; round += 1) {
    logger.info(`Processing round ${round}/${config.numRounds}`);
    const result = await runRound(round);
    population = result.population;
    const snapshot = buildLeaderboardSnapshot({
      round,
      population,
      evaluate: scorer.evaluate,
      now: now(),
    });
    await writeSnapshot(config.leaderboardPath, snapshot);
    rounds.push({ round, result, snapshot });
  }

  return { population, rounds };
}
