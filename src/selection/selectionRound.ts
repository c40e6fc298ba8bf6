import { ResourceError, toErrorMessage } from "../errors.js";
import type { Mutator } from "../mutation/mutator.js";
import { defaultScorer, type Scorer } from "../scoring/scorer.js";
import type { VariantStore } from "../storage/variantStore.js";
import type { Logger } from "../utils/logger.js";
import { silentLogger } from "../utils/logger.js";
import {
  normalizeRandom,
  pickUniform,
  sampleWithoutReplacement,
  type RandomSource,
} from "../utils/random.js";
import {
  BASELINE_MUTATION_TYPES,
  isScored,
  type MutationType,
  type ScoredVariant,
  type Variant,
} from "../variant.js";

export type SelectionRoundOptions = {
  readonly sampleSize: number;
  readonly topK: number;
  readonly mutator: Pick<Mutator, "mutate">;
  readonly store: VariantStore;
  readonly random: RandomSource;
  readonly scorer?: Pick<Scorer, "score">;
  /**
   * Strategies the random choice draws from. Defaults to rephrase, expand and simplify.
   */
  readonly mutationTypes?: readonly MutationType[];
  readonly logger?: Logger;
  /** Only used in log lines. */
  readonly round?: number;
};

export type MutationFailure = {
  readonly parentId: string;
  readonly mutationType: MutationType;
  readonly error: unknown;
};

export type SelectionRoundStats = {
  readonly sampled: number;
  readonly childrenProduced: number;
  readonly mutationFailures: number;
  readonly stragglersScored: number;
};

export type SelectionRoundResult = {
  /** At most `topK` variants, score descending. */
  readonly population: readonly ScoredVariant[];
  readonly children: readonly ScoredVariant[];
  readonly failures: readonly MutationFailure[];
  readonly stats: SelectionRoundStats;
};

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer (got ${value}).`);
  }
}

/**
 * Stable: ties keep their relative order in `variants`.
 */
export function rankByScore(variants: readonly ScoredVariant[]): ScoredVariant[] {
  return [...variants].sort((a, b) => b.score - a.score);
}

/**
 * One round: sample, mutate one at a time, score and persist children, score stragglers,
 * then keep the best `topK` of children followed by originals.
 *
 * A failed mutation skips its parent; the round still completes with whatever it has.
 * `ResourceError`s (unreadable templates, failed writes) are not mutation failures and propagate.
 */
export async function runSelectionRound(
  population: readonly Variant[],
  options: SelectionRoundOptions,
): Promise<SelectionRoundResult> {
  assertPositiveInteger("sampleSize", options.sampleSize);
  assertPositiveInteger("topK", options.topK);
  const mutationTypes = options.mutationTypes ?? BASELINE_MUTATION_TYPES;
  if (mutationTypes.length === 0) {
    throw new RangeError("mutationTypes must not be empty.");
  }
  const scorer = options.scorer ?? defaultScorer;
  const logger = options.logger ?? silentLogger;
  const random = normalizeRandom(options.random);
  const label = options.round !== undefined ? `Round ${options.round}` : "Round";

  logger.info(`${label}: starting with ${population.length} variants`);

  const sampled = sampleWithoutReplacement(
    population,
    Math.min(options.sampleSize, population.length),
    random,
  );

  const children: ScoredVariant[] = [];
  const failures: MutationFailure[] = [];
  for (const [index, parent] of sampled.entries()) {
    const mutationType = pickUniform(mutationTypes, random);
    let child: Variant;
    try {
      child = await options.mutator.mutate(parent, mutationType);
    } catch (error: unknown) {
      if (error instanceof ResourceError) {
        throw error;
      }
      failures.push({ parentId: parent.id, mutationType, error });
      logger.error(
        `Error processing variant ${parent.id} (${mutationType}): ${toErrorMessage(error)}`,
      );
      continue;
    }
    const scored = scorer.score(child);
    await options.store.save(scored);
    children.push(scored);
    logger.info(
      `${label}: [${index + 1}/${sampled.length}] ${mutationType} ${parent.id} -> ${scored.id} ` +
        `(score ${scored.score.toFixed(4)})`,
    );
  }

  let stragglersScored = 0;
  const originals = population.map((variant) => {
    if (isScored(variant)) {
      return variant;
    }
    stragglersScored += 1;
    return scorer.score(variant);
  });

  const ranked = rankByScore([...children, ...originals]).slice(0, options.topK);

  logger.info(
    `${label}: completed; generated ${children.length} new variants, ` +
      `${failures.length} failed, kept ${ranked.length}`,
  );

  return {
    population: ranked,
    children,
    failures,
    stats: {
      sampled: sampled.length,
      childrenProduced: children.length,
      mutationFailures: failures.length,
      stragglersScored,
    },
  };
}
