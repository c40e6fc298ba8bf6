import fs from "node:fs";
import path from "node:path";

import { describe, expect, it, vi } from "vitest";

import { ConfigurationError, MutationError, ResourceError } from "../src/errors.js";
import { createMutator } from "../src/mutation/mutator.js";
import {
  createFilePromptTemplateStore,
  createInMemoryPromptTemplateStore,
} from "../src/mutation/templates.js";
import { scoreVariant } from "../src/scoring/scorer.js";
import { rankByScore, runSelectionRound } from "../src/selection/selectionRound.js";
import { createInMemoryVariantStore } from "../src/storage/variantStore.js";
import { createSeededRandom } from "../src/utils/random.js";
import {
  createVariant,
  deriveVariant,
  withScore,
  type MutationType,
  type Variant,
} from "../src/variant.js";

import {
  createRecordingLogger,
  createStubBackend,
  makeTempDir,
  randomSequence,
} from "./helpers.js";

const templates = createInMemoryPromptTemplateStore({
  rephrase: "Rephrase: {problem}",
  expand: "Expand: {problem}",
  simplify: "Simplify: {problem}",
});

function seeds(...contents: string[]): Variant[] {
  return contents.map((content) => createVariant(content));
}

function failingMutator() {
  return {
    mutate: vi.fn(async (_parent: Variant, _type: MutationType): Promise<Variant> => {
      throw new MutationError("Mutation failed: backend unavailable");
    }),
  };
}

function expectSortedDescending(variants: readonly { score: number }[]): void {
  for (let index = 1; index < variants.length; index += 1) {
    expect(variants[index - 1]?.score).toBeGreaterThanOrEqual(variants[index]?.score ?? 0);
  }
}

describe("runSelectionRound", () => {
  it("keeps the top-K of children and originals after one round", async () => {
    const population = seeds("Problem 1", "Problem 2", "Problem 3");
    const backend = createStubBackend(() => "Mutated X");
    const store = createInMemoryVariantStore();

    const result = await runSelectionRound(population, {
      sampleSize: 2,
      topK: 2,
      mutator: createMutator({ backend, templates, model: "gpt-4" }),
      store,
      random: createSeededRandom(42),
      mutationTypes: ["rephrase"],
    });

    expect(result.children).toHaveLength(2);
    for (const child of result.children) {
      expect(child.mutations).toEqual(["rephrase"]);
      expect(child.content).toBe("Mutated X");
      expect(population.map((seed) => seed.id)).toContain(child.parentId);
      expect(store.saved.get(child.id)).toBe("Mutated X");
    }
    expect(new Set(result.children.map((child) => child.parentId)).size).toBe(2);

    const allScores = [...result.children, ...population.map((seed) => scoreVariant(seed))]
      .map((variant) => variant.score)
      .sort((a, b) => b - a);
    expect(result.population).toHaveLength(2);
    expect(result.population.map((variant) => variant.score)).toEqual(allScores.slice(0, 2));
    expect(result.population.map((variant) => variant.id).sort()).toEqual(
      result.children.map((child) => child.id).sort(),
    );
    expect(store.saved.size).toBe(2);
    expect(result.stats).toEqual({
      sampled: 2,
      childrenProduced: 2,
      mutationFailures: 0,
      stragglersScored: 3,
    });
  });

  it("returns the scored originals when every mutation fails", async () => {
    const population = seeds("Problem 1", "Problem 2", "Problem 3");
    const mutator = failingMutator();
    const store = createInMemoryVariantStore();
    const logger = createRecordingLogger();

    const result = await runSelectionRound(population, {
      sampleSize: 3,
      topK: 2,
      mutator,
      store,
      random: createSeededRandom(7),
      logger,
      round: 4,
    });

    expect(mutator.mutate).toHaveBeenCalledTimes(3);
    expect(result.children).toEqual([]);
    expect(result.failures).toHaveLength(3);
    expect(result.population).toHaveLength(2);
    expectSortedDescending(result.population);
    for (const variant of result.population) {
      expect(population.map((seed) => seed.id)).toContain(variant.id);
    }
    expect(store.saved.size).toBe(0);
    expect(logger.lines.filter((line) => line.startsWith("ERROR"))).toHaveLength(3);
    expect(logger.lines.at(-1)).toBe(
      "INFO Round 4: completed; generated 0 new variants, 3 failed, kept 2",
    );
  });

  it("skips a parent whose template is missing and completes the round", async () => {
    const population = seeds("Only problem");
    const backend = createStubBackend(() => "unused");

    const result = await runSelectionRound(population, {
      sampleSize: 1,
      topK: 1,
      mutator: createMutator({ backend, templates, model: "gpt-4" }),
      store: createInMemoryVariantStore(),
      random: createSeededRandom(1),
      mutationTypes: ["add_constraints"],
    });

    expect(backend.generate).not.toHaveBeenCalled();
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0]?.error).toBeInstanceOf(ConfigurationError);
    expect(result.failures[0]?.mutationType).toBe("add_constraints");
    expect(result.population.map((variant) => variant.id)).toEqual([population[0]?.id]);
  });

  it("mutates only the sampled variants, each at most once", async () => {
    const population = seeds("a", "b", "c", "d", "e");
    const mutate = vi.fn(async (parent: Variant, mutationType: MutationType) =>
      deriveVariant(parent, `${parent.content}!`, mutationType),
    );

    const result = await runSelectionRound(population, {
      sampleSize: 3,
      topK: 3,
      mutator: { mutate },
      store: createInMemoryVariantStore(),
      random: createSeededRandom(3),
    });

    const parents = mutate.mock.calls.map(([parent]) => parent.id);
    expect(parents).toHaveLength(3);
    expect(new Set(parents).size).toBe(3);
    for (const [, mutationType] of mutate.mock.calls) {
      expect(["rephrase", "expand", "simplify"]).toContain(mutationType);
    }
    expect(result.population).toHaveLength(3);
    expectSortedDescending(result.population);
  });

  it("draws sampling and mutation type from the same stream", async () => {
    const population = seeds("first", "second", "third");
    const mutate = vi.fn(async (parent: Variant, mutationType: MutationType) =>
      deriveVariant(parent, parent.content, mutationType),
    );

    await runSelectionRound(population, {
      sampleSize: 2,
      topK: 2,
      mutator: { mutate },
      store: createInMemoryVariantStore(),
      // sample: index 2 of 3, then index 0 of 2; types: index 1 of 3, then index 2 of 3
      random: randomSequence([0.9, 0.1, 0.5, 0.8]),
    });

    expect(mutate.mock.calls.map(([parent, type]) => [parent.content, type])).toEqual([
      ["third", "expand"],
      ["first", "simplify"],
    ]);
  });

  it("does not rescore variants that already carry a score, even zero", async () => {
    const zero = withScore(createVariant("already scored"), 0);
    const unscored = createVariant("never scored");
    const score = vi.fn((variant: Variant) => withScore(variant, 0.25));

    const result = await runSelectionRound([zero, unscored], {
      sampleSize: 1,
      topK: 2,
      mutator: failingMutator(),
      store: createInMemoryVariantStore(),
      random: randomSequence([0]),
      scorer: { score },
    });

    expect(score).toHaveBeenCalledTimes(1);
    expect(score.mock.calls[0]?.[0].id).toBe(unscored.id);
    expect(result.population.map((variant) => [variant.id, variant.score])).toEqual([
      [unscored.id, 0.25],
      [zero.id, 0],
    ]);
    expect(result.stats.stragglersScored).toBe(1);
  });

  it("breaks ties by placing children before originals in population order", async () => {
    const population = seeds("a", "b");
    const constant = { score: (variant: Variant) => withScore(variant, 0.5) };

    const result = await runSelectionRound(population, {
      sampleSize: 1,
      topK: 2,
      mutator: {
        mutate: async (parent, mutationType) => deriveVariant(parent, "child", mutationType),
      },
      store: createInMemoryVariantStore(),
      random: randomSequence([0, 0]),
      scorer: constant,
    });

    expect(result.population.map((variant) => variant.content)).toEqual(["child", "a"]);
  });

  it("propagates persistence failures", async () => {
    const population = seeds("a");
    const store = {
      save: vi.fn(async () => {
        throw new ResourceError("disk full", "/tmp/out");
      }),
    };

    await expect(
      runSelectionRound(population, {
        sampleSize: 1,
        topK: 1,
        mutator: {
          mutate: async (parent, mutationType) => deriveVariant(parent, "child", mutationType),
        },
        store,
        random: createSeededRandom(5),
      }),
    ).rejects.toBeInstanceOf(ResourceError);
  });

  it("aborts the round when a template cannot be read", async () => {
    const promptDir = makeTempDir();
    fs.mkdirSync(path.join(promptDir, "rephrase.txt"));
    const backend = createStubBackend(() => "unused");
    const logger = createRecordingLogger();

    await expect(
      runSelectionRound(seeds("Only problem"), {
        sampleSize: 1,
        topK: 1,
        mutator: createMutator({
          backend,
          templates: createFilePromptTemplateStore(promptDir),
          model: "gpt-4",
        }),
        store: createInMemoryVariantStore(),
        random: createSeededRandom(1),
        mutationTypes: ["rephrase"],
        logger,
      }),
    ).rejects.toBeInstanceOf(ResourceError);
    expect(backend.generate).not.toHaveBeenCalled();
    expect(logger.lines.filter((line) => line.startsWith("ERROR"))).toEqual([]);
  });

  it("rejects non-positive sizes", async () => {
    await expect(
      runSelectionRound(seeds("a"), {
        sampleSize: 0,
        topK: 1,
        mutator: failingMutator(),
        store: createInMemoryVariantStore(),
        random: Math.random,
      }),
    ).rejects.toThrow("sampleSize must be a positive integer (got 0).");
  });

  it("handles an empty population", async () => {
    const mutator = failingMutator();
    const result = await runSelectionRound([], {
      sampleSize: 2,
      topK: 1,
      mutator,
      store: createInMemoryVariantStore(),
      random: Math.random,
    });

    expect(result.population).toEqual([]);
    expect(mutator.mutate).not.toHaveBeenCalled();
  });
});

describe("rankByScore", () => {
  it("sorts descending and keeps insertion order for ties", () => {
    const [a, b, c] = seeds("a", "b", "c").map((variant, index) =>
      withScore(variant, index === 1 ? 0.9 : 0.1),
    );
    if (!a || !b || !c) {
      throw new Error("expected three variants");
    }
    expect(rankByScore([a, b, c]).map((variant) => variant.content)).toEqual(["b", "a", "c"]);
  });
});
