import fs from "node:fs/promises";
import path from "node:path";

import { stringify } from "yaml";

import { ResourceError } from "../errors.js";
import type { ScoreBreakdown } from "../scoring/scorer.js";
import type { Variant } from "../variant.js";

export const DEFAULT_LEADERBOARD_PATH = "leaderboard.yaml";

export type QualityMetrics = {
  readonly complexity?: number;
  readonly clarity?: number;
  readonly diversity?: number;
  readonly mutation_quality?: number;
};

export type LeaderboardEntry = {
  readonly id: string;
  readonly score: number | null;
  readonly mutations: readonly string[];
  readonly quality_metrics: QualityMetrics;
};

export type LeaderboardSnapshot = {
  readonly timestamp: string;
  readonly round_number: number;
  readonly problems: readonly LeaderboardEntry[];
};

export function sortByScoreDescending<T extends Pick<Variant, "score">>(
  variants: readonly T[],
): T[] {
  return [...variants].sort((a, b) => (b.score ?? 0) - (a.score ?? 0));
}

export function buildLeaderboardSnapshot({
  round,
  population,
  evaluate,
  now = new Date(),
}: {
  round: number;
  population: readonly Variant[];
  evaluate?: (variant: Variant) => ScoreBreakdown;
  now?: Date;
}): LeaderboardSnapshot {
  return {
    timestamp: now.toISOString(),
    round_number: round,
    problems: sortByScoreDescending(population).map((variant) => {
      const breakdown = evaluate?.(variant);
      return {
        id: variant.id,
        score: variant.score,
        mutations: [...variant.mutations],
        quality_metrics: breakdown
          ? {
              complexity: breakdown.complexity,
              clarity: breakdown.clarity,
              diversity: breakdown.diversity,
              mutation_quality: breakdown.mutationQuality,
            }
          : {},
      };
    }),
  };
}

export async function writeLeaderboardSnapshot(
  filePath: string,
  snapshot: LeaderboardSnapshot,
): Promise<void> {
  try {
    await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
    await fs.writeFile(filePath, stringify(snapshot), "utf8");
  } catch (error: unknown) {
    throw new ResourceError(`Failed to write leaderboard ${filePath}`, filePath, { cause: error });
  }
}
