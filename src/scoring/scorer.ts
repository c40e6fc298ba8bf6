import { withScore, type ScoredVariant, type Variant } from "../variant.js";

import { fleschReadingEase, type ReadabilityIndex } from "./readability.js";

export const TECHNICAL_TERMS = ["implement", "design", "optimize", "algorithm", "system"] as const;

export type ScoreBreakdown = {
  readonly complexity: number;
  readonly clarity: number;
  readonly diversity: number;
  readonly mutationQuality: number;
  readonly score: number;
};

export type Scorer = {
  evaluate: (variant: Pick<Variant, "content" | "mutations">) => ScoreBreakdown;
  score: (variant: Variant) => ScoredVariant;
};

function mean(values: readonly number[]): number {
  let total = 0;
  for (const value of values) {
    total += value;
  }
  return total / values.length;
}

function countOccurrences(text: string, needle: string): number {
  return text.split(needle).length - 1;
}

function splitWhitespace(text: string): string[] {
  return text.split(/\s+/u).filter((token) => token.length > 0);
}

/**
 * Length, technical vocabulary and bullet nesting. The vocabulary and bullet sub-scores are not
 * clamped, so repeated terms or long lists push this above 1.
 */
export function computeComplexity(content: string): number {
  const words = splitWhitespace(content);
  const lengthScore = Math.min(words.length / 100, 1);
  const terms: readonly string[] = TECHNICAL_TERMS;
  const technicalCount = words.filter((word) => terms.includes(word.toLowerCase())).length;
  const technicalScore = technicalCount / TECHNICAL_TERMS.length;
  const nestedScore = countOccurrences(content, "\n- ") / 10;
  return mean([lengthScore, technicalScore, nestedScore]);
}

export function computeClarity(content: string, readability: ReadabilityIndex): number {
  const readabilityScore = readability(content) / 100;
  const paragraphs = countOccurrences(content, "\n\n") + 1;
  const structureScore = Math.min(paragraphs / 5, 1);
  const formatScore = content.trim() === content ? 1 : 0.8;
  return mean([readabilityScore, structureScore, formatScore]);
}

/**
 * Distinct strategies in the variant's own lineage. Other variants are never consulted.
 */
export function computeDiversity(mutations: readonly string[]): number {
  return Math.min(new Set(mutations).size / 3, 1);
}

export function computeMutationQuality(mutations: readonly string[]): number {
  return mutations.length / 10;
}

export function createScorer({
  readability = fleschReadingEase,
}: { readability?: ReadabilityIndex } = {}): Scorer {
  const evaluate = ({
    content,
    mutations,
  }: Pick<Variant, "content" | "mutations">): ScoreBreakdown => {
    const complexity = computeComplexity(content);
    const clarity = computeClarity(content, readability);
    const diversity = computeDiversity(mutations);
    const mutationQuality = computeMutationQuality(mutations);
    return {
      complexity,
      clarity,
      diversity,
      mutationQuality,
      score: mean([complexity, clarity, diversity, mutationQuality]),
    };
  };

  return {
    evaluate,
    score: (variant) => withScore(variant, evaluate(variant).score),
  };
}

export const defaultScorer: Scorer = createScorer();

export function scoreVariant(variant: Variant): ScoredVariant {
  return defaultScorer.score(variant);
}
