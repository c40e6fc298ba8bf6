import { randomUUID } from "node:crypto";

export const BASELINE_MUTATION_TYPES = ["rephrase", "expand", "simplify"] as const;
export const ADD_CONSTRAINTS_MUTATION_TYPE = "add_constraints";

export const KNOWN_MUTATION_TYPES = [
  ...BASELINE_MUTATION_TYPES,
  ADD_CONSTRAINTS_MUTATION_TYPE,
] as const;

export type KnownMutationType = (typeof KNOWN_MUTATION_TYPES)[number];

/**
 * Any label with a prompt template is a valid mutation type; the known ones ship with the package.
 */
export type MutationType = KnownMutationType | (string & {});

/**
 * One version of a problem statement.
 *
 * `score` is `null` until the scorer has seen the variant, so a computed score
 * of `0` is never mistaken for "unscored".
 */
export type Variant = {
  readonly id: string;
  readonly content: string;
  readonly score: number | null;
  readonly parentId: string | null;
  readonly mutations: readonly MutationType[];
  readonly createdAt: Date;
};

export type ScoredVariant = Variant & { readonly score: number };

export function createVariant(content: string, parentId: string | null = null): Variant {
  return {
    id: randomUUID(),
    content,
    score: null,
    parentId,
    mutations: [],
    createdAt: new Date(),
  };
}

export function deriveVariant(
  parent: Variant,
  content: string,
  mutationType: MutationType,
): Variant {
  const child = createVariant(content, parent.id);
  return { ...child, mutations: [...parent.mutations, mutationType] };
}

export function withScore(variant: Variant, score: number): ScoredVariant {
  return { ...variant, score };
}

export function isScored(variant: Variant): variant is ScoredVariant {
  return variant.score !== null;
}
