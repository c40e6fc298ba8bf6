export {
  ADD_CONSTRAINTS_MUTATION_TYPE,
  BASELINE_MUTATION_TYPES,
  KNOWN_MUTATION_TYPES,
  createVariant,
  deriveVariant,
  isScored,
  withScore,
} from "./variant.js";
export type { KnownMutationType, MutationType, ScoredVariant, Variant } from "./variant.js";

export {
  BackendError,
  ConfigurationError,
  EvolverError,
  EXIT_CODES,
  MutationError,
  ResourceError,
  ValidationError,
  describeError,
  exitCodeForError,
} from "./errors.js";
export type { BackendErrorKind, EvolverErrorKind } from "./errors.js";

export type { GenerationBackend, GenerationRequest } from "./backend/types.js";
export {
  buildChatMessages,
  createOpenAiBackend,
  extractFirstCompletionText,
  toBackendError,
} from "./backend/openai.js";
export type { ChatCompletionCreate, OpenAiBackendOptions } from "./backend/openai.js";
export { createRetryingBackend, isRetryableBackendError } from "./backend/retrying.js";
export type { RetryingBackendOptions } from "./backend/retrying.js";

export {
  createFilePromptTemplateStore,
  createInMemoryPromptTemplateStore,
  formatPromptTemplate,
} from "./mutation/templates.js";
export type { PromptTemplateStore } from "./mutation/templates.js";
export { createMutator } from "./mutation/mutator.js";
export type { Mutator, MutatorOptions } from "./mutation/mutator.js";

export { fleschReadingEase } from "./scoring/readability.js";
export type { ReadabilityIndex } from "./scoring/readability.js";
export {
  TECHNICAL_TERMS,
  createScorer,
  defaultScorer,
  scoreVariant,
} from "./scoring/scorer.js";
export type { ScoreBreakdown, Scorer } from "./scoring/scorer.js";

export { rankByScore, runSelectionRound } from "./selection/selectionRound.js";
export type {
  MutationFailure,
  SelectionRoundOptions,
  SelectionRoundResult,
  SelectionRoundStats,
} from "./selection/selectionRound.js";

export { loadSeedVariants, parseSeedLines } from "./storage/seeds.js";
export { createFileVariantStore, createInMemoryVariantStore } from "./storage/variantStore.js";
export type { VariantStore } from "./storage/variantStore.js";
export { buildLeaderboardSnapshot, writeLeaderboardSnapshot } from "./storage/leaderboard.js";
export type { LeaderboardEntry, LeaderboardSnapshot } from "./storage/leaderboard.js";

export { RunConfigSchema, resolveRunConfig } from "./config.js";
export type { RunConfig, RunConfigInput } from "./config.js";
export { createBackendForConfig, runEvolution } from "./run.js";
export type { EvolutionDependencies, EvolutionResult, EvolutionRoundReport } from "./run.js";

export { createLogger, silentLogger } from "./utils/logger.js";
export type { Logger } from "./utils/logger.js";
export { createSeededRandom } from "./utils/random.js";
export type { RandomSource } from "./utils/random.js";
export { loadLocalEnv } from "./utils/env.js";
