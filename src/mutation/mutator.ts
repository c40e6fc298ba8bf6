import type { GenerationBackend } from "../backend/types.js";
import { MutationError, toErrorMessage } from "../errors.js";
import {
  ADD_CONSTRAINTS_MUTATION_TYPE,
  deriveVariant,
  type MutationType,
  type Variant,
} from "../variant.js";

import { formatPromptTemplate, type PromptTemplateStore } from "./templates.js";

export type Mutator = {
  mutate: (parent: Variant, mutationType: MutationType) => Promise<Variant>;
  addConstraints: (parent: Variant) => Promise<Variant>;
};

export type MutatorOptions = {
  readonly backend: GenerationBackend;
  readonly templates: PromptTemplateStore;
  readonly model: string;
};

/**
 * Template problems (missing file, bad placeholder) surface as `ConfigurationError`; anything
 * the backend throws becomes a `MutationError` with the original error as `cause`.
 */
export function createMutator({ backend, templates, model }: MutatorOptions): Mutator {
  async function mutate(parent: Variant, mutationType: MutationType): Promise<Variant> {
    const template = await templates.load(mutationType);
    const instruction = formatPromptTemplate(template, parent.content);

    let content: string;
    try {
      content = await backend.generate({ model, instruction, input: parent.content });
    } catch (error: unknown) {
      throw new MutationError(`Mutation failed: ${toErrorMessage(error)}`, { cause: error });
    }
    return deriveVariant(parent, content, mutationType);
  }

  return {
    mutate,
    addConstraints: (parent) => mutate(parent, ADD_CONSTRAINTS_MUTATION_TYPE),
  };
}
