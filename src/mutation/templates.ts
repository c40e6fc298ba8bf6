import fs from "node:fs/promises";
import path from "node:path";

import { ConfigurationError, ResourceError } from "../errors.js";
import { isMissingFileError } from "../utils/env.js";
import type { MutationType } from "../variant.js";

export const DEFAULT_PROMPT_DIR = path.join("prompts", "mutations");
export const TEMPLATE_PLACEHOLDER = "problem";

export type PromptTemplateStore = {
  load: (mutationType: MutationType) => Promise<string>;
};

export function resolveTemplatePath(promptDir: string, mutationType: MutationType): string {
  return path.join(promptDir, `${mutationType}.txt`);
}

/**
 * One `<mutationType>.txt` file per strategy. Templates are read on every call so edits between
 * rounds take effect.
 */
export function createFilePromptTemplateStore(
  promptDir: string = DEFAULT_PROMPT_DIR,
): PromptTemplateStore {
  return {
    load: async (mutationType) => {
      if (!/^[A-Za-z0-9_-]+$/u.test(mutationType)) {
        throw new ConfigurationError(`Invalid mutation type label: '${mutationType}'.`);
      }
      const templatePath = resolveTemplatePath(promptDir, mutationType);
      try {
        return await fs.readFile(templatePath, "utf8");
      } catch (error: unknown) {
        if (isMissingFileError(error)) {
          throw new ConfigurationError(`Prompt file not found: ${templatePath}`, { cause: error });
        }
        throw new ResourceError(`Failed to read prompt file ${templatePath}`, templatePath, {
          cause: error,
        });
      }
    },
  };
}

export function createInMemoryPromptTemplateStore(
  templates: Readonly<Record<string, string>>,
): PromptTemplateStore {
  return {
    load: async (mutationType) => {
      const template = templates[mutationType];
      if (template === undefined) {
        throw new ConfigurationError(
          `Prompt template not found for mutation type '${mutationType}'.`,
        );
      }
      return template;
    },
  };
}

/**
 * Substitutes `{problem}`. `{{` and `}}` produce literal braces; any other field is an error.
 */
export function formatPromptTemplate(template: string, problem: string): string {
  return template.replace(/\{\{|\}\}|\{([^{}]*)\}|[{}]/gu, (match, field: string | undefined) => {
    if (match === "{{") {
      return "{";
    }
    if (match === "}}") {
      return "}";
    }
    if (field === TEMPLATE_PLACEHOLDER) {
      return problem;
    }
    if (field === undefined) {
      throw new ConfigurationError(`Unbalanced '${match}' in prompt template.`);
    }
    throw new ConfigurationError(`Unknown placeholder '{${field}}' in prompt template.`);
  });
}
