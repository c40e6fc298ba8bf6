import fs from "node:fs/promises";
import path from "node:path";

import { ResourceError } from "../errors.js";
import type { Variant } from "../variant.js";

export const DEFAULT_OUTPUT_DIR = "output";

export type VariantStore = {
  save: (variant: Variant) => Promise<void>;
};

export function resolveVariantPath(outputDir: string, variantId: string): string {
  return path.join(outputDir, `${variantId}.txt`);
}

/**
 * Writes `<outputDir>/<id>.txt` with the raw content. Files are created exclusively: ids are never
 * reused, so an existing file means something else owns it.
 */
export function createFileVariantStore(outputDir: string = DEFAULT_OUTPUT_DIR): VariantStore {
  let ensuredDir: Promise<unknown> | null = null;
  return {
    save: async (variant) => {
      const filePath = resolveVariantPath(outputDir, variant.id);
      try {
        ensuredDir ??= fs.mkdir(outputDir, { recursive: true });
        await ensuredDir;
        await fs.writeFile(filePath, variant.content, { encoding: "utf8", flag: "wx" });
      } catch (error: unknown) {
        ensuredDir = null;
        throw new ResourceError(`Failed to persist variant ${variant.id}`, filePath, {
          cause: error,
        });
      }
    },
  };
}

export function createInMemoryVariantStore(): VariantStore & {
  readonly saved: ReadonlyMap<string, string>;
} {
  const saved = new Map<string, string>();
  return {
    saved,
    save: async (variant) => {
      if (saved.has(variant.id)) {
        throw new ResourceError(`Variant ${variant.id} is already persisted`);
      }
      saved.set(variant.id, variant.content);
    },
  };
}
