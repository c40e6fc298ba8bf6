import fs from "node:fs/promises";
import path from "node:path";

import { ResourceError } from "../errors.js";
import { isMissingFileError } from "../utils/env.js";
import { createVariant, type Variant } from "../variant.js";

export const DEFAULT_SEEDS_PATH = path.join("problems", "problems.txt");

export function parseSeedLines(text: string): string[] {
  return text
    .split(/\r?\n/u)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export async function loadSeedVariants(seedsPath: string = DEFAULT_SEEDS_PATH): Promise<Variant[]> {
  let text: string;
  try {
    text = await fs.readFile(seedsPath, "utf8");
  } catch (error: unknown) {
    const reason = isMissingFileError(error) ? "not found" : "could not be read";
    throw new ResourceError(`Seed file ${seedsPath} ${reason}`, seedsPath, { cause: error });
  }
  return parseSeedLines(text).map((line) => createVariant(line));
}
