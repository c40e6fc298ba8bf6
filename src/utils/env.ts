import fs from "node:fs";
import path from "node:path";

const ASSIGNMENT = /^(?:export\s+)?([A-Za-z_][\w.-]*)\s*=\s*(.*)$/u;

const loadedEnvFiles = new Set<string>();

function unquote(raw: string): string {
  const quote = raw[0];
  if (raw.length >= 2 && (quote === '"' || quote === "'") && raw.endsWith(quote)) {
    return raw.slice(1, -1);
  }
  const comment = raw.indexOf(" #");
  return (comment >= 0 ? raw.slice(0, comment) : raw).trim();
}

/**
 * Copies `KEY=value` lines from `<cwd>/.env.local` into `process.env` for keys that are still
 * unset. Each path is read at most once per process; a missing file is fine.
 */
export function loadLocalEnv(cwd: string = process.cwd()): void {
  const envPath = path.resolve(cwd, ".env.local");
  if (loadedEnvFiles.has(envPath)) {
    return;
  }
  let content: string;
  try {
    content = fs.readFileSync(envPath, "utf8");
  } catch (error: unknown) {
    if (!isMissingFileError(error)) {
      throw error;
    }
    content = "";
  }
  loadedEnvFiles.add(envPath);

  for (const line of content.split(/\r?\n/u)) {
    const match = ASSIGNMENT.exec(line.trim());
    const key = match?.[1];
    if (!match || !key || process.env[key] !== undefined) {
      continue;
    }
    process.env[key] = unquote(match[2] ?? "");
  }
}

/**
 * Returns the trimmed value of the first non-empty variable among `names`.
 */
export function readEnvValue(...names: readonly string[]): string | undefined {
  for (const name of names) {
    const value = process.env[name]?.trim();
    if (value) {
      return value;
    }
  }
  return undefined;
}

export function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
