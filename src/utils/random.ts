/**
 * A stream of uniform values in `[0, 1)`. Sampling and mutation-type choice draw from the
 * same stream.
 */
export type RandomSource = () => number;

export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state += 0x6d2b79f5;
    let x = state;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

export function normalizeRandom(random: RandomSource | undefined): RandomSource {
  if (!random) {
    return () => Math.random();
  }
  return () => {
    const value = random();
    if (!Number.isFinite(value) || value <= 0) {
      return 0;
    }
    if (value >= 1) {
      return 0.999999999999;
    }
    return value;
  };
}

export function pickUniform<T>(values: readonly T[], random: RandomSource): T {
  if (values.length === 0) {
    throw new Error("Cannot pick from an empty set.");
  }
  const index = Math.min(values.length - 1, Math.floor(random() * values.length));
  const picked = values[index];
  if (picked === undefined) {
    throw new Error("Unexpected missing value during uniform pick.");
  }
  return picked;
}

export function sampleWithoutReplacement<T>(
  values: readonly T[],
  k: number,
  random: RandomSource,
): readonly T[] {
  if (k <= 0 || values.length === 0) {
    return [];
  }

  const pool = [...values];
  const output: T[] = [];
  const count = Math.min(k, pool.length);
  for (let index = 0; index < count; index += 1) {
    const pickIndex = Math.min(pool.length - 1, Math.floor(random() * pool.length));
    const [picked] = pool.splice(pickIndex, 1);
    if (picked === undefined) {
      break;
    }
    output.push(picked);
  }
  return output;
}
