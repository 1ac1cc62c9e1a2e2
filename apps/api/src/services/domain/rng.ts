/**
 * Seeded random source. Every random choice in the pipeline goes through one
 * of these so that a run can be replayed from its seed.
 */

export type Rng = {
  next: () => number;
  int: (min: number, max: number) => number;
  uniform: (min: number, max: number) => number;
  gauss: (mean: number, std: number) => number;
  pick: <T>(values: readonly T[]) => T;
  weighted: <T extends string | number>(weights: ReadonlyArray<readonly [T, number]>) => T;
  shuffle: <T>(values: readonly T[]) => T[];
  fork: (label: string) => Rng;
};

const hashSeed = (input: string): number => {
  let hash = 2166136261;
  for (let i = 0; i < input.length; i += 1) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 16777619);
  }
  return hash >>> 0;
};

const mulberry32 = (seed: number) => {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), t | 1);
    r ^= r + Math.imul(r ^ (r >>> 7), r | 61);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
};

export const createRng = (seed: string | number): Rng => {
  const base = typeof seed === "number" ? seed : hashSeed(seed);
  const next = mulberry32(base);
  return {
    next,
    int: (min: number, max: number) => {
      const clampedMin = Math.ceil(min);
      const clampedMax = Math.floor(max);
      return Math.floor(next() * (clampedMax - clampedMin + 1)) + clampedMin;
    },
    uniform: (min: number, max: number) => min + next() * (max - min),
    gauss: (mean: number, std: number) => {
      // Box-Muller; 1 - next() keeps the log argument away from zero
      const u = 1 - next();
      const v = next();
      return mean + std * Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
    },
    pick: <T>(values: readonly T[]) => {
      if (!values.length) throw new Error("pick() called with empty array");
      return values[Math.floor(next() * values.length)];
    },
    weighted: <T extends string | number>(weights: ReadonlyArray<readonly [T, number]>) => {
      if (!weights.length) throw new Error("weighted() called with empty array");
      const total = weights.reduce((sum, [, w]) => sum + Math.max(0, w), 0);
      if (total <= 0) return weights[0][0];
      let roll = next() * total;
      for (const [value, w] of weights) {
        roll -= Math.max(0, w);
        if (roll < 0) return value;
      }
      return weights[weights.length - 1][0];
    },
    shuffle: <T>(values: readonly T[]) => {
      const copy = [...values];
      for (let i = copy.length - 1; i > 0; i -= 1) {
        const j = Math.floor(next() * (i + 1));
        [copy[i], copy[j]] = [copy[j], copy[i]];
      }
      return copy;
    },
    fork: (label: string) => createRng(hashSeed(`${base}:${label}`)),
  };
};
