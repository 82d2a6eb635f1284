const normalizeSeed = (seed: string | number): string =>
  typeof seed === "number" ? seed.toString() : seed;

const hashSeed = (seed: string): number => {
  let hash = 2166136261;
  for (let i = 0; i < seed.length; i += 1) {
    hash ^= seed.charCodeAt(i);
    hash = Math.imul(hash, 16777619);
  }
  return hash >>> 0;
};

const mulberry32 = (seed: number): (() => number) => {
  let t = seed;
  return (): number => {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), t | 1);
    r ^= r + Math.imul(r ^ (r >>> 7), r | 61);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
};

export const createSeededRng = (seed: string | number): (() => number) =>
  mulberry32(hashSeed(normalizeSeed(seed)));

export type SeededGenerator = {
  readonly seed: string | number;
  uniform: () => number;
  gaussian: (mean: number, stdDev: number) => number;
};

/**
 * Uniform and normal draws from one seeded stream.
 *
 * Normal draws use the Box-Muller transform and keep the second variate of
 * each pair for the next call, so the stream position depends on the exact
 * sequence of calls made against the generator.
 */
export const createSeededGenerator = (seed: string | number): SeededGenerator => {
  const uniform = createSeededRng(seed);
  let spare: number | null = null;

  const standardNormal = (): number => {
    if (spare !== null) {
      const value = spare;
      spare = null;
      return value;
    }
    let u = 0;
    while (u === 0) {
      u = uniform();
    }
    const v = uniform();
    const radius = Math.sqrt(-2 * Math.log(u));
    const angle = 2 * Math.PI * v;
    spare = radius * Math.sin(angle);
    return radius * Math.cos(angle);
  };

  return Object.freeze({
    seed,
    uniform,
    gaussian: (mean: number, stdDev: number): number => mean + stdDev * standardNormal()
  });
};
