/** RNG function signature. Returns a value in [0, 1). */
export type RandomFn = () => number;

/** Clock function signature. Returns the current time in ms. */
export type ClockFn = () => number;

/**
 * Sampling primitives used by the typo and timing models.
 *
 * Models never touch `Math.random` directly; they receive a source so
 * tests can script every draw.
 */
export interface RandomSource {
  /** Uniform in [0, 1). */
  next(): number;
  /** Uniform in [min, max). */
  uniform(min: number, max: number): number;
  /** Integer in [min, max] inclusive. */
  int(min: number, max: number): number;
  /** Normal(mean, sd). */
  gaussian(mean: number, sd: number): number;
  /** Uniformly chosen element. The list must not be empty. */
  choice<T>(items: readonly T[]): T;
}

/**
 * Build a RandomSource on top of any uniform generator.
 * Defaults to Math.random.
 */
export function createRandomSource(random: RandomFn = Math.random): RandomSource {
  const int = (min: number, max: number): number => {
    const lo = Math.ceil(min);
    const hi = Math.floor(max);
    if (hi < lo) return lo;
    return lo + Math.min(hi - lo, Math.floor(random() * (hi - lo + 1)));
  };

  return {
    next: random,
    uniform: (min, max) => min + random() * (max - min),
    int,
    gaussian: (mean, sd) => {
      // Box–Muller; 1 - u keeps the log argument in (0, 1]
      const u = 1 - random();
      const v = random();
      const z = Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
      return mean + sd * z;
    },
    choice: <T>(items: readonly T[]): T => {
      if (items.length === 0) {
        throw new RangeError("choice() called with an empty list");
      }
      return items[int(0, items.length - 1)];
    },
  };
}

/**
 * Deterministic xorshift32 generator. Good enough for simulation;
 * not crypto-safe.
 */
export function createSeededRandom(seed: number): RandomSource {
  let x = seed | 0 || 1;
  return createRandomSource(() => {
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    return (x >>> 0) / 0x100000000;
  });
}

/** FNV-1a 32-bit hash, handy for deriving a seed from a text or name. */
export function hashStringToSeed(input: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    h ^= input.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}
